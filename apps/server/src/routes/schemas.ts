import { z } from 'zod';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v === '' ? undefined : v));

export const criteriaSchema = z.object({
  senderEmail: optionalText,
  subjectContains: optionalText,
  attachmentNameHint: optionalText,
  daysBack: z.number().int().positive().max(365).optional(),
});

export const searchBodySchema = criteriaSchema.extend({
  limit: z.number().int().min(1).max(100).optional(),
});

export const processBodySchema = criteriaSchema
  .extend({
    requireHighConfidence: z.boolean().default(false),
    messageId: z.string().min(1).optional(),
    attachmentId: z.string().min(1).optional(),
  })
  .refine((body) => (body.messageId === undefined) === (body.attachmentId === undefined), {
    message: 'messageId and attachmentId must be given together',
    path: ['attachmentId'],
  });

export const runBodySchema = criteriaSchema.extend({
  extensions: z.array(z.string().min(1)).min(1).optional(),
});

export const idParamsSchema = z.object({
  id: z.string().uuid(),
});

const page = {
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
};

export const invoiceQuerySchema = z.object({
  vendor: z.string().min(1).optional(),
  messageId: z.string().min(1).optional(),
  ...page,
});

export const auditQuerySchema = z.object({
  attachmentRecordId: z.string().uuid().optional(),
  eventType: z.enum(['attachment.stored', 'invoice.stored', 'attachment.completed', 'attachment.failed']).optional(),
  ...page,
});
