import type { FastifyPluginAsync } from 'fastify';
import {
  PipelineErrorCode,
  type AttachmentRecordStore,
  type IAttachmentPipeline,
  type InvoiceStore,
} from '@invoice-intake/core';
import { idParamsSchema, processBodySchema, searchBodySchema } from './schemas.js';
import { sendPipelineError, sendStorageError } from './errors.js';

export interface AttachmentRoutesOptions {
  pipeline: IAttachmentPipeline;
  attachmentRecords: AttachmentRecordStore;
  invoices: InvoiceStore;
  /** Candidates returned by a search when the request sets no limit. */
  maxCandidates: number;
}

export const attachmentRoutes: FastifyPluginAsync<AttachmentRoutesOptions> = async (app, opts) => {
  // Rank mailbox attachments against search criteria
  app.post(
    '/search',
    {
      schema: {
        tags: ['attachments'],
        summary: 'Search the mailbox and score candidate attachments',
      },
    },
    async (request, reply) => {
      const { limit, ...criteria } = searchBodySchema.parse(request.body ?? {});

      const result = await opts.pipeline.search(criteria);
      if (!result.ok) {
        return sendPipelineError(reply, result.error);
      }

      return {
        candidates: result.value.candidates.slice(0, limit ?? opts.maxCandidates),
        recommended: result.value.recommended,
        totalCandidates: result.value.totalCandidates,
        highConfidenceCount: result.value.highConfidenceCount,
      };
    }
  );

  // Process the recommended attachment, or an explicit one from a fresh search
  app.post(
    '/process',
    {
      schema: {
        tags: ['attachments'],
        summary: 'Download, extract and store one attachment',
      },
    },
    async (request, reply) => {
      const { requireHighConfidence, messageId, attachmentId, ...criteria } = processBodySchema.parse(
        request.body ?? {}
      );

      if (messageId === undefined || attachmentId === undefined) {
        const result = await opts.pipeline.processRecommended(criteria, { requireHighConfidence });
        return result.ok ? result.value : sendPipelineError(reply, result.error);
      }

      const searched = await opts.pipeline.search(criteria);
      if (!searched.ok) {
        return sendPipelineError(reply, searched.error);
      }

      const candidate = searched.value.candidates.find(
        (c) => c.messageId === messageId && c.attachmentId === attachmentId
      );
      if (!candidate) {
        return sendPipelineError(reply, {
          code: PipelineErrorCode.NOT_FOUND,
          message: `Attachment ${attachmentId} of message ${messageId} is not among the search results`,
        });
      }

      const result = await opts.pipeline.processCandidate(candidate);
      return result.ok ? result.value : sendPipelineError(reply, result.error);
    }
  );

  // Get an attachment record
  app.get(
    '/:id',
    {
      schema: {
        tags: ['attachments'],
        summary: 'Get an attachment record by ID',
      },
    },
    async (request, reply) => {
      const { id } = idParamsSchema.parse(request.params);

      const result = await opts.attachmentRecords.findById(id);
      if (!result.ok) {
        return sendStorageError(reply, result.error);
      }
      if (!result.value) {
        return reply.status(404).send({ error: PipelineErrorCode.NOT_FOUND, message: 'Attachment record not found' });
      }
      return result.value;
    }
  );

  // Invoices extracted from one attachment
  app.get(
    '/:id/invoices',
    {
      schema: {
        tags: ['attachments', 'invoices'],
        summary: 'List the invoices stored for an attachment record',
      },
    },
    async (request, reply) => {
      const { id } = idParamsSchema.parse(request.params);

      const record = await opts.attachmentRecords.findById(id);
      if (!record.ok) {
        return sendStorageError(reply, record.error);
      }
      if (!record.value) {
        return reply.status(404).send({ error: PipelineErrorCode.NOT_FOUND, message: 'Attachment record not found' });
      }

      const invoices = await opts.invoices.findByAttachmentRecord(id);
      if (!invoices.ok) {
        return sendStorageError(reply, invoices.error);
      }
      return { attachment: record.value, invoices: invoices.value };
    }
  );
};
