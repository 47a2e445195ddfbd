import { pgTable, uuid, varchar, text, integer, timestamp, index, uniqueIndex, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { DocumentType, ProcessingStatus } from '@invoice-intake/core';

// One row per mailbox attachment that entered the pipeline
export const invoiceAttachments = pgTable(
  'invoice_attachments',
  {
    id: uuid('id').primaryKey().defaultRandom(),

    // Source in the mailbox
    messageId: varchar('message_id', { length: 255 }).notNull(),
    attachmentId: varchar('attachment_id', { length: 255 }).notNull(),
    attachmentName: varchar('attachment_name', { length: 500 }).notNull(),
    senderEmail: varchar('sender_email', { length: 320 }).notNull(),
    subject: text('subject').notNull(),
    receivedAt: timestamp('received_at', { withTimezone: true }),

    // File info
    contentType: varchar('content_type', { length: 255 }).notNull(),
    fileSize: integer('file_size').notNull(),
    contentHash: varchar('content_hash', { length: 64 }).notNull(),

    // Processing
    documentType: varchar('document_type', { length: 20 }).$type<DocumentType>(),
    invoiceCount: integer('invoice_count').notNull().default(0),
    processingStatus: varchar('processing_status', { length: 20 }).notNull().default('pending').$type<ProcessingStatus>(),
    source: varchar('source', { length: 100 }).notNull(),
    error: text('error'),

    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    sourceIdx: uniqueIndex('idx_invoice_attachments_source').on(table.messageId, table.attachmentId),
    contentHashIdx: index('idx_invoice_attachments_content_hash').on(table.contentHash),
    statusIdx: index('idx_invoice_attachments_status').on(table.processingStatus),
    statusCheck: check(
      'invoice_attachments_status_check',
      sql`${table.processingStatus} IN ('pending', 'completed', 'no_invoices', 'failed')`
    ),
  })
);

export type InvoiceAttachmentRow = typeof invoiceAttachments.$inferSelect;
export type NewInvoiceAttachmentRow = typeof invoiceAttachments.$inferInsert;
