import { pgTable, uuid, varchar, text, integer, numeric, date, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import { INVOICE_TEXT_LIMITS, type ExtractionMethod, type LineItem } from '@invoice-intake/core';
import { invoiceAttachments } from './attachments.js';

export const invoiceData = pgTable(
  'invoice_data',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    attachmentRecordId: uuid('attachment_record_id')
      .notNull()
      .references(() => invoiceAttachments.id, { onDelete: 'cascade' }),
    messageId: varchar('message_id', { length: 255 }).notNull(),
    attachmentName: varchar('attachment_name', { length: 500 }).notNull(),
    invoiceSequence: integer('invoice_sequence').notNull(),

    // Extracted fields
    invoiceNumber: varchar('invoice_number', { length: INVOICE_TEXT_LIMITS.invoiceNumber }),
    vendorName: varchar('vendor_name', { length: INVOICE_TEXT_LIMITS.vendorName }),
    vendorAddress: text('vendor_address'),
    invoiceDate: date('invoice_date'),
    dueDate: date('due_date'),
    totalAmount: numeric('total_amount', { precision: 14, scale: 2 }),
    currency: varchar('currency', { length: INVOICE_TEXT_LIMITS.currency }),
    taxAmount: numeric('tax_amount', { precision: 14, scale: 2 }),
    subtotalAmount: numeric('subtotal_amount', { precision: 14, scale: 2 }),
    lineItems: jsonb('line_items').$type<LineItem[]>().notNull().default([]),
    paymentTerms: varchar('payment_terms', { length: INVOICE_TEXT_LIMITS.paymentTerms }),
    purchaseOrderNumber: varchar('purchase_order_number', { length: INVOICE_TEXT_LIMITS.purchaseOrderNumber }),
    billToName: varchar('bill_to_name', { length: INVOICE_TEXT_LIMITS.billToName }),
    billToAddress: text('bill_to_address'),
    shipToName: varchar('ship_to_name', { length: INVOICE_TEXT_LIMITS.shipToName }),
    shipToAddress: text('ship_to_address'),
    notes: text('notes'),

    // Provenance
    confidenceScore: numeric('confidence_score', { precision: 4, scale: 3 }).notNull(),
    extractionMethod: varchar('extraction_method', { length: 20 }).notNull().$type<ExtractionMethod>(),
    extractionTimestamp: timestamp('extraction_timestamp', { withTimezone: true }).notNull(),
    source: varchar('source', { length: 100 }).notNull(),

    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    attachmentIdx: index('idx_invoice_data_attachment').on(table.attachmentRecordId),
    messageIdx: index('idx_invoice_data_message').on(table.messageId),
    vendorIdx: index('idx_invoice_data_vendor').on(table.vendorName),
    invoiceNumberIdx: index('idx_invoice_data_invoice_number').on(table.invoiceNumber),
  })
);

export type InvoiceDataRow = typeof invoiceData.$inferSelect;
export type NewInvoiceDataRow = typeof invoiceData.$inferInsert;
