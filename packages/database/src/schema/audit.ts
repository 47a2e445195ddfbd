import { pgTable, uuid, varchar, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import { createHash } from 'crypto';
import type { AuditCategory, AuditEventType, NewAuditEntry } from '@invoice-intake/core';

export const auditLog = pgTable(
  'audit_log',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),

    // What happened
    eventType: varchar('event_type', { length: 100 }).notNull().$type<AuditEventType>(),
    eventCategory: varchar('event_category', { length: 50 }).notNull().$type<AuditCategory>(),

    // Context
    attachmentRecordId: uuid('attachment_record_id'),
    invoiceRecordId: uuid('invoice_record_id'),
    messageId: varchar('message_id', { length: 255 }),
    actor: varchar('actor', { length: 100 }).notNull(),

    // Details
    description: text('description').notNull(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),

    // Integrity
    checksum: varchar('checksum', { length: 64 }).notNull(),
  },
  (table) => ({
    createdAtIdx: index('idx_audit_log_created_at').on(table.createdAt),
    attachmentIdx: index('idx_audit_log_attachment').on(table.attachmentRecordId),
    eventTypeIdx: index('idx_audit_log_event_type').on(table.eventType),
  })
);

export type AuditLogRow = typeof auditLog.$inferSelect;

const byKey = ([a]: [string, unknown], [b]: [string, unknown]): number => (a < b ? -1 : a > b ? 1 : 0);

// jsonb does not keep key order, so metadata is hashed with its keys sorted
function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    return Object.fromEntries(
      Object.entries(value)
        .sort(byKey)
        .map(([key, nested]) => [key, canonicalize(nested)])
    );
  }
  return value;
}

// SHA-256 over the entry's content and timestamp
export function computeAuditChecksum(entry: NewAuditEntry, createdAt: Date): string {
  const data = JSON.stringify({
    createdAt: createdAt.toISOString(),
    eventType: entry.eventType,
    eventCategory: entry.eventCategory,
    attachmentRecordId: entry.attachmentRecordId,
    invoiceRecordId: entry.invoiceRecordId,
    messageId: entry.messageId,
    actor: entry.actor,
    description: entry.description,
    metadata: canonicalize(entry.metadata),
  });
  return createHash('sha256').update(data).digest('hex');
}
