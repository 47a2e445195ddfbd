import { eq, and } from 'drizzle-orm';
import { ok, err, toError, type Result } from '@invoice-intake/utils';
import type {
  AttachmentRecord,
  AttachmentRecordStore,
  AttachmentStatusUpdate,
  NewAttachmentRecord,
} from '@invoice-intake/core';
import type { Database } from '../db.js';
import { invoiceAttachments } from '../schema/attachments.js';

export class AttachmentRepository implements AttachmentRecordStore {
  constructor(private readonly db: Database) {}

  async upsert(record: NewAttachmentRecord): Promise<Result<AttachmentRecord, Error>> {
    try {
      const [stored] = await this.db
        .insert(invoiceAttachments)
        .values(record)
        .onConflictDoUpdate({
          target: [invoiceAttachments.messageId, invoiceAttachments.attachmentId],
          set: { ...record, updatedAt: new Date() },
        })
        .returning();

      if (!stored) {
        return err(new Error('Failed to store attachment record'));
      }
      return ok(stored);
    } catch (error) {
      return err(toError(error));
    }
  }

  async findById(id: string): Promise<Result<AttachmentRecord | null, Error>> {
    try {
      const [record] = await this.db
        .select()
        .from(invoiceAttachments)
        .where(eq(invoiceAttachments.id, id))
        .limit(1);
      return ok(record ?? null);
    } catch (error) {
      return err(toError(error));
    }
  }

  async findBySource(messageId: string, attachmentId: string): Promise<Result<AttachmentRecord | null, Error>> {
    try {
      const [record] = await this.db
        .select()
        .from(invoiceAttachments)
        .where(and(eq(invoiceAttachments.messageId, messageId), eq(invoiceAttachments.attachmentId, attachmentId)))
        .limit(1);
      return ok(record ?? null);
    } catch (error) {
      return err(toError(error));
    }
  }

  async updateStatus(id: string, update: AttachmentStatusUpdate): Promise<Result<AttachmentRecord, Error>> {
    try {
      const [updated] = await this.db
        .update(invoiceAttachments)
        .set({
          processingStatus: update.processingStatus,
          ...(update.invoiceCount !== undefined ? { invoiceCount: update.invoiceCount } : {}),
          ...(update.documentType !== undefined ? { documentType: update.documentType } : {}),
          ...(update.error !== undefined ? { error: update.error } : {}),
          updatedAt: new Date(),
        })
        .where(eq(invoiceAttachments.id, id))
        .returning();

      if (!updated) {
        return err(new Error(`Attachment record not found: ${id}`));
      }
      return ok(updated);
    } catch (error) {
      return err(toError(error));
    }
  }
}
