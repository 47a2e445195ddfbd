import { eq, and, desc } from 'drizzle-orm';
import { ok, err, toError, type Result } from '@invoice-intake/utils';
import type { AuditEntry, AuditListFilter, AuditTrail, NewAuditEntry } from '@invoice-intake/core';
import type { Database } from '../db.js';
import { auditLog, computeAuditChecksum } from '../schema/audit.js';

export class AuditRepository implements AuditTrail {
  constructor(private readonly db: Database) {}

  async record(entry: NewAuditEntry): Promise<Result<AuditEntry, Error>> {
    try {
      const createdAt = new Date();
      const checksum = computeAuditChecksum(entry, createdAt);

      const [created] = await this.db
        .insert(auditLog)
        .values({ ...entry, createdAt, checksum })
        .returning();

      if (!created) {
        return err(new Error('Failed to create audit log entry'));
      }
      return ok(created);
    } catch (error) {
      return err(toError(error));
    }
  }

  async list(filter: AuditListFilter): Promise<Result<AuditEntry[], Error>> {
    try {
      const conditions = [];

      if (filter.attachmentRecordId) {
        conditions.push(eq(auditLog.attachmentRecordId, filter.attachmentRecordId));
      }

      if (filter.eventType) {
        conditions.push(eq(auditLog.eventType, filter.eventType));
      }

      const rows = await this.db
        .select()
        .from(auditLog)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(auditLog.createdAt))
        .limit(filter.limit)
        .offset(filter.offset);
      return ok(rows);
    } catch (error) {
      return err(toError(error));
    }
  }
}
