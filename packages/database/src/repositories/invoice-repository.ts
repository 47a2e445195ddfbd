import { eq, and, asc, desc, ilike } from 'drizzle-orm';
import { ok, err, toError, type Result } from '@invoice-intake/utils';
import type { InvoiceListFilter, InvoiceRecord, InvoiceStore, NewInvoiceRecord } from '@invoice-intake/core';
import type { Database } from '../db.js';
import { invoiceData, type InvoiceDataRow, type NewInvoiceDataRow } from '../schema/invoices.js';

// numeric columns travel as strings through postgres.js
const toNumeric = (value: number | null): string | null => (value === null ? null : String(value));
const fromNumeric = (value: string | null): number | null => (value === null ? null : Number(value));

export function toInvoiceRow(record: NewInvoiceRecord): NewInvoiceDataRow {
  return {
    ...record,
    totalAmount: toNumeric(record.totalAmount),
    taxAmount: toNumeric(record.taxAmount),
    subtotalAmount: toNumeric(record.subtotalAmount),
    confidenceScore: record.confidenceScore.toFixed(3),
  };
}

export function fromInvoiceRow(row: InvoiceDataRow): InvoiceRecord {
  return {
    ...row,
    totalAmount: fromNumeric(row.totalAmount),
    taxAmount: fromNumeric(row.taxAmount),
    subtotalAmount: fromNumeric(row.subtotalAmount),
    confidenceScore: Number(row.confidenceScore),
  };
}

export class InvoiceRepository implements InvoiceStore {
  constructor(private readonly db: Database) {}

  async replaceForAttachment(
    attachmentRecordId: string,
    records: NewInvoiceRecord[]
  ): Promise<Result<InvoiceRecord[], Error>> {
    try {
      const rows: InvoiceDataRow[] = await this.db.transaction(async (tx) => {
        await tx.delete(invoiceData).where(eq(invoiceData.attachmentRecordId, attachmentRecordId));
        if (records.length === 0) return [];
        return tx.insert(invoiceData).values(records.map(toInvoiceRow)).returning();
      });
      return ok(rows.map(fromInvoiceRow));
    } catch (error) {
      return err(toError(error));
    }
  }

  async findById(id: string): Promise<Result<InvoiceRecord | null, Error>> {
    try {
      const [row] = await this.db.select().from(invoiceData).where(eq(invoiceData.id, id)).limit(1);
      return ok(row ? fromInvoiceRow(row) : null);
    } catch (error) {
      return err(toError(error));
    }
  }

  async findByAttachmentRecord(attachmentRecordId: string): Promise<Result<InvoiceRecord[], Error>> {
    try {
      const rows = await this.db
        .select()
        .from(invoiceData)
        .where(eq(invoiceData.attachmentRecordId, attachmentRecordId))
        .orderBy(asc(invoiceData.invoiceSequence));
      return ok(rows.map(fromInvoiceRow));
    } catch (error) {
      return err(toError(error));
    }
  }

  async list(filter: InvoiceListFilter): Promise<Result<InvoiceRecord[], Error>> {
    try {
      const conditions = [];

      if (filter.vendor) {
        conditions.push(ilike(invoiceData.vendorName, `%${filter.vendor}%`));
      }

      if (filter.messageId) {
        conditions.push(eq(invoiceData.messageId, filter.messageId));
      }

      const rows = await this.db
        .select()
        .from(invoiceData)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(invoiceData.createdAt), asc(invoiceData.invoiceSequence))
        .limit(filter.limit)
        .offset(filter.offset);
      return ok(rows.map(fromInvoiceRow));
    } catch (error) {
      return err(toError(error));
    }
  }
}
