import { createHash } from 'crypto';
import { type Result, ok, err, createLogger } from '@invoice-intake/utils';
import type { Candidate, DownloadedAttachment } from '../../types/mail.js';
import {
  INVOICE_TEXT_LIMITS,
  MAX_STORED_AMOUNT,
  type ExtractedInvoice,
  type InvoiceExtraction,
} from '../../types/invoice.js';
import {
  AuditCategory,
  AuditEventType,
  ProcessingStatus,
  type AttachmentRecord,
  type InvoiceRecord,
  type NewAuditEntry,
  type NewInvoiceRecord,
} from '../../types/records.js';
import type {
  AttachmentRecordStore,
  AuditTrail,
  IInvoiceStorageService,
  InvoiceStore,
  StorageError,
  StorageOptions,
} from '../storage.js';

const logger = createLogger({ service: 'storage-service' });

const DEFAULT_ACTOR = 'system';

export const sha256 = (content: Buffer): string => createHash('sha256').update(content).digest('hex');

const clip = (value: string | null, max: number): string | null =>
  value === null || value.length <= max ? value : value.slice(0, max).trimEnd();

const storableAmount = (value: number | null): number | null =>
  value === null || Math.abs(value) <= MAX_STORED_AMOUNT ? value : null;

const BOUNDED_FIELDS = [
  'invoiceNumber',
  'vendorName',
  'currency',
  'paymentTerms',
  'purchaseOrderNumber',
  'billToName',
  'shipToName',
  'totalAmount',
  'taxAmount',
  'subtotalAmount',
] as const;

/**
 * Shortens text fields to their column width and drops amounts too large to
 * store. A currency longer than a code is dropped rather than cut.
 */
export function fitToColumns(invoice: ExtractedInvoice): { invoice: ExtractedInvoice; adjusted: string[] } {
  const fitted: ExtractedInvoice = {
    ...invoice,
    invoiceNumber: clip(invoice.invoiceNumber, INVOICE_TEXT_LIMITS.invoiceNumber),
    vendorName: clip(invoice.vendorName, INVOICE_TEXT_LIMITS.vendorName),
    currency:
      invoice.currency !== null && invoice.currency.length > INVOICE_TEXT_LIMITS.currency ? null : invoice.currency,
    paymentTerms: clip(invoice.paymentTerms, INVOICE_TEXT_LIMITS.paymentTerms),
    purchaseOrderNumber: clip(invoice.purchaseOrderNumber, INVOICE_TEXT_LIMITS.purchaseOrderNumber),
    billToName: clip(invoice.billToName, INVOICE_TEXT_LIMITS.billToName),
    shipToName: clip(invoice.shipToName, INVOICE_TEXT_LIMITS.shipToName),
    totalAmount: storableAmount(invoice.totalAmount),
    taxAmount: storableAmount(invoice.taxAmount),
    subtotalAmount: storableAmount(invoice.subtotalAmount),
  };
  const adjusted = BOUNDED_FIELDS.filter((field) => fitted[field] !== invoice[field]);
  return { invoice: fitted, adjusted };
}

const storageError = (message: string, cause: Error): StorageError => ({
  message: `${message}: ${cause.message}`,
  cause,
});

/**
 * Persists attachment records, their invoices and the audit trail linking them.
 */
export class InvoiceStorageService implements IInvoiceStorageService {
  private readonly actor: string;

  constructor(
    private readonly attachments: AttachmentRecordStore,
    private readonly invoices: InvoiceStore,
    private readonly audit: AuditTrail,
    private readonly options: StorageOptions
  ) {
    this.actor = options.actor ?? DEFAULT_ACTOR;
  }

  async recordAttachment(
    candidate: Candidate,
    download: DownloadedAttachment
  ): Promise<Result<AttachmentRecord, StorageError>> {
    const contentHash = sha256(download.content);
    const created = await this.attachments.upsert({
      messageId: candidate.messageId,
      attachmentId: candidate.attachmentId,
      attachmentName: download.filename || candidate.attachmentName,
      senderEmail: candidate.senderAddress,
      subject: candidate.messageSubject,
      receivedAt: candidate.receivedAt,
      contentType: download.contentType || candidate.contentType,
      fileSize: download.sizeBytes,
      contentHash,
      documentType: null,
      invoiceCount: 0,
      processingStatus: ProcessingStatus.PENDING,
      source: this.options.source,
      error: null,
    });

    if (!created.ok) {
      return err(storageError('Failed to store attachment record', created.error));
    }

    const record = created.value;
    const audited = await this.writeAudit({
      eventType: AuditEventType.ATTACHMENT_STORED,
      eventCategory: AuditCategory.INTAKE,
      attachmentRecordId: record.id,
      invoiceRecordId: null,
      messageId: record.messageId,
      description: `Attachment ${record.attachmentName} recorded`,
      metadata: { contentHash, fileSize: record.fileSize, score: candidate.score },
    });
    if (!audited.ok) return audited;

    logger.info({ attachmentRecordId: record.id, messageId: record.messageId }, 'Attachment recorded');
    return ok(record);
  }

  async storeInvoices(
    record: AttachmentRecord,
    extraction: InvoiceExtraction
  ): Promise<Result<{ record: AttachmentRecord; invoices: InvoiceRecord[] }, StorageError>> {
    const limit = this.options.maxInvoicesPerAttachment;
    const kept = extraction.invoices.slice(0, limit);
    if (extraction.invoices.length > kept.length) {
      logger.warn(
        { attachmentRecordId: record.id, found: extraction.invoices.length, limit },
        'Invoice count above limit; storing the first ones only'
      );
    }

    const extractionTimestamp = new Date();
    const newRecords: NewInvoiceRecord[] = kept.map((extracted, index) => {
      const { invoice, adjusted } = fitToColumns(extracted);
      if (adjusted.length > 0) {
        logger.warn(
          { attachmentRecordId: record.id, sequence: index + 1, adjusted },
          'Invoice fields cut to fit storage'
        );
      }
      return {
        ...invoice,
        invoiceSequence: index + 1,
        attachmentRecordId: record.id,
        messageId: record.messageId,
        attachmentName: record.attachmentName,
        extractionTimestamp,
        source: this.options.source,
      };
    });

    const stored = await this.invoices.replaceForAttachment(record.id, newRecords);
    if (!stored.ok) {
      return err(storageError('Failed to store invoices', stored.error));
    }

    for (const invoice of stored.value) {
      const audited = await this.writeAudit({
        eventType: AuditEventType.INVOICE_STORED,
        eventCategory: AuditCategory.EXTRACTION,
        attachmentRecordId: record.id,
        invoiceRecordId: invoice.id,
        messageId: record.messageId,
        description: `Invoice ${invoice.invoiceSequence} of ${stored.value.length} stored`,
        metadata: {
          invoiceNumber: invoice.invoiceNumber,
          totalAmount: invoice.totalAmount,
          extractionMethod: invoice.extractionMethod,
          confidenceScore: invoice.confidenceScore,
        },
      });
      if (!audited.ok) return audited;
    }

    const status = stored.value.length > 0 ? ProcessingStatus.COMPLETED : ProcessingStatus.NO_INVOICES;
    const updated = await this.attachments.updateStatus(record.id, {
      processingStatus: status,
      invoiceCount: stored.value.length,
      documentType: extraction.documentType,
      error: null,
    });
    if (!updated.ok) {
      return err(storageError('Failed to update attachment record', updated.error));
    }

    const audited = await this.writeAudit({
      eventType: AuditEventType.ATTACHMENT_COMPLETED,
      eventCategory: AuditCategory.PROCESSING,
      attachmentRecordId: record.id,
      invoiceRecordId: null,
      messageId: record.messageId,
      description: `Attachment processed with ${stored.value.length} invoice(s)`,
      metadata: { status, method: extraction.method, documentType: extraction.documentType },
    });
    if (!audited.ok) return audited;

    logger.info(
      { attachmentRecordId: record.id, invoiceCount: stored.value.length, status },
      'Invoices stored'
    );
    return ok({ record: updated.value, invoices: stored.value });
  }

  async markFailed(record: AttachmentRecord, reason: string): Promise<Result<AttachmentRecord, StorageError>> {
    const updated = await this.attachments.updateStatus(record.id, {
      processingStatus: ProcessingStatus.FAILED,
      error: reason,
    });
    if (!updated.ok) {
      return err(storageError('Failed to mark attachment record as failed', updated.error));
    }

    const audited = await this.writeAudit({
      eventType: AuditEventType.ATTACHMENT_FAILED,
      eventCategory: AuditCategory.PROCESSING,
      attachmentRecordId: record.id,
      invoiceRecordId: null,
      messageId: record.messageId,
      description: `Attachment processing failed: ${reason}`,
      metadata: { reason },
    });
    if (!audited.ok) return audited;

    logger.warn({ attachmentRecordId: record.id, reason }, 'Attachment marked as failed');
    return ok(updated.value);
  }

  private async writeAudit(entry: Omit<NewAuditEntry, 'actor'>): Promise<Result<void, StorageError>> {
    const result = await this.audit.record({ ...entry, actor: this.actor });
    if (!result.ok) {
      return err(storageError(`Failed to write audit entry ${entry.eventType}`, result.error));
    }
    return ok(undefined);
  }
}

export function createInvoiceStorageService(
  attachments: AttachmentRecordStore,
  invoices: InvoiceStore,
  audit: AuditTrail,
  options: StorageOptions
): InvoiceStorageService {
  return new InvoiceStorageService(attachments, invoices, audit, options);
}
