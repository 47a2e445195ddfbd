import type { Result } from '@invoice-intake/utils';
import type { Candidate, DownloadedAttachment } from '../types/mail.js';
import type { InvoiceExtraction } from '../types/invoice.js';
import type {
  AttachmentRecord,
  AttachmentStatusUpdate,
  AuditEntry,
  AuditEventType,
  InvoiceRecord,
  NewAttachmentRecord,
  NewAuditEntry,
  NewInvoiceRecord,
} from '../types/records.js';

export interface Page {
  limit: number;
  offset: number;
}

export interface InvoiceListFilter extends Page {
  vendor?: string;
  messageId?: string;
}

export interface AuditListFilter extends Page {
  attachmentRecordId?: string;
  eventType?: AuditEventType;
}

// Persistence ports, implemented by the database repositories

export interface AttachmentRecordStore {
  /** Inserts, or resets the existing row for the same (messageId, attachmentId). */
  upsert(record: NewAttachmentRecord): Promise<Result<AttachmentRecord, Error>>;
  findById(id: string): Promise<Result<AttachmentRecord | null, Error>>;
  findBySource(messageId: string, attachmentId: string): Promise<Result<AttachmentRecord | null, Error>>;
  updateStatus(id: string, update: AttachmentStatusUpdate): Promise<Result<AttachmentRecord, Error>>;
}

export interface InvoiceStore {
  /** Replaces every invoice linked to the attachment record with the given ones. */
  replaceForAttachment(
    attachmentRecordId: string,
    records: NewInvoiceRecord[]
  ): Promise<Result<InvoiceRecord[], Error>>;
  findById(id: string): Promise<Result<InvoiceRecord | null, Error>>;
  findByAttachmentRecord(attachmentRecordId: string): Promise<Result<InvoiceRecord[], Error>>;
  list(filter: InvoiceListFilter): Promise<Result<InvoiceRecord[], Error>>;
}

export interface AuditTrail {
  record(entry: NewAuditEntry): Promise<Result<AuditEntry, Error>>;
  list(filter: AuditListFilter): Promise<Result<AuditEntry[], Error>>;
}

export interface StorageError {
  message: string;
  cause: Error;
}

export interface IInvoiceStorageService {
  recordAttachment(
    candidate: Candidate,
    download: DownloadedAttachment
  ): Promise<Result<AttachmentRecord, StorageError>>;

  storeInvoices(
    record: AttachmentRecord,
    extraction: InvoiceExtraction
  ): Promise<Result<{ record: AttachmentRecord; invoices: InvoiceRecord[] }, StorageError>>;

  markFailed(record: AttachmentRecord, reason: string): Promise<Result<AttachmentRecord, StorageError>>;
}

export interface StorageOptions {
  maxInvoicesPerAttachment: number;
  source: string;
  actor?: string;
}
