import type { DocumentType, ExtractedInvoice, ExtractionMethod } from './invoice.js';

export const ProcessingStatus = {
  PENDING: 'pending',
  COMPLETED: 'completed',
  NO_INVOICES: 'no_invoices',
  FAILED: 'failed',
} as const;
export type ProcessingStatus = (typeof ProcessingStatus)[keyof typeof ProcessingStatus];

export interface AttachmentRecord {
  id: string;
  messageId: string;
  attachmentId: string;
  attachmentName: string;
  senderEmail: string;
  subject: string;
  receivedAt: Date | null;
  contentType: string;
  fileSize: number;
  contentHash: string;
  documentType: DocumentType | null;
  invoiceCount: number;
  processingStatus: ProcessingStatus;
  source: string;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewAttachmentRecord = Omit<AttachmentRecord, 'id' | 'createdAt' | 'updatedAt'>;

export interface AttachmentStatusUpdate {
  processingStatus: ProcessingStatus;
  invoiceCount?: number;
  documentType?: DocumentType | null;
  error?: string | null;
}

export interface InvoiceRecord extends Omit<ExtractedInvoice, 'extractionMethod'> {
  id: string;
  attachmentRecordId: string;
  messageId: string;
  attachmentName: string;
  extractionMethod: ExtractionMethod;
  extractionTimestamp: Date;
  source: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewInvoiceRecord = Omit<InvoiceRecord, 'id' | 'createdAt' | 'updatedAt'>;

export const AuditEventType = {
  ATTACHMENT_STORED: 'attachment.stored',
  INVOICE_STORED: 'invoice.stored',
  ATTACHMENT_COMPLETED: 'attachment.completed',
  ATTACHMENT_FAILED: 'attachment.failed',
} as const;
export type AuditEventType = (typeof AuditEventType)[keyof typeof AuditEventType];

export const AuditCategory = {
  INTAKE: 'intake',
  EXTRACTION: 'extraction',
  PROCESSING: 'processing',
} as const;
export type AuditCategory = (typeof AuditCategory)[keyof typeof AuditCategory];

export interface NewAuditEntry {
  eventType: AuditEventType;
  eventCategory: AuditCategory;
  attachmentRecordId: string | null;
  invoiceRecordId: string | null;
  messageId: string | null;
  description: string;
  metadata: Record<string, unknown>;
  actor: string;
}

export interface AuditEntry extends NewAuditEntry {
  id: string;
  checksum: string;
  createdAt: Date;
}
