// In-memory implementations of the persistence and collaborator ports, for tests.
import { randomUUID } from 'crypto';
import { ok, err, type Result, type ServiceError, type DecodeError } from '@invoice-intake/utils';
import { DocumentKind, type DocumentText, type DownloadedAttachment, type MailMessage } from '../types/mail.js';
import type {
  AttachmentRecord,
  AttachmentStatusUpdate,
  AuditEntry,
  InvoiceRecord,
  NewAttachmentRecord,
  NewAuditEntry,
  NewInvoiceRecord,
} from '../types/records.js';
import type { DocumentReaderPort, MailSearchQuery, MailServicePort } from '../services/mail.js';
import type {
  AttachmentRecordStore,
  AuditListFilter,
  AuditTrail,
  InvoiceListFilter,
  InvoiceStore,
} from '../services/storage.js';

const page = <T>(items: T[], filter: { limit: number; offset: number }): T[] =>
  items.slice(filter.offset, filter.offset + filter.limit);

export class InMemoryAttachmentRecordStore implements AttachmentRecordStore {
  readonly records = new Map<string, AttachmentRecord>();
  failNext: Error | null = null;

  private takeFailure(): Error | null {
    const failure = this.failNext;
    this.failNext = null;
    return failure;
  }

  async upsert(record: NewAttachmentRecord): Promise<Result<AttachmentRecord, Error>> {
    const failure = this.takeFailure();
    if (failure) return err(failure);

    const now = new Date();
    const existing = [...this.records.values()].find(
      (r) => r.messageId === record.messageId && r.attachmentId === record.attachmentId
    );
    const stored: AttachmentRecord = existing
      ? { ...existing, ...record, updatedAt: now }
      : { ...record, id: randomUUID(), createdAt: now, updatedAt: now };
    this.records.set(stored.id, stored);
    return ok(stored);
  }

  async findById(id: string): Promise<Result<AttachmentRecord | null, Error>> {
    return ok(this.records.get(id) ?? null);
  }

  async findBySource(messageId: string, attachmentId: string): Promise<Result<AttachmentRecord | null, Error>> {
    const failure = this.takeFailure();
    if (failure) return err(failure);
    const found = [...this.records.values()].find(
      (r) => r.messageId === messageId && r.attachmentId === attachmentId
    );
    return ok(found ?? null);
  }

  async updateStatus(id: string, update: AttachmentStatusUpdate): Promise<Result<AttachmentRecord, Error>> {
    const failure = this.takeFailure();
    if (failure) return err(failure);
    const existing = this.records.get(id);
    if (!existing) return err(new Error(`Attachment record ${id} not found`));
    const updated: AttachmentRecord = {
      ...existing,
      processingStatus: update.processingStatus,
      invoiceCount: update.invoiceCount ?? existing.invoiceCount,
      documentType: update.documentType === undefined ? existing.documentType : update.documentType,
      error: update.error === undefined ? existing.error : update.error,
      updatedAt: new Date(),
    };
    this.records.set(id, updated);
    return ok(updated);
  }
}

export class InMemoryInvoiceStore implements InvoiceStore {
  readonly invoices = new Map<string, InvoiceRecord>();
  failNext: Error | null = null;

  async replaceForAttachment(
    attachmentRecordId: string,
    records: NewInvoiceRecord[]
  ): Promise<Result<InvoiceRecord[], Error>> {
    if (this.failNext) {
      const failure = this.failNext;
      this.failNext = null;
      return err(failure);
    }
    for (const [id, invoice] of this.invoices) {
      if (invoice.attachmentRecordId === attachmentRecordId) this.invoices.delete(id);
    }
    const now = new Date();
    const created = records.map((r) => ({ ...r, id: randomUUID(), createdAt: now, updatedAt: now }));
    for (const invoice of created) this.invoices.set(invoice.id, invoice);
    return ok(created);
  }

  async findById(id: string): Promise<Result<InvoiceRecord | null, Error>> {
    return ok(this.invoices.get(id) ?? null);
  }

  async findByAttachmentRecord(attachmentRecordId: string): Promise<Result<InvoiceRecord[], Error>> {
    return ok(
      [...this.invoices.values()]
        .filter((i) => i.attachmentRecordId === attachmentRecordId)
        .sort((a, b) => a.invoiceSequence - b.invoiceSequence)
    );
  }

  async list(filter: InvoiceListFilter): Promise<Result<InvoiceRecord[], Error>> {
    const vendor = filter.vendor?.toLowerCase();
    const matching = [...this.invoices.values()].filter(
      (i) =>
        (vendor === undefined || (i.vendorName ?? '').toLowerCase().includes(vendor)) &&
        (filter.messageId === undefined || i.messageId === filter.messageId)
    );
    return ok(page(matching, filter));
  }
}

export class InMemoryAuditTrail implements AuditTrail {
  readonly entries: AuditEntry[] = [];
  failNext: Error | null = null;

  async record(entry: NewAuditEntry): Promise<Result<AuditEntry, Error>> {
    if (this.failNext) {
      const failure = this.failNext;
      this.failNext = null;
      return err(failure);
    }
    const stored: AuditEntry = { ...entry, id: randomUUID(), checksum: 'test-checksum', createdAt: new Date() };
    this.entries.push(stored);
    return ok(stored);
  }

  async list(filter: AuditListFilter): Promise<Result<AuditEntry[], Error>> {
    const matching = this.entries.filter(
      (e) =>
        (filter.attachmentRecordId === undefined || e.attachmentRecordId === filter.attachmentRecordId) &&
        (filter.eventType === undefined || e.eventType === filter.eventType)
    );
    return ok(page(matching, filter));
  }
}

/** Serves canned messages and downloads; records the queries it received. */
export class FakeMailService implements MailServicePort {
  readonly queries: MailSearchQuery[] = [];
  readonly downloads: Array<{ messageId: string; attachmentId: string }> = [];
  searchFailure: ServiceError | null = null;
  readonly downloadFailures = new Map<string, ServiceError>();

  constructor(
    public messages: MailMessage[] = [],
    private readonly contents: Map<string, { filename: string; contentType: string; text: string }> = new Map()
  ) {}

  static key(messageId: string, attachmentId: string): string {
    return `${messageId}/${attachmentId}`;
  }

  setContent(messageId: string, attachmentId: string, filename: string, contentType: string, text: string): void {
    this.contents.set(FakeMailService.key(messageId, attachmentId), { filename, contentType, text });
  }

  async search(query: MailSearchQuery): Promise<Result<MailMessage[], ServiceError>> {
    this.queries.push(query);
    return this.searchFailure ? err(this.searchFailure) : ok(this.messages);
  }

  async download(messageId: string, attachmentId: string): Promise<Result<DownloadedAttachment, ServiceError>> {
    this.downloads.push({ messageId, attachmentId });
    const key = FakeMailService.key(messageId, attachmentId);
    const failure = this.downloadFailures.get(key);
    if (failure) return err(failure);

    const content = this.contents.get(key) ?? { filename: 'unknown.txt', contentType: 'text/plain', text: '' };
    const buffer = Buffer.from(content.text, 'utf-8');
    return ok({
      messageId,
      attachmentId,
      filename: content.filename,
      contentType: content.contentType,
      sizeBytes: buffer.length,
      content: buffer,
    });
  }
}

/** Reads every download as UTF-8 text, or as unsupported for images. */
export class PlainTextReader implements DocumentReaderPort {
  async read(download: DownloadedAttachment): Promise<Result<DocumentText, DecodeError>> {
    if (download.contentType.startsWith('image/')) {
      return ok({ kind: DocumentKind.UNSUPPORTED, text: '' });
    }
    return ok({ kind: DocumentKind.TEXT, text: download.content.toString('utf-8') });
  }
}
