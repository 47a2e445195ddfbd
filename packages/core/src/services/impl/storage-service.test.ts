import { describe, it, expect, beforeEach } from 'vitest';
import {
  InMemoryAttachmentRecordStore,
  InMemoryAuditTrail,
  InMemoryInvoiceStore,
} from '../../test/fakes.js';
import { emptyInvoiceFields, type ExtractedInvoice, type InvoiceExtraction } from '../../types/invoice.js';
import type { Candidate, DownloadedAttachment } from '../../types/mail.js';
import { InvoiceStorageService, fitToColumns, sha256 } from './storage-service.js';

const candidate: Candidate = {
  messageId: 'msg-7',
  attachmentId: 'att-7',
  attachmentName: 'statement.pdf',
  messageSubject: 'April statement',
  senderAddress: 'billing@supplier.test',
  receivedAt: new Date('2024-04-30T10:00:00Z'),
  sizeBytes: 2048,
  contentType: 'application/pdf',
  score: 0.82,
  reasons: ['Sender matches: billing@supplier.test'],
};

const download: DownloadedAttachment = {
  messageId: 'msg-7',
  attachmentId: 'att-7',
  filename: 'statement.pdf',
  contentType: 'application/pdf',
  sizeBytes: 11,
  content: Buffer.from('hello world'),
};

const invoice = (n: number): ExtractedInvoice => ({
  ...emptyInvoiceFields(),
  invoiceNumber: `S-${n}`,
  totalAmount: n * 100,
  invoiceSequence: n,
  confidenceScore: 0.9,
  extractionMethod: 'llm',
});

const extraction = (count: number): InvoiceExtraction => ({
  documentType: 'invoice',
  method: 'llm',
  invoices: Array.from({ length: count }, (_, i) => invoice(i + 1)),
});

describe('InvoiceStorageService', () => {
  let attachments: InMemoryAttachmentRecordStore;
  let invoices: InMemoryInvoiceStore;
  let audit: InMemoryAuditTrail;
  let service: InvoiceStorageService;

  beforeEach(() => {
    attachments = new InMemoryAttachmentRecordStore();
    invoices = new InMemoryInvoiceStore();
    audit = new InMemoryAuditTrail();
    service = new InvoiceStorageService(attachments, invoices, audit, {
      maxInvoicesPerAttachment: 2,
      source: 'test',
    });
  });

  it('records the attachment as pending with its content hash', async () => {
    const result = await service.recordAttachment(candidate, download);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      messageId: 'msg-7',
      attachmentId: 'att-7',
      senderEmail: 'billing@supplier.test',
      subject: 'April statement',
      fileSize: 11,
      contentHash: 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9',
      processingStatus: 'pending',
      source: 'test',
    });
    expect(audit.entries.map((e) => [e.eventType, e.attachmentRecordId, e.actor])).toEqual([
      ['attachment.stored', result.value.id, 'system'],
    ]);
  });

  it('stores at most the configured number of invoices, each linked and audited', async () => {
    const recorded = await service.recordAttachment(candidate, download);
    if (!recorded.ok) throw new Error(recorded.error.message);

    const result = await service.storeInvoices(recorded.value, extraction(3));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { record, invoices: stored } = result.value;
    expect(stored.map((i) => [i.invoiceNumber, i.invoiceSequence])).toEqual([
      ['S-1', 1],
      ['S-2', 2],
    ]);
    expect(stored.every((i) => i.attachmentRecordId === record.id && i.messageId === 'msg-7')).toBe(true);
    expect(record).toMatchObject({ processingStatus: 'completed', invoiceCount: 2, documentType: 'invoice' });

    const invoiceAudits = audit.entries.filter((e) => e.eventType === 'invoice.stored');
    expect(invoiceAudits.map((e) => e.invoiceRecordId)).toEqual(stored.map((i) => i.id));
    expect(audit.entries.at(-1)?.eventType).toBe('attachment.completed');
  });

  it('cuts oversized fields before storing them', async () => {
    const recorded = await service.recordAttachment(candidate, download);
    if (!recorded.ok) throw new Error(recorded.error.message);

    const oversized: InvoiceExtraction = {
      documentType: 'receipt',
      method: 'regex',
      invoices: [{ ...invoice(1), vendorName: 'V'.repeat(300), totalAmount: 5e15 }],
    };
    const result = await service.storeInvoices(recorded.value, oversized);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.invoices[0]?.vendorName).toBe('V'.repeat(255));
    expect(result.value.invoices[0]?.totalAmount).toBeNull();
    expect(result.value.record.processingStatus).toBe('completed');
  });

  it('marks the record no_invoices when nothing was extracted', async () => {
    const recorded = await service.recordAttachment(candidate, download);
    if (!recorded.ok) throw new Error(recorded.error.message);

    const result = await service.storeInvoices(recorded.value, extraction(0));

    expect(result.ok && result.value.record.processingStatus).toBe('no_invoices');
    expect(result.ok && result.value.invoices).toEqual([]);
  });

  it('replaces earlier invoices when an attachment is stored again', async () => {
    const recorded = await service.recordAttachment(candidate, download);
    if (!recorded.ok) throw new Error(recorded.error.message);

    await service.storeInvoices(recorded.value, extraction(2));
    await service.storeInvoices(recorded.value, extraction(1));

    expect([...invoices.invoices.values()].map((i) => i.invoiceNumber)).toEqual(['S-1']);
  });

  it('marks failures with the reason and audits them', async () => {
    const recorded = await service.recordAttachment(candidate, download);
    if (!recorded.ok) throw new Error(recorded.error.message);

    const result = await service.markFailed(recorded.value, 'Document has no text to extract from');

    expect(result.ok && result.value).toMatchObject({
      processingStatus: 'failed',
      error: 'Document has no text to extract from',
    });
    expect(audit.entries.at(-1)).toMatchObject({
      eventType: 'attachment.failed',
      metadata: { reason: 'Document has no text to extract from' },
    });
  });

  it('reports repository failures', async () => {
    attachments.failNext = new Error('connection refused');
    const result = await service.recordAttachment(candidate, download);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Failed to store attachment record: connection refused');
    }
    expect(audit.entries).toEqual([]);
  });

  it('hashes content with sha-256', () => {
    expect(sha256(Buffer.from(''))).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('fitToColumns', () => {
  it('leaves fields within their limits alone', () => {
    expect(fitToColumns(invoice(1))).toEqual({ invoice: invoice(1), adjusted: [] });
  });

  it('reports which fields were changed', () => {
    const { invoice: fitted, adjusted } = fitToColumns({
      ...invoice(1),
      invoiceNumber: `INV-${'9'.repeat(120)}`,
      currency: 'US Dollars (USD)',
      taxAmount: -1e13,
    });

    expect(fitted.invoiceNumber).toBe(`INV-${'9'.repeat(96)}`);
    expect(fitted.currency).toBeNull();
    expect(fitted.taxAmount).toBeNull();
    expect(fitted.totalAmount).toBe(100);
    expect(adjusted).toEqual(['invoiceNumber', 'currency', 'taxAmount']);
  });
});
