import { describe, it, expect, vi } from 'vitest';
import { ok, err, networkError, type Result, type ServiceError } from '@invoice-intake/utils';
import { emptyInvoiceFields, type InvoiceFields } from '../../types/invoice.js';
import type { InvoiceLlm, LlmExtractionRequest } from '../extractor.js';
import { InvoiceExtractorService } from './extractor-service.js';

const TEXT = 'Invoice #: INV-501\nTotal: $300.00\nDate: 04/02/2024';

const fields = (invoiceNumber: string, totalAmount: number): InvoiceFields => ({
  ...emptyInvoiceFields(),
  invoiceNumber,
  totalAmount,
  currency: 'USD',
});

function fakeLlm(response: Result<InvoiceFields[], ServiceError>) {
  const extractInvoices = vi.fn(async (_request: LlmExtractionRequest) => response);
  const llm: InvoiceLlm = { extractInvoices };
  return { llm, extractInvoices };
}

describe('InvoiceExtractorService', () => {
  it('rejects empty text', async () => {
    const service = new InvoiceExtractorService(null, { maxInvoicesPerAttachment: 2 });
    const result = await service.extract('   \n', { filename: 'scan.pdf' });
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INVALID_INPUT',
        message: 'Document has no text to extract from',
        details: { filename: 'scan.pdf' },
      },
    });
  });

  it('uses the pattern extractor when no LLM is configured', async () => {
    const service = new InvoiceExtractorService(null, { maxInvoicesPerAttachment: 2 });
    const result = await service.extract(TEXT, { filename: 'inv.txt' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.method).toBe('regex');
      expect(result.value.documentType).toBe('invoice');
      expect(result.value.invoices).toHaveLength(1);
      expect(result.value.invoices[0]?.invoiceNumber).toBe('INV-501');
      expect(result.value.invoices[0]?.totalAmount).toBe(300);
      expect(result.value.fallbackReason).toBeUndefined();
    }
  });

  it('stamps LLM invoices and bounds their count', async () => {
    const { llm, extractInvoices } = fakeLlm(
      ok([fields('A-1', 10), fields('A-2', 20), fields('A-3', 30)])
    );
    const service = new InvoiceExtractorService(llm, { maxInvoicesPerAttachment: 2 });

    const result = await service.extract(TEXT, { filename: 'batch.pdf' });

    expect(extractInvoices).toHaveBeenCalledWith({ text: TEXT, filename: 'batch.pdf', maxInvoices: 2 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.method).toBe('llm');
      expect(
        result.value.invoices.map((i) => [i.invoiceNumber, i.invoiceSequence, i.confidenceScore, i.extractionMethod])
      ).toEqual([
        ['A-1', 1, 0.9, 'llm'],
        ['A-2', 2, 0.9, 'llm'],
      ]);
    }
  });

  it('accepts an LLM answer with no invoices', async () => {
    const { llm } = fakeLlm(ok([]));
    const service = new InvoiceExtractorService(llm, { maxInvoicesPerAttachment: 2 });
    const result = await service.extract('Team offsite agenda', { filename: 'agenda.pdf' });
    expect(result.ok && result.value).toEqual({ documentType: 'general', method: 'llm', invoices: [] });
  });

  it('falls back to patterns when the LLM fails', async () => {
    const { llm } = fakeLlm(err(networkError('groq', 'connect ECONNREFUSED')));
    const service = new InvoiceExtractorService(llm, { maxInvoicesPerAttachment: 2 });

    const result = await service.extract(TEXT, { filename: 'inv.txt' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.method).toBe('regex');
      expect(result.value.fallbackReason).toBe('connect ECONNREFUSED');
      expect(result.value.invoices[0]?.invoiceNumber).toBe('INV-501');
    }
  });

  it('reports the LLM failure when fallback is disabled', async () => {
    const { llm } = fakeLlm(err(networkError('groq', 'timeout')));
    const service = new InvoiceExtractorService(llm, { maxInvoicesPerAttachment: 2, patternFallback: false });

    const result = await service.extract(TEXT, { filename: 'inv.txt' });

    expect(result).toEqual({
      ok: false,
      error: { code: 'LLM_ERROR', message: 'timeout', details: { kind: 'network', retryable: true } },
    });
  });
});
