import { describe, it, expect } from 'vitest';
import { ok, err, type Result, type ServiceError, networkError, upstreamError } from '@invoice-intake/utils';
import type { LlmExtractionRequest } from '@invoice-intake/core';
import { GroqClient, createGroqClient, parseJsonFromResponse } from './client.js';

// Replays canned completions instead of calling the API
class ScriptedGroqClient extends GroqClient {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Result<string, ServiceError>[]) {
    super({
      apiKey: 'test-secret',
      model: 'test-model',
      temperature: 0,
      maxTokens: 512,
      maxInputChars: 40,
      retry: { maxAttempts: 2, initialDelayMs: 1, maxDelayMs: 1, jitter: 0 },
    });
  }

  protected override async complete(prompt: string): Promise<Result<string, ServiceError>> {
    this.prompts.push(prompt);
    return this.replies.shift() ?? err(upstreamError('groq', 'no scripted reply'));
  }
}

const request: LlmExtractionRequest = { text: 'Invoice INV-9 total 120.00', filename: 'inv.pdf', maxInvoices: 2 };

describe('GroqClient.extractInvoices', () => {
  it('maps the invoices of a JSON answer', async () => {
    const llm = new ScriptedGroqClient([
      ok(
        JSON.stringify({
          invoices: [
            {
              invoice_number: 'INV-9',
              vendor_name: ' Northwind Traders ',
              invoice_date: '03/04/2024',
              total_amount: '$1,250.00',
              currency: 'usd',
              line_items: [{ description: 'Widgets', quantity: 5, unit_price: '250', amount: 1250 }],
            },
          ],
        })
      ),
    ]);

    const result = await llm.extractInvoices(request);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(1);
    expect(result.value[0]).toEqual({
      invoiceNumber: 'INV-9',
      vendorName: 'Northwind Traders',
      vendorAddress: null,
      invoiceDate: '2024-03-04',
      dueDate: null,
      totalAmount: 1250,
      currency: 'USD',
      taxAmount: null,
      subtotalAmount: null,
      lineItems: [{ description: 'Widgets', quantity: 5, unitPrice: 250, amount: 1250 }],
      paymentTerms: null,
      purchaseOrderNumber: null,
      billToName: null,
      billToAddress: null,
      shipToName: null,
      shipToAddress: null,
      notes: null,
    });
  });

  it('drops dates that are not on the calendar', async () => {
    const llm = new ScriptedGroqClient([
      ok('{"invoices": [{"invoice_date": "2024-02-30", "due_date": "2024-13-45"}, {"invoice_date": "2024-02-29"}]}'),
    ]);

    const result = await llm.extractInvoices(request);

    expect(result.ok && result.value.map((i) => [i.invoiceDate, i.dueDate])).toEqual([
      [null, null],
      ['2024-02-29', null],
    ]);
  });

  it('reads JSON wrapped in a code fence', async () => {
    const llm = new ScriptedGroqClient([ok('Here you go:\n```json\n{"invoices": []}\n```')]);
    expect(await llm.extractInvoices(request)).toEqual({ ok: true, value: [] });
  });

  it('truncates long documents and states the invoice limit', async () => {
    const llm = new ScriptedGroqClient([ok('{"invoices": []}')]);
    await llm.extractInvoices({ ...request, text: 'x'.repeat(100) });

    const prompt = llm.prompts[0] ?? '';
    expect(prompt).toContain(`${'x'.repeat(40)}\n[... document truncated ...]`);
    expect(prompt).not.toContain('x'.repeat(41));
    expect(prompt).toContain('Return at most 2 invoice(s)');
  });

  it('retries a retryable failure', async () => {
    const llm = new ScriptedGroqClient([err(networkError('groq', 'socket hang up')), ok('{"invoices": []}')]);

    expect(await llm.extractInvoices(request)).toEqual({ ok: true, value: [] });
    expect(llm.prompts).toHaveLength(2);
  });

  it('returns the failure once retries are exhausted', async () => {
    const llm = new ScriptedGroqClient([
      err(upstreamError('groq', 'groq responded with 503', 503)),
      err(upstreamError('groq', 'groq responded with 503', 503)),
    ]);

    const result = await llm.extractInvoices(request);

    expect(!result.ok && result.error).toMatchObject({ kind: 'upstream', statusCode: 503 });
    expect(llm.prompts).toHaveLength(2);
  });

  it('rejects an answer that is not JSON', async () => {
    const llm = new ScriptedGroqClient([ok('I could not find an invoice.')]);

    const result = await llm.extractInvoices(request);

    expect(!result.ok && result.error).toMatchObject({
      kind: 'decode',
      message: 'Completion was not JSON: No JSON found in response',
    });
  });

  it('rejects JSON without an invoices array', async () => {
    const llm = new ScriptedGroqClient([ok('{"invoice_number": "INV-9"}')]);

    const result = await llm.extractInvoices(request);

    expect(!result.ok && result.error).toMatchObject({
      kind: 'decode',
      message: 'Completion did not match the invoice schema: invoices: Required',
    });
  });
});

describe('parseJsonFromResponse', () => {
  it('finds an object embedded in prose', () => {
    expect(parseJsonFromResponse('Result: {"invoices": []} done')).toEqual({ ok: true, value: { invoices: [] } });
  });

  it('reports a broken code block', () => {
    expect(parseJsonFromResponse('```json\n{"invoices": [}\n```')).toEqual({
      ok: false,
      error: 'Failed to parse JSON from code block',
    });
  });
});

describe('createGroqClient', () => {
  it('returns null without an API key', () => {
    expect(createGroqClient({ apiKey: null, model: 'm', temperature: 0, maxTokens: 100 })).toBeNull();
  });
});
