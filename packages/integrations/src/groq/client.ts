import Groq from 'groq-sdk';
import { z } from 'zod';
import {
  ok,
  err,
  type Result,
  type ServiceError,
  type BackoffOptions,
  type CircuitBreaker,
  withRetry,
  retryPresets,
  createCircuitBreaker,
  circuitBreakerPresets,
  isCircuitOpenError,
  isServiceError,
  networkError,
  decodeError,
  upstreamError,
  fromHttpStatus,
  toError,
  tryCatch,
  tryCatchAsync,
  createLogger,
} from '@invoice-intake/utils';
import type { AppConfig } from '@invoice-intake/config';
import { normalizeDate, type InvoiceFields, type InvoiceLlm, type LlmExtractionRequest } from '@invoice-intake/core';

const SERVICE = 'groq';
const logger = createLogger({ service: 'groq-client' });

const DEFAULT_MAX_INPUT_CHARS = 12_000;

// LLM output schema. Models are loose with types, so values are coerced
// and anything unusable becomes null rather than failing the whole answer.

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    return s === '' ? null : s;
  });

const amount = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    if (typeof v === 'number') return Number.isFinite(v) ? v : null;
    if (typeof v !== 'string') return null;
    const cleaned = v.replace(/[^0-9.-]/g, '');
    if (cleaned === '') return null;
    const n = Number(cleaned);
    return Number.isFinite(n) ? n : null;
  });

const date = text.transform((v) => (v === null ? null : normalizeDate(v)));

const LineItemSchema = z.object({
  description: text,
  quantity: amount,
  unit_price: amount,
  amount: amount,
});

const InvoiceOutputSchema = z.object({
  invoice_number: text,
  vendor_name: text,
  vendor_address: text,
  invoice_date: date,
  due_date: date,
  total_amount: amount,
  currency: text,
  tax_amount: amount,
  subtotal_amount: amount,
  line_items: z.array(LineItemSchema).nullish(),
  payment_terms: text,
  purchase_order_number: text,
  bill_to_name: text,
  bill_to_address: text,
  ship_to_name: text,
  ship_to_address: text,
  notes: text,
});

const ExtractionOutputSchema = z.object({
  invoices: z.array(InvoiceOutputSchema),
});

type InvoiceOutput = z.infer<typeof InvoiceOutputSchema>;

export function toInvoiceFields(output: InvoiceOutput): InvoiceFields {
  return {
    invoiceNumber: output.invoice_number,
    vendorName: output.vendor_name,
    vendorAddress: output.vendor_address,
    invoiceDate: output.invoice_date,
    dueDate: output.due_date,
    totalAmount: output.total_amount,
    currency: output.currency ? output.currency.toUpperCase() : null,
    taxAmount: output.tax_amount,
    subtotalAmount: output.subtotal_amount,
    lineItems: (output.line_items ?? []).map((item) => ({
      description: item.description,
      quantity: item.quantity,
      unitPrice: item.unit_price,
      amount: item.amount,
    })),
    paymentTerms: output.payment_terms,
    purchaseOrderNumber: output.purchase_order_number,
    billToName: output.bill_to_name,
    billToAddress: output.bill_to_address,
    shipToName: output.ship_to_name,
    shipToAddress: output.ship_to_address,
    notes: output.notes,
  };
}

const parseJson = (candidate: string): Result<unknown, string> =>
  tryCatch((): unknown => JSON.parse(candidate), (thrown) => toError(thrown).message);

/** Accepts bare JSON, a fenced code block, or JSON embedded in prose. */
export function parseJsonFromResponse(content: string): Result<unknown, string> {
  const direct = parseJson(content.trim());
  if (direct.ok) return direct;

  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content)?.[1];
  if (fenced) {
    const parsed = parseJson(fenced.trim());
    return parsed.ok ? parsed : err('Failed to parse JSON from code block');
  }

  const object = /\{[\s\S]*\}/.exec(content)?.[0];
  if (object) {
    const parsed = parseJson(object);
    return parsed.ok ? parsed : err('Failed to parse JSON object from text');
  }

  return err('No JSON found in response');
}

/** Maps SDK exceptions onto the shared failure kinds. */
export function fromSdkError(thrown: unknown): ServiceError {
  if (thrown instanceof Groq.APIConnectionTimeoutError) {
    return networkError(SERVICE, 'Completion request timed out', thrown);
  }
  if (thrown instanceof Groq.APIConnectionError) {
    return networkError(SERVICE, `Could not reach Groq: ${thrown.message}`, thrown);
  }
  if (thrown instanceof Groq.APIError && typeof thrown.status === 'number') {
    return fromHttpStatus(SERVICE, thrown.status, thrown.message);
  }
  return upstreamError(SERVICE, toError(thrown).message);
}

export interface GroqClientOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs?: number;
  /** Document text beyond this many characters is not sent. */
  maxInputChars?: number;
  retry?: Partial<BackoffOptions>;
  circuitBreaker?: CircuitBreaker;
}

/**
 * Invoice field extraction through Groq chat completions. The model is asked
 * for a JSON object `{ "invoices": [...] }`, which is validated and mapped to
 * InvoiceFields.
 */
export class GroqClient implements InvoiceLlm {
  private readonly client: Groq;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(protected readonly options: GroqClientOptions) {
    this.client = new Groq({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? 60_000,
      // retries happen in withRetry so they are logged and counted by the breaker
      maxRetries: 0,
    });
    this.circuitBreaker =
      options.circuitBreaker ??
      createCircuitBreaker('groq', {
        ...circuitBreakerPresets.groq,
        isFailure: (error) => isServiceError(error) && error.retryable,
      });
  }

  async extractInvoices(request: LlmExtractionRequest): Promise<Result<InvoiceFields[], ServiceError>> {
    const prompt = this.buildExtractionPrompt(request);

    const completion = await this.circuitBreaker.execute(() =>
      withRetry(() => this.complete(prompt), {
        ...retryPresets.llm,
        ...this.options.retry,
        shouldRetry: (error: ServiceError) => error.retryable,
        onRetry: (attempt, error, delayMs) =>
          logger.warn({ attempt, delayMs, kind: error.kind, error: error.message }, 'Retrying completion'),
      })
    );
    if (!completion.ok) {
      const failure = completion.error;
      return err(isCircuitOpenError(failure) ? upstreamError(SERVICE, failure.message) : failure);
    }

    const parsed = parseJsonFromResponse(completion.value);
    if (!parsed.ok) {
      return err(decodeError(SERVICE, `Completion was not JSON: ${parsed.error}`));
    }

    const validated = ExtractionOutputSchema.safeParse(parsed.value);
    if (!validated.success) {
      const issues = validated.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      return err(decodeError(SERVICE, `Completion did not match the invoice schema: ${issues}`));
    }

    const invoices = validated.data.invoices.map(toInvoiceFields);
    logger.debug({ filename: request.filename, invoiceCount: invoices.length }, 'Invoices extracted by LLM');
    return ok(invoices);
  }

  /** One chat completion round trip; returns the message content. */
  protected async complete(prompt: string): Promise<Result<string, ServiceError>> {
    const response = await tryCatchAsync(
      () =>
        this.client.chat.completions.create({
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          response_format: { type: 'json_object' },
          messages: [{ role: 'user', content: prompt }],
        }),
      fromSdkError
    );
    if (!response.ok) return response;

    const content = response.value.choices[0]?.message?.content;
    if (!content) {
      return err(decodeError(SERVICE, 'No content in completion'));
    }
    return ok(content);
  }

  protected buildExtractionPrompt(request: LlmExtractionRequest): string {
    const limit = this.options.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
    const body =
      request.text.length > limit ? `${request.text.slice(0, limit)}\n[... document truncated ...]` : request.text;

    return `You are an expert bookkeeper assistant. Extract invoice data from this document.

Filename: ${request.filename}

Document text:
${body}

The document may contain more than one invoice. Return at most ${request.maxInvoices} invoice(s), in the order they appear.

Respond with ONLY a JSON object (no markdown, no explanation) matching this schema:
{
  "invoices": [
    {
      "invoice_number": "string|null",
      "vendor_name": "string|null",
      "vendor_address": "string|null",
      "invoice_date": "YYYY-MM-DD|null",
      "due_date": "YYYY-MM-DD|null",
      "total_amount": number|null,
      "currency": "ISO 4217 code|null",
      "tax_amount": number|null,
      "subtotal_amount": number|null,
      "line_items": [{"description": "string|null", "quantity": number|null, "unit_price": number|null, "amount": number|null}],
      "payment_terms": "string|null",
      "purchase_order_number": "string|null",
      "bill_to_name": "string|null",
      "bill_to_address": "string|null",
      "ship_to_name": "string|null",
      "ship_to_address": "string|null",
      "notes": "string|null"
    }
  ]
}

Important:
- Use null for anything not present in the document; do not guess
- Amounts are plain numbers without currency symbols or thousands separators
- Use ISO format for dates (YYYY-MM-DD)
- Return {"invoices": []} when the document contains no invoice`;
  }
}

/** Null when no API key is configured, so extraction runs on patterns alone. */
export function createGroqClient(config: AppConfig['llm']): GroqClient | null {
  if (!config.apiKey) return null;
  return new GroqClient({
    apiKey: config.apiKey,
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  });
}
