import type { Result, ServiceError } from '@invoice-intake/utils';
import type { InvoiceExtraction, InvoiceFields } from '../types/invoice.js';

export const ExtractionErrorCode = {
  INVALID_INPUT: 'INVALID_INPUT',
  LLM_ERROR: 'LLM_ERROR',
} as const;
export type ExtractionErrorCode = (typeof ExtractionErrorCode)[keyof typeof ExtractionErrorCode];

export interface ExtractionError {
  code: ExtractionErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface LlmExtractionRequest {
  text: string;
  filename: string;
  maxInvoices: number;
}

// Port implemented by the LLM client
export interface InvoiceLlm {
  extractInvoices(request: LlmExtractionRequest): Promise<Result<InvoiceFields[], ServiceError>>;
}

export interface IInvoiceExtractor {
  extract(
    text: string,
    context: { filename: string }
  ): Promise<Result<InvoiceExtraction, ExtractionError>>;
}

export interface ExtractorOptions {
  maxInvoicesPerAttachment: number;
  /** Use the pattern extractor when the LLM call fails. Defaults to true. */
  patternFallback?: boolean;
  /** Confidence stamped on LLM-extracted invoices. */
  llmConfidence?: number;
}
