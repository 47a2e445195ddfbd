import { type Result, ok, err, createLogger } from '@invoice-intake/utils';
import {
  ExtractionMethod,
  type ExtractedInvoice,
  type InvoiceExtraction,
  type InvoiceFields,
} from '../../types/invoice.js';
import {
  ExtractionErrorCode,
  type ExtractionError,
  type ExtractorOptions,
  type IInvoiceExtractor,
  type InvoiceLlm,
} from '../extractor.js';
import { detectDocumentType, extractWithPatterns } from './pattern-extractor.js';

const logger = createLogger({ service: 'extractor-service' });

const DEFAULT_LLM_CONFIDENCE = 0.9;

/**
 * Extracts invoices from document text. Asks the LLM when one is configured
 * and falls back to the pattern extractor when it is not or when the call fails.
 */
export class InvoiceExtractorService implements IInvoiceExtractor {
  constructor(
    private readonly llm: InvoiceLlm | null,
    private readonly options: ExtractorOptions
  ) {}

  async extract(
    text: string,
    context: { filename: string }
  ): Promise<Result<InvoiceExtraction, ExtractionError>> {
    if (text.trim() === '') {
      return err({
        code: ExtractionErrorCode.INVALID_INPUT,
        message: 'Document has no text to extract from',
        details: { filename: context.filename },
      });
    }

    if (!this.llm) {
      return ok(this.extractWithPatterns(text, context.filename));
    }

    const maxInvoices = this.options.maxInvoicesPerAttachment;
    const llmResult = await this.llm.extractInvoices({ text, filename: context.filename, maxInvoices });

    if (llmResult.ok) {
      const invoices = this.stampLlmInvoices(llmResult.value);
      if (llmResult.value.length > invoices.length) {
        logger.warn(
          { filename: context.filename, returned: llmResult.value.length, kept: invoices.length },
          'LLM returned more invoices than allowed; extra invoices dropped'
        );
      }
      return ok({
        documentType: detectDocumentType(text, context.filename),
        method: ExtractionMethod.LLM,
        invoices,
      });
    }

    const failure = llmResult.error;
    if (this.options.patternFallback === false) {
      return err({
        code: ExtractionErrorCode.LLM_ERROR,
        message: failure.message,
        details: { kind: failure.kind, retryable: failure.retryable },
      });
    }

    logger.warn(
      { filename: context.filename, kind: failure.kind, error: failure.message },
      'LLM extraction failed, using pattern extraction'
    );
    return ok({ ...this.extractWithPatterns(text, context.filename), fallbackReason: failure.message });
  }

  private stampLlmInvoices(fields: InvoiceFields[]): ExtractedInvoice[] {
    const confidence = this.options.llmConfidence ?? DEFAULT_LLM_CONFIDENCE;
    return fields.slice(0, this.options.maxInvoicesPerAttachment).map((invoice, index) => ({
      ...invoice,
      invoiceSequence: index + 1,
      confidenceScore: confidence,
      extractionMethod: ExtractionMethod.LLM,
    }));
  }

  private extractWithPatterns(text: string, filename: string): InvoiceExtraction {
    const { documentType, invoice, keyFieldsFound } = extractWithPatterns(text, filename);
    logger.debug({ filename, documentType, keyFieldsFound }, 'Pattern extraction finished');
    return {
      documentType,
      method: ExtractionMethod.REGEX,
      invoices: invoice ? [invoice] : [],
    };
  }
}

export function createInvoiceExtractor(llm: InvoiceLlm | null, options: ExtractorOptions): InvoiceExtractorService {
  return new InvoiceExtractorService(llm, options);
}
