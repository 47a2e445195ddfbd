import type { Result, ServiceErrorKind } from '@invoice-intake/utils';
import type { Candidate, ScoringResult, SearchCriteria } from '../types/mail.js';
import type { AttachmentRecord, InvoiceRecord } from '../types/records.js';
import type { DocumentType, ExtractionMethod } from '../types/invoice.js';

export const PipelineErrorCode = {
  SEARCH_FAILED: 'SEARCH_FAILED',
  DOWNLOAD_FAILED: 'DOWNLOAD_FAILED',
  DECODE_FAILED: 'DECODE_FAILED',
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',
  STORAGE_FAILED: 'STORAGE_FAILED',
  NO_CANDIDATES: 'NO_CANDIDATES',
  LOW_CONFIDENCE: 'LOW_CONFIDENCE',
  NOT_FOUND: 'NOT_FOUND',
} as const;
export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

export interface PipelineError {
  code: PipelineErrorCode;
  message: string;
  /** Collaborator failure kind, when a collaborator caused the error. */
  kind?: ServiceErrorKind;
  details?: Record<string, unknown>;
}

export interface IMailQueryService {
  findCandidates(criteria: SearchCriteria): Promise<Result<ScoringResult, PipelineError>>;
}

export interface ProcessedAttachment {
  status: 'processed';
  candidate: Candidate;
  record: AttachmentRecord;
  invoices: InvoiceRecord[];
  documentType: DocumentType;
  extractionMethod: ExtractionMethod;
}

export interface SkippedAttachment {
  status: 'skipped';
  candidate: Candidate;
  record: AttachmentRecord;
  reason: string;
}

export type ProcessingOutcome = ProcessedAttachment | SkippedAttachment;

export interface BatchItem {
  messageId: string;
  attachmentId: string;
  attachmentName: string;
  score: number;
  status: 'processed' | 'skipped' | 'failed';
  reason?: string;
  attachmentRecordId?: string;
  invoiceCount?: number;
  error?: PipelineError;
}

export interface BatchSummary {
  totalCandidates: number;
  processed: number;
  skipped: number;
  failed: number;
  outcomes: BatchItem[];
}

export interface ProcessRecommendedOptions {
  requireHighConfidence?: boolean;
}

export interface ProcessAllOptions {
  /** Lower-case filename extensions without the dot. */
  extensions?: readonly string[];
}

export interface IAttachmentPipeline {
  search(criteria: SearchCriteria): Promise<Result<ScoringResult, PipelineError>>;
  processRecommended(
    criteria: SearchCriteria,
    options?: ProcessRecommendedOptions
  ): Promise<Result<ProcessingOutcome, PipelineError>>;
  processCandidate(candidate: Candidate): Promise<Result<ProcessingOutcome, PipelineError>>;
  processAll(criteria: SearchCriteria, options?: ProcessAllOptions): Promise<Result<BatchSummary, PipelineError>>;
}

// Formats the document reader turns into text
export const DEFAULT_INVOICE_EXTENSIONS: readonly string[] = ['pdf', 'txt', 'csv', 'json'];
