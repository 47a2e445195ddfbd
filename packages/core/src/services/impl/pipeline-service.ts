import { type Result, ok, err, createLogger } from '@invoice-intake/utils';
import { DocumentKind, type Candidate, type ScoringResult, type SearchCriteria } from '../../types/mail.js';
import { ProcessingStatus, type AttachmentRecord } from '../../types/records.js';
import type { DocumentReaderPort, MailServicePort } from '../mail.js';
import type { IInvoiceExtractor } from '../extractor.js';
import type { AttachmentRecordStore, IInvoiceStorageService } from '../storage.js';
import {
  DEFAULT_INVOICE_EXTENSIONS,
  PipelineErrorCode,
  type BatchItem,
  type BatchSummary,
  type IAttachmentPipeline,
  type IMailQueryService,
  type PipelineError,
  type ProcessAllOptions,
  type ProcessingOutcome,
  type ProcessRecommendedOptions,
} from '../pipeline.js';

const logger = createLogger({ service: 'pipeline-service' });

export interface PipelineDependencies {
  mailQuery: IMailQueryService;
  mail: MailServicePort;
  reader: DocumentReaderPort;
  extractor: IInvoiceExtractor;
  storage: IInvoiceStorageService;
  attachmentRecords: AttachmentRecordStore;
}

export interface PipelineOptions {
  confidenceThreshold: number;
  invoiceExtensions?: readonly string[];
}

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot >= 0 ? filename.slice(dot + 1).toLowerCase() : '';
}

const storageFailure = (message: string): PipelineError => ({
  code: PipelineErrorCode.STORAGE_FAILED,
  message,
});

/**
 * Search, download, extract and store, for one attachment or a whole search.
 * Attachments that already have a record are skipped unless that record failed.
 */
export class AttachmentPipelineService implements IAttachmentPipeline {
  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {}

  search(criteria: SearchCriteria): Promise<Result<ScoringResult, PipelineError>> {
    return this.deps.mailQuery.findCandidates(criteria);
  }

  async processRecommended(
    criteria: SearchCriteria,
    options: ProcessRecommendedOptions = {}
  ): Promise<Result<ProcessingOutcome, PipelineError>> {
    const searched = await this.search(criteria);
    if (!searched.ok) return searched;

    const recommended = searched.value.recommended;
    if (!recommended) {
      return err({
        code: PipelineErrorCode.NO_CANDIDATES,
        message: 'No attachments matched the search criteria',
      });
    }

    if (options.requireHighConfidence && recommended.score < this.options.confidenceThreshold) {
      return err({
        code: PipelineErrorCode.LOW_CONFIDENCE,
        message: `Best candidate scored ${recommended.score.toFixed(2)}, below ${this.options.confidenceThreshold}`,
        details: { attachmentName: recommended.attachmentName, score: recommended.score },
      });
    }

    return this.processCandidate(recommended);
  }

  async processCandidate(candidate: Candidate): Promise<Result<ProcessingOutcome, PipelineError>> {
    const log = logger.child({ messageId: candidate.messageId, attachmentId: candidate.attachmentId });

    const existing = await this.deps.attachmentRecords.findBySource(candidate.messageId, candidate.attachmentId);
    if (!existing.ok) {
      return err(storageFailure(`Failed to look up attachment record: ${existing.error.message}`));
    }
    if (existing.value && existing.value.processingStatus !== ProcessingStatus.FAILED) {
      log.info({ attachmentRecordId: existing.value.id }, 'Attachment already processed; skipping');
      return ok({ status: 'skipped', candidate, record: existing.value, reason: 'already processed' });
    }

    const downloaded = await this.deps.mail.download(candidate.messageId, candidate.attachmentId);
    if (!downloaded.ok) {
      const failure = downloaded.error;
      log.error({ kind: failure.kind, error: failure.message }, 'Attachment download failed');
      return err({
        code: PipelineErrorCode.DOWNLOAD_FAILED,
        message: failure.message,
        kind: failure.kind,
        details: { statusCode: failure.statusCode },
      });
    }

    const recorded = await this.deps.storage.recordAttachment(candidate, downloaded.value);
    if (!recorded.ok) return err(storageFailure(recorded.error.message));
    const record = recorded.value;

    const document = await this.deps.reader.read(downloaded.value);
    if (!document.ok) {
      return this.fail(record, {
        code: PipelineErrorCode.DECODE_FAILED,
        message: document.error.message,
        kind: document.error.kind,
      });
    }
    if (document.value.kind === DocumentKind.UNSUPPORTED) {
      return this.fail(record, {
        code: PipelineErrorCode.DECODE_FAILED,
        message: `No text can be read from ${record.attachmentName} (${record.contentType})`,
      });
    }

    const extracted = await this.deps.extractor.extract(document.value.text, { filename: record.attachmentName });
    if (!extracted.ok) {
      return this.fail(record, {
        code: PipelineErrorCode.EXTRACTION_FAILED,
        message: extracted.error.message,
        details: { extractionCode: extracted.error.code },
      });
    }

    const stored = await this.deps.storage.storeInvoices(record, extracted.value);
    if (!stored.ok) {
      return this.fail(record, storageFailure(stored.error.message));
    }

    log.info(
      {
        attachmentRecordId: record.id,
        invoiceCount: stored.value.invoices.length,
        method: extracted.value.method,
      },
      'Attachment processed'
    );

    return ok({
      status: 'processed',
      candidate,
      record: stored.value.record,
      invoices: stored.value.invoices,
      documentType: extracted.value.documentType,
      extractionMethod: extracted.value.method,
    });
  }

  async processAll(
    criteria: SearchCriteria,
    options: ProcessAllOptions = {}
  ): Promise<Result<BatchSummary, PipelineError>> {
    const searched = await this.search(criteria);
    if (!searched.ok) return searched;

    const extensions = new Set(
      (options.extensions ?? this.options.invoiceExtensions ?? DEFAULT_INVOICE_EXTENSIONS).map((e) =>
        e.toLowerCase().replace(/^\./, '')
      )
    );

    const summary: BatchSummary = {
      totalCandidates: searched.value.totalCandidates,
      processed: 0,
      skipped: 0,
      failed: 0,
      outcomes: [],
    };

    // Sequential, one attachment at a time
    for (const candidate of searched.value.candidates) {
      const item: BatchItem = {
        messageId: candidate.messageId,
        attachmentId: candidate.attachmentId,
        attachmentName: candidate.attachmentName,
        score: candidate.score,
        status: 'skipped',
      };

      if (!extensions.has(fileExtension(candidate.attachmentName))) {
        item.reason = 'not an invoice file type';
        summary.skipped++;
        summary.outcomes.push(item);
        continue;
      }

      const result = await this.processCandidate(candidate);
      if (!result.ok) {
        item.status = 'failed';
        item.error = result.error;
        summary.failed++;
      } else if (result.value.status === 'skipped') {
        item.reason = result.value.reason;
        item.attachmentRecordId = result.value.record.id;
        summary.skipped++;
      } else {
        item.status = 'processed';
        item.attachmentRecordId = result.value.record.id;
        item.invoiceCount = result.value.invoices.length;
        summary.processed++;
      }
      summary.outcomes.push(item);
    }

    logger.info(
      {
        totalCandidates: summary.totalCandidates,
        processed: summary.processed,
        skipped: summary.skipped,
        failed: summary.failed,
      },
      'Batch processing finished'
    );
    return ok(summary);
  }

  private async fail(
    record: AttachmentRecord,
    error: PipelineError
  ): Promise<Result<ProcessingOutcome, PipelineError>> {
    const marked = await this.deps.storage.markFailed(record, error.message);
    if (!marked.ok) {
      logger.error(
        { attachmentRecordId: record.id, error: marked.error.message },
        'Could not mark attachment record as failed'
      );
      return err({ ...error, details: { ...error.details, markFailedError: marked.error.message } });
    }
    return err({ ...error, details: { ...error.details, attachmentRecordId: record.id } });
  }
}

export function createAttachmentPipeline(
  deps: PipelineDependencies,
  options: PipelineOptions
): AttachmentPipelineService {
  return new AttachmentPipelineService(deps, options);
}
