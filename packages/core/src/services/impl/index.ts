export {
  AttachmentScorerService,
  createAttachmentScorer,
  scoreMessage,
  scoreAttachment,
  normalizeSenderTarget,
  unwrapFilenameHint,
  effectiveDaysBack,
  ageInDays,
  type SubScore,
} from './scorer-service.js';
export {
  extractWithPatterns,
  detectDocumentType,
  detectCurrency,
  normalizeDate,
  parseAmount,
  type PatternExtraction,
} from './pattern-extractor.js';
export { InvoiceExtractorService, createInvoiceExtractor } from './extractor-service.js';
export {
  MailQueryService,
  prepareMessages,
  toSearchQuery,
  type MailQueryOptions,
} from './mail-query-service.js';
export { InvoiceStorageService, createInvoiceStorageService, fitToColumns, sha256 } from './storage-service.js';
export {
  AttachmentPipelineService,
  createAttachmentPipeline,
  fileExtension,
  type PipelineDependencies,
  type PipelineOptions,
} from './pipeline-service.js';
