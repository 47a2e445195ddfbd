// Service interfaces
export * from './scorer.js';
export * from './mail.js';
export * from './extractor.js';
export * from './storage.js';
export * from './pipeline.js';

// Service implementations
export * from './impl/index.js';
