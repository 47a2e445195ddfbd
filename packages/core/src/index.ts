export * from './types/index.js';
export * from './services/index.js';
