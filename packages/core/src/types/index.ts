export * from './mail.js';
export * from './invoice.js';
export * from './records.js';
