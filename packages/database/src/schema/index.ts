export * from './attachments.js';
export * from './invoices.js';
export * from './audit.js';
