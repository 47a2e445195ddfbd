export { AttachmentRepository } from './attachment-repository.js';
export { InvoiceRepository, toInvoiceRow, fromInvoiceRow } from './invoice-repository.js';
export { AuditRepository } from './audit-repository.js';
