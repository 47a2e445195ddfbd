import type { Result, ServiceError, DecodeError } from '@invoice-intake/utils';
import type { DocumentText, DownloadedAttachment, MailMessage } from '../types/mail.js';

export interface MailSearchQuery {
  daysBack: number;
  top: number;
  senderEmail?: string;
  subjectContains?: string;
}

// Port implemented by the mail microservice client
export interface MailServicePort {
  search(query: MailSearchQuery): Promise<Result<MailMessage[], ServiceError>>;
  download(messageId: string, attachmentId: string): Promise<Result<DownloadedAttachment, ServiceError>>;
}

// Port implemented by the document text reader
export interface DocumentReaderPort {
  read(download: DownloadedAttachment): Promise<Result<DocumentText, DecodeError>>;
}
