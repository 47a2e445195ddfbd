// Mailbox search and scoring domain types

export interface SearchCriteria {
  senderEmail?: string | null;
  subjectContains?: string | null;
  /** Plain filename, or a JSON object such as `{"filename": "invoice.pdf"}`. */
  attachmentNameHint?: string | null;
  daysBack?: number | null;
}

export interface MailAttachment {
  id: string;
  name: string;
  contentType: string;
  sizeBytes: number;
}

export interface MailMessage {
  id: string;
  subject: string;
  senderAddress: string;
  receivedAt: Date | null;
  attachments: MailAttachment[];
}

export interface Candidate {
  messageId: string;
  attachmentId: string;
  attachmentName: string;
  messageSubject: string;
  senderAddress: string;
  receivedAt: Date | null;
  sizeBytes: number;
  contentType: string;
  score: number;
  reasons: string[];
}

export interface ScoringResult {
  candidates: Candidate[];
  recommended: Candidate | null;
  totalCandidates: number;
  highConfidenceCount: number;
}

export interface DownloadedAttachment {
  messageId: string;
  attachmentId: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  content: Buffer;
}

export const DocumentKind = {
  PDF: 'pdf',
  TEXT: 'text',
  JSON: 'json',
  UNSUPPORTED: 'unsupported',
} as const;
export type DocumentKind = (typeof DocumentKind)[keyof typeof DocumentKind];

export interface DocumentText {
  kind: DocumentKind;
  text: string;
  pageCount?: number;
}
