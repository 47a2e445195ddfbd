import { createRequire } from 'node:module';
import { ok, err, type Result, type DecodeError, decodeError, toError, tryCatch, createLogger } from '@invoice-intake/utils';
import { DocumentKind, type DocumentText, type DocumentReaderPort, type DownloadedAttachment } from '@invoice-intake/core';

const SERVICE = 'document-reader';
const logger = createLogger({ service: SERVICE });

export interface PdfText {
  text: string;
  numpages: number;
}

export type PdfParser = (data: Buffer) => Promise<PdfText>;

const EXTENSION_KINDS: Record<string, DocumentKind> = {
  pdf: DocumentKind.PDF,
  txt: DocumentKind.TEXT,
  csv: DocumentKind.TEXT,
  json: DocumentKind.JSON,
};

// The package entry point runs a self-test when loaded without a parent
// module, so the library file is required directly.
function loadPdfParse(): PdfParser {
  const require = createRequire(import.meta.url);
  const pdfParse: PdfParser = require('pdf-parse/lib/pdf-parse.js');
  return pdfParse;
}

export function documentKindOf(filename: string, contentType: string): DocumentKind {
  const dot = filename.lastIndexOf('.');
  const extension = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : '';
  const byExtension = EXTENSION_KINDS[extension];
  if (byExtension) return byExtension;

  const type = contentType.toLowerCase();
  if (type.includes('pdf')) return DocumentKind.PDF;
  if (type.includes('json')) return DocumentKind.JSON;
  if (type.startsWith('text/')) return DocumentKind.TEXT;
  return DocumentKind.UNSUPPORTED;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Turns a downloaded attachment into plain text for extraction. Images and
 * other binary formats come back as `unsupported`; there is no OCR.
 */
export class DocumentReader implements DocumentReaderPort {
  private parsePdf: PdfParser | undefined;

  constructor(options: { parsePdf?: PdfParser } = {}) {
    this.parsePdf = options.parsePdf;
  }

  async read(download: DownloadedAttachment): Promise<Result<DocumentText, DecodeError>> {
    const kind = documentKindOf(download.filename, download.contentType);

    switch (kind) {
      case DocumentKind.PDF:
        return this.readPdf(download);
      case DocumentKind.TEXT:
        return this.decodeText(download);
      case DocumentKind.JSON:
        return this.readJson(download);
      default:
        logger.debug({ filename: download.filename, contentType: download.contentType }, 'No reader for attachment');
        return ok({ kind: DocumentKind.UNSUPPORTED, text: '' });
    }
  }

  private decodeText(download: DownloadedAttachment): Result<DocumentText, DecodeError> {
    return tryCatch(
      () => ({ kind: DocumentKind.TEXT, text: utf8.decode(download.content) }),
      (thrown) => decodeError(SERVICE, `${download.filename} is not valid UTF-8 text`, thrown)
    );
  }

  private readJson(download: DownloadedAttachment): Result<DocumentText, DecodeError> {
    const decoded = this.decodeText(download);
    if (!decoded.ok) return decoded;

    return tryCatch(
      () => ({ kind: DocumentKind.JSON, text: JSON.stringify(JSON.parse(decoded.value.text), null, 2) }),
      (thrown) => decodeError(SERVICE, `${download.filename} is not valid JSON: ${toError(thrown).message}`, thrown)
    );
  }

  private async readPdf(download: DownloadedAttachment): Promise<Result<DocumentText, DecodeError>> {
    this.parsePdf ??= loadPdfParse();
    const parse = this.parsePdf;

    let parsed: PdfText;
    try {
      parsed = await parse(download.content);
    } catch (thrown) {
      return err(decodeError(SERVICE, `Could not read PDF ${download.filename}: ${toError(thrown).message}`, thrown));
    }

    const text = parsed.text.trim();
    // A PDF with no text layer is a scan; treat it like an image
    if (text === '') {
      return ok({ kind: DocumentKind.UNSUPPORTED, text: '', pageCount: parsed.numpages });
    }
    return ok({ kind: DocumentKind.PDF, text, pageCount: parsed.numpages });
  }
}

export function createDocumentReader(): DocumentReader {
  return new DocumentReader();
}
