import {
  DocumentType,
  ExtractionMethod,
  emptyInvoiceFields,
  type ExtractedInvoice,
} from '../../types/invoice.js';

const INVOICE_KEYWORDS = ['invoice', 'bill', 'payment due', 'amount due', 'inv#'];
const RECEIPT_KEYWORDS = ['receipt', 'purchase', 'transaction', 'store', 'merchant'];

const DATE = String.raw`([0-9]{1,2}[/-][0-9]{1,2}[/-][0-9]{2,4})`;
const AMOUNT = String.raw`\$?\s*([0-9][0-9,]*(?:\.[0-9]+)?)`;
const NAME = String.raw`([A-Za-z][A-Za-z &.,]*?)[ \t]*$`;

type PatternField = 'invoiceNumber' | 'amount' | 'date' | 'vendor';

const PATTERNS: Record<'invoice' | 'receipt', Partial<Record<PatternField, RegExp[]>>> = {
  invoice: {
    invoiceNumber: [
      /invoice\s*(?:no\.?|number|#)?\s*:?\s*([A-Z0-9_-]+)/gi,
      /\binv\s*#?\s*:?\s*([A-Z0-9_-]+)/gi,
      /\bbill\s*#?\s*:?\s*([A-Z0-9_-]+)/gi,
    ],
    amount: [
      new RegExp(String.raw`\btotal\s*(?:due)?\s*:?\s*${AMOUNT}`, 'gi'),
      new RegExp(String.raw`\bamount\s*(?:due)?\s*:?\s*${AMOUNT}`, 'gi'),
      new RegExp(String.raw`\bdue\s*:?\s*${AMOUNT}`, 'gi'),
    ],
    date: [
      new RegExp(String.raw`invoice\s*date\s*:?\s*${DATE}`, 'gi'),
      new RegExp(String.raw`\bdate\s*:?\s*${DATE}`, 'gi'),
      new RegExp(DATE, 'g'),
    ],
    vendor: [
      new RegExp(String.raw`^[ \t]*(?:bill\s*from|vendor|from)[ \t]*:?[ \t]*${NAME}`, 'gim'),
    ],
  },
  receipt: {
    vendor: [
      new RegExp(String.raw`^[ \t]*(?:store|merchant)[ \t]*:[ \t]*${NAME}`, 'gim'),
      new RegExp(String.raw`^[ \t]*${NAME}`, 'gm'),
    ],
    amount: [
      new RegExp(String.raw`\btotal\s*:?\s*${AMOUNT}`, 'gi'),
      new RegExp(String.raw`\bamount\s*:?\s*${AMOUNT}`, 'gi'),
    ],
    date: [new RegExp(String.raw`\bdate\s*:?\s*${DATE}`, 'gi'), new RegExp(DATE, 'g')],
  },
};

// Matched fields that count towards confidence
const KEY_FIELD_COUNT = 6;

const CURRENCY_SYMBOLS: Record<string, string> = {
  $: 'USD',
  '€': 'EUR',
  '£': 'GBP',
  '¥': 'JPY',
};

export function detectDocumentType(text: string, filename = ''): DocumentType {
  const haystacks = [text.toLowerCase(), filename.toLowerCase()];
  const mentions = (keywords: string[]) =>
    keywords.some((keyword) => haystacks.some((h) => h.includes(keyword)));

  if (mentions(INVOICE_KEYWORDS)) return DocumentType.INVOICE;
  if (mentions(RECEIPT_KEYWORDS)) return DocumentType.RECEIPT;
  return DocumentType.GENERAL;
}

/** Parses "1,250.00" style amounts; null when nothing numeric remains. */
export function parseAmount(raw: string): number | null {
  const cleaned = raw.replace(/,/g, '');
  if (!/^\d+(\.\d+)?$/.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

function calendarDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date.toISOString().slice(0, 10);
}

/** Converts YYYY-MM-DD, M/D/YY(YY) or M-D-YY(YY) to YYYY-MM-DD; null for impossible dates. */
export function normalizeDate(raw: string): string | null {
  const value = raw.trim();

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (iso) return calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const match = /^(\d{1,2})[/-](\d{1,2})[/-](\d{2}|\d{4})$/.exec(value);
  if (!match) return null;
  const [, m, d, y] = match;
  const year = y !== undefined && y.length === 2 ? 2000 + Number(y) : Number(y);
  return calendarDate(year, Number(m), Number(d));
}

export function detectCurrency(text: string): string | null {
  const symbol = Object.keys(CURRENCY_SYMBOLS).find((s) => text.includes(s));
  return symbol === undefined ? null : (CURRENCY_SYMBOLS[symbol] ?? null);
}

function firstMatch(text: string, patterns: RegExp[] | undefined, accept: (value: string) => boolean): string | null {
  for (const pattern of patterns ?? []) {
    // Restart one character after a rejected match so overlapping candidates are still tried
    const re = new RegExp(pattern.source, pattern.flags);
    let match: RegExpExecArray | null;
    while ((match = re.exec(text)) !== null) {
      const value = match[1]?.trim();
      if (value && accept(value)) return value;
      re.lastIndex = match.index + 1;
    }
  }
  return null;
}

export interface PatternExtraction {
  documentType: DocumentType;
  invoice: ExtractedInvoice | null;
  keyFieldsFound: number;
  confidence: number;
}

/**
 * Pulls invoice number, total, date and vendor out of plain text with
 * per-document-type patterns. Produces no invoice when no key field matches.
 */
export function extractWithPatterns(text: string, filename = ''): PatternExtraction {
  const documentType = detectDocumentType(text, filename);
  const patterns: Partial<Record<PatternField, RegExp[]>> =
    documentType === DocumentType.GENERAL ? {} : PATTERNS[documentType];

  const invoiceNumber = firstMatch(text, patterns.invoiceNumber, (v) => /\d/.test(v));
  const amountRaw = firstMatch(text, patterns.amount, (v) => parseAmount(v) !== null);
  const dateRaw = firstMatch(text, patterns.date, (v) => normalizeDate(v) !== null);
  const vendor = firstMatch(text, patterns.vendor, (v) => /[A-Za-z]{2,}/.test(v));

  const keyFieldsFound = [invoiceNumber, amountRaw, dateRaw, vendor].filter((v) => v !== null).length;
  const hasDigits = /\d/.test(text);
  const currency = detectCurrency(text);
  const confidence =
    (20 + (keyFieldsFound / KEY_FIELD_COUNT) * 60 + (hasDigits ? 10 : 0) + (currency ? 10 : 0)) / 100;

  if (keyFieldsFound === 0) {
    return { documentType, invoice: null, keyFieldsFound, confidence };
  }

  return {
    documentType,
    keyFieldsFound,
    confidence,
    invoice: {
      ...emptyInvoiceFields(),
      invoiceNumber,
      vendorName: vendor ? vendor.replace(/[ ,]+$/, '') : null,
      invoiceDate: dateRaw ? normalizeDate(dateRaw) : null,
      totalAmount: amountRaw ? parseAmount(amountRaw) : null,
      currency,
      invoiceSequence: 1,
      confidenceScore: Math.min(1, confidence),
      extractionMethod: ExtractionMethod.REGEX,
    },
  };
}
