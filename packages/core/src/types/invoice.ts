// Invoice extraction domain types

export const DocumentType = {
  INVOICE: 'invoice',
  RECEIPT: 'receipt',
  GENERAL: 'general',
} as const;
export type DocumentType = (typeof DocumentType)[keyof typeof DocumentType];

export const ExtractionMethod = {
  LLM: 'llm',
  REGEX: 'regex',
} as const;
export type ExtractionMethod = (typeof ExtractionMethod)[keyof typeof ExtractionMethod];

export interface LineItem {
  description: string | null;
  quantity: number | null;
  unitPrice: number | null;
  amount: number | null;
}

/** Fields read from one invoice. Absent values are null; dates are YYYY-MM-DD. */
export interface InvoiceFields {
  invoiceNumber: string | null;
  vendorName: string | null;
  vendorAddress: string | null;
  invoiceDate: string | null;
  dueDate: string | null;
  totalAmount: number | null;
  currency: string | null;
  taxAmount: number | null;
  subtotalAmount: number | null;
  lineItems: LineItem[];
  paymentTerms: string | null;
  purchaseOrderNumber: string | null;
  billToName: string | null;
  billToAddress: string | null;
  shipToName: string | null;
  shipToAddress: string | null;
  notes: string | null;
}

/** Maximum stored length of the bounded text fields. */
export const INVOICE_TEXT_LIMITS = {
  invoiceNumber: 100,
  vendorName: 255,
  currency: 10,
  paymentTerms: 255,
  purchaseOrderNumber: 100,
  billToName: 255,
  shipToName: 255,
} as const satisfies Partial<Record<keyof InvoiceFields, number>>;

/** Amounts are stored with 14 digits, 2 of them after the point. */
export const MAX_STORED_AMOUNT = 999_999_999_999.99;

export interface ExtractedInvoice extends InvoiceFields {
  /** 1-based position of the invoice within its attachment. */
  invoiceSequence: number;
  confidenceScore: number;
  extractionMethod: ExtractionMethod;
}

export interface InvoiceExtraction {
  documentType: DocumentType;
  method: ExtractionMethod;
  invoices: ExtractedInvoice[];
  /** Set when the LLM was configured but its answer could not be used. */
  fallbackReason?: string;
}

export function emptyInvoiceFields(): InvoiceFields {
  return {
    invoiceNumber: null,
    vendorName: null,
    vendorAddress: null,
    invoiceDate: null,
    dueDate: null,
    totalAmount: null,
    currency: null,
    taxAmount: null,
    subtotalAmount: null,
    lineItems: [],
    paymentTerms: null,
    purchaseOrderNumber: null,
    billToName: null,
    billToAddress: null,
    shipToName: null,
    shipToAddress: null,
    notes: null,
  };
}
