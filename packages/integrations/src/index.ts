// Mail search microservice
export {
  MailServiceClient,
  createMailServiceClient,
  decodeBase64,
  senderAddressOf,
  toMailMessage,
  type MailServiceClientOptions,
} from './mail-service/client.js';

// Groq LLM integration
export {
  GroqClient,
  createGroqClient,
  fromSdkError,
  parseJsonFromResponse,
  toInvoiceFields,
  type GroqClientOptions,
} from './groq/client.js';

// Attachment text decoding
export {
  DocumentReader,
  createDocumentReader,
  documentKindOf,
  type PdfParser,
  type PdfText,
} from './document/reader.js';
