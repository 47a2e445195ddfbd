import { z } from 'zod';
import {
  ok,
  err,
  type Result,
  type ServiceError,
  type BackoffOptions,
  type CircuitBreaker,
  type CircuitOpenError,
  withRetry,
  retryPresets,
  createCircuitBreaker,
  circuitBreakerPresets,
  isCircuitOpenError,
  networkError,
  decodeError,
  upstreamError,
  fromHttpStatus,
  isServiceError,
  tryCatchAsync,
  toError,
  createLogger,
} from '@invoice-intake/utils';
import type { AppConfig } from '@invoice-intake/config';
import type {
  DownloadedAttachment,
  MailMessage,
  MailSearchQuery,
  MailServicePort,
} from '@invoice-intake/core';

const SERVICE = 'mail-service';
const logger = createLogger({ service: 'mail-service-client' });

// v1 response shapes

const AddressSchema = z.union([
  z.string(),
  z.object({ emailAddress: z.object({ address: z.string().nullish() }) }).transform((v) => v.emailAddress.address),
]);

const AttachmentSchema = z.object({
  attachmentId: z.string().min(1),
  name: z.string().nullish(),
  contentType: z.string().nullish(),
  size: z.number().nonnegative().nullish(),
});

const MessageSchema = z.object({
  messageId: z.string().min(1),
  subject: z.string().nullish(),
  from: AddressSchema.nullish(),
  receivedAt: z.string().nullish(),
  hasAttachments: z.boolean().optional(),
  attachments: z.array(AttachmentSchema).nullish(),
});

const SearchResponseSchema = z.object({
  items: z.array(MessageSchema),
});

const DownloadResponseSchema = z.object({
  filename: z.string().min(1),
  content_type: z.string().nullish(),
  size: z.number().nonnegative().nullish(),
  content_base64: z.string(),
});

type ApiMessage = z.infer<typeof MessageSchema>;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export interface MailServiceClientOptions {
  baseUrl: string;
  apiKey: string;
  searchTimeoutMs: number;
  downloadTimeoutMs: number;
  retry?: Partial<BackoffOptions>;
  circuitBreaker?: CircuitBreaker;
  fetch?: typeof fetch;
}

/** "Jane <jane@acme.com>" and "jane@acme.com" both yield the bare address. */
export function senderAddressOf(from: string | null | undefined): string {
  const value = (from ?? '').trim();
  const bracketed = /<([^>]+)>/.exec(value);
  return (bracketed?.[1] ?? value).trim();
}

export function toMailMessage(item: ApiMessage): MailMessage {
  const received = item.receivedAt ? new Date(item.receivedAt) : null;
  return {
    id: item.messageId,
    subject: item.subject ?? '',
    senderAddress: senderAddressOf(item.from),
    receivedAt: received && !Number.isNaN(received.getTime()) ? received : null,
    attachments: (item.attachments ?? []).map((a) => ({
      id: a.attachmentId,
      name: a.name ?? '',
      contentType: a.contentType ?? '',
      sizeBytes: a.size ?? 0,
    })),
  };
}

export function decodeBase64(value: string): Result<Buffer, string> {
  const compact = value.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64.test(compact)) {
    return err('content_base64 is not valid base64');
  }
  return ok(Buffer.from(compact, 'base64'));
}

// AbortSignal.timeout rejects with a DOMException named TimeoutError
function transportError(path: string, timeoutMs: number, thrown: unknown): ServiceError {
  const error = toError(thrown);
  if (error.name === 'TimeoutError') {
    return networkError(SERVICE, `${path} timed out after ${timeoutMs}ms`, error);
  }
  return networkError(SERVICE, `${path} request failed: ${error.message}`, error);
}

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * REST client for the mail-search microservice: message search and
 * attachment download. Transport, status and payload failures come back
 * as typed ServiceErrors; retryable ones are retried, all go through a
 * circuit breaker.
 */
export class MailServiceClient implements MailServicePort {
  private readonly circuitBreaker: CircuitBreaker;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: MailServiceClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.circuitBreaker =
      options.circuitBreaker ??
      createCircuitBreaker('mail-service', {
        ...circuitBreakerPresets.mailService,
        isFailure: (error) => isServiceError(error) && error.retryable,
      });
  }

  async search(query: MailSearchQuery): Promise<Result<MailMessage[], ServiceError>> {
    const body: Record<string, unknown> = {
      days_back: query.daysBack,
      has_attachments: true,
      top: query.top,
    };
    if (query.senderEmail) body['sender_email'] = query.senderEmail;
    if (query.subjectContains) body['subject_contains'] = query.subjectContains;

    const response = await this.call('/search', body, SearchResponseSchema, this.options.searchTimeoutMs);
    if (!response.ok) return response;

    const messages = response.value.items.map(toMailMessage);
    logger.debug({ count: messages.length, daysBack: query.daysBack }, 'Mail search completed');
    return ok(messages);
  }

  async download(messageId: string, attachmentId: string): Promise<Result<DownloadedAttachment, ServiceError>> {
    const response = await this.call(
      '/download',
      { message_id: messageId, attachment_id: attachmentId },
      DownloadResponseSchema,
      this.options.downloadTimeoutMs
    );
    if (!response.ok) return response;

    const payload = response.value;
    const content = decodeBase64(payload.content_base64);
    if (!content.ok) {
      return err(decodeError(SERVICE, `Download of ${payload.filename}: ${content.error}`));
    }
    if (payload.size != null && payload.size !== content.value.length) {
      logger.warn(
        { messageId, attachmentId, reported: payload.size, decoded: content.value.length },
        'Downloaded size differs from reported size'
      );
    }

    return ok({
      messageId,
      attachmentId,
      filename: payload.filename,
      contentType: payload.content_type ?? 'application/octet-stream',
      sizeBytes: content.value.length,
      content: content.value,
    });
  }

  private async call<T>(
    path: string,
    body: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    timeoutMs: number
  ): Promise<Result<T, ServiceError>> {
    const result = await this.circuitBreaker.execute(() =>
      withRetry(() => this.post(path, body, schema, timeoutMs), {
        ...retryPresets.mailService,
        ...this.options.retry,
        shouldRetry: (error: ServiceError) => error.retryable,
        onRetry: (attempt, error, delayMs) =>
          logger.warn({ path, attempt, delayMs, kind: error.kind, error: error.message }, 'Retrying mail service call'),
      })
    );
    if (!result.ok) return err(this.toServiceError(result.error));
    return result;
  }

  private toServiceError(error: ServiceError | CircuitOpenError): ServiceError {
    return isCircuitOpenError(error) ? upstreamError(SERVICE, error.message) : error;
  }

  private async post<T>(
    path: string,
    body: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    timeoutMs: number
  ): Promise<Result<T, ServiceError>> {
    const url = `${this.options.baseUrl}${path}`;

    const sent = await tryCatchAsync(
      () =>
        this.fetchImpl(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'X-api-key': this.options.apiKey,
          },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(timeoutMs),
        }),
      (thrown) => transportError(path, timeoutMs, thrown)
    );
    if (!sent.ok) return sent;
    const response = sent.value;

    if (!response.ok) {
      const detail = await tryCatchAsync(
        () => response.text(),
        () => ''
      );
      const text = detail.ok ? detail.value.trim().slice(0, 200) : '';
      return err(fromHttpStatus(SERVICE, response.status, text || undefined));
    }

    const json = await tryCatchAsync(
      (): Promise<unknown> => response.json(),
      (thrown) => decodeError(SERVICE, `${path} returned invalid JSON`, thrown)
    );
    if (!json.ok) return json;

    const parsed = schema.safeParse(json.value);
    if (!parsed.success) {
      return err(decodeError(SERVICE, `${path} returned an unexpected shape: ${describeIssues(parsed.error)}`));
    }
    return ok(parsed.data);
  }
}

export function createMailServiceClient(
  config: AppConfig['mail'],
  overrides: Partial<MailServiceClientOptions> = {}
): MailServiceClient {
  return new MailServiceClient({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    searchTimeoutMs: config.searchTimeoutMs,
    downloadTimeoutMs: config.downloadTimeoutMs,
    ...overrides,
  });
}
