/**
 * Failures reported by external collaborators (mail service, LLM, document decoding).
 *
 * Each variant carries a `retryable` flag decided where the failure is observed,
 * so retry policies never have to inspect messages.
 */

export const ServiceErrorKind = {
  NETWORK: 'network',
  AUTH: 'auth',
  DECODE: 'decode',
  UPSTREAM: 'upstream',
} as const;

export type ServiceErrorKind = (typeof ServiceErrorKind)[keyof typeof ServiceErrorKind];

interface ServiceErrorBase {
  service: string;
  message: string;
  retryable: boolean;
  statusCode?: number;
  cause?: unknown;
}

export interface NetworkError extends ServiceErrorBase {
  kind: typeof ServiceErrorKind.NETWORK;
}

export interface AuthError extends ServiceErrorBase {
  kind: typeof ServiceErrorKind.AUTH;
  statusCode: number;
}

export interface DecodeError extends ServiceErrorBase {
  kind: typeof ServiceErrorKind.DECODE;
}

export interface UpstreamError extends ServiceErrorBase {
  kind: typeof ServiceErrorKind.UPSTREAM;
}

export type ServiceError = NetworkError | AuthError | DecodeError | UpstreamError;

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

export const isRetryableStatus = (statusCode: number): boolean =>
  RETRYABLE_STATUS_CODES.has(statusCode);

export const networkError = (service: string, message: string, cause?: unknown): NetworkError => ({
  kind: ServiceErrorKind.NETWORK,
  service,
  message,
  retryable: true,
  cause,
});

export const authError = (service: string, statusCode: number, message: string): AuthError => ({
  kind: ServiceErrorKind.AUTH,
  service,
  message,
  statusCode,
  retryable: false,
});

export const decodeError = (service: string, message: string, cause?: unknown): DecodeError => ({
  kind: ServiceErrorKind.DECODE,
  service,
  message,
  retryable: false,
  cause,
});

export const upstreamError = (
  service: string,
  message: string,
  statusCode?: number
): UpstreamError => ({
  kind: ServiceErrorKind.UPSTREAM,
  service,
  message,
  statusCode,
  retryable: statusCode !== undefined && isRetryableStatus(statusCode),
});

/** Maps a non-2xx HTTP status to the matching failure kind. */
export function fromHttpStatus(
  service: string,
  statusCode: number,
  detail?: string
): AuthError | UpstreamError {
  const suffix = detail ? `: ${detail}` : '';
  if (statusCode === 401 || statusCode === 403) {
    return authError(service, statusCode, `${service} rejected credentials (${statusCode})${suffix}`);
  }
  return upstreamError(service, `${service} responded with ${statusCode}${suffix}`, statusCode);
}

export const isServiceError = (value: unknown): value is ServiceError =>
  typeof value === 'object' &&
  value !== null &&
  'kind' in value &&
  'service' in value &&
  Object.values<unknown>(ServiceErrorKind).includes(value.kind);
