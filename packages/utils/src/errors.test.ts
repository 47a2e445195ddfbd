import { describe, it, expect } from 'vitest';
import {
  decodeError,
  fromHttpStatus,
  isServiceError,
  networkError,
  upstreamError,
} from './errors.js';

describe('service errors', () => {
  it('maps 401 and 403 to non-retryable auth errors', () => {
    for (const status of [401, 403]) {
      const error = fromHttpStatus('mail-service', status);
      expect(error.kind).toBe('auth');
      expect(error.statusCode).toBe(status);
      expect(error.retryable).toBe(false);
    }
  });

  it('marks throttling and server errors retryable', () => {
    expect(fromHttpStatus('mail-service', 429).retryable).toBe(true);
    expect(fromHttpStatus('mail-service', 503).retryable).toBe(true);
    expect(fromHttpStatus('mail-service', 404).retryable).toBe(false);
    expect(fromHttpStatus('mail-service', 400, 'bad days_back')).toEqual({
      kind: 'upstream',
      service: 'mail-service',
      message: 'mail-service responded with 400: bad days_back',
      statusCode: 400,
      retryable: false,
    });
  });

  it('treats transport failures as retryable and decode failures as final', () => {
    expect(networkError('groq', 'socket hang up').retryable).toBe(true);
    expect(decodeError('groq', 'invalid JSON').retryable).toBe(false);
    expect(upstreamError('groq', 'no choices').retryable).toBe(false);
  });

  it('recognizes service errors structurally', () => {
    expect(isServiceError(networkError('mail-service', 'reset'))).toBe(true);
    expect(isServiceError({ kind: 'other', service: 'x' })).toBe(false);
    expect(isServiceError(new Error('plain'))).toBe(false);
  });
});
