import type { Result } from './result.js';
import { logger } from './logger.js';

export interface RetryOptions<E> {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
  /** Decides whether a failed attempt is worth repeating. Defaults to always. */
  shouldRetry?: (error: E) => boolean;
  onRetry?: (attempt: number, error: E, delayMs: number) => void;
}

export type BackoffOptions = Omit<RetryOptions<never>, 'shouldRetry' | 'onRetry'>;

export const defaultRetryOptions: BackoffOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 0.1,
};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const calculateDelay = (attempt: number, options: BackoffOptions): number => {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.multiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitterRange = cappedDelay * options.jitter;
  const jitter = (Math.random() - 0.5) * 2 * jitterRange;
  return Math.max(0, cappedDelay + jitter);
};

/**
 * Repeats `fn` while it returns a retryable Err, with exponential backoff.
 * The last Result is returned as is, so callers keep their typed error.
 */
export async function withRetry<T, E>(
  fn: () => Promise<Result<T, E>>,
  options: Partial<RetryOptions<E>> = {}
): Promise<Result<T, E>> {
  const opts: RetryOptions<E> = { ...defaultRetryOptions, ...options };
  const attempts = Math.max(1, opts.maxAttempts);

  let result = await fn();
  for (let attempt = 1; attempt < attempts && !result.ok; attempt++) {
    const error = result.error;
    if (opts.shouldRetry && !opts.shouldRetry(error)) {
      break;
    }

    const delayMs = calculateDelay(attempt - 1, opts);
    if (opts.onRetry) {
      opts.onRetry(attempt, error, delayMs);
    } else {
      logger.warn({ attempt, maxAttempts: attempts, delayMs, error }, 'Retrying after error');
    }

    await sleep(delayMs);
    result = await fn();
  }

  return result;
}

export const retryPresets = {
  mailService: {
    maxAttempts: 3,
    initialDelayMs: 500,
    maxDelayMs: 8000,
    multiplier: 2,
    jitter: 0.1,
  },
  llm: {
    maxAttempts: 3,
    initialDelayMs: 2000,
    maxDelayMs: 10000,
    multiplier: 2,
    jitter: 0.2,
  },
  database: {
    maxAttempts: 3,
    initialDelayMs: 100,
    maxDelayMs: 1000,
    multiplier: 2,
    jitter: 0.1,
  },
} as const satisfies Record<string, BackoffOptions>;
