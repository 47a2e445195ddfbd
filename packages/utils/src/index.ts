export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  isOk,
  isErr,
  unwrapOr,
  map,
  mapErr,
  andThen,
  andThenAsync,
  toError,
  tryCatch,
  tryCatchAsync,
  collect,
} from './result.js';

export {
  ServiceErrorKind,
  type ServiceError,
  type NetworkError,
  type AuthError,
  type DecodeError,
  type UpstreamError,
  networkError,
  authError,
  decodeError,
  upstreamError,
  fromHttpStatus,
  isRetryableStatus,
  isServiceError,
} from './errors.js';

export {
  type RetryOptions,
  type BackoffOptions,
  withRetry,
  calculateDelay,
  retryPresets,
  defaultRetryOptions,
} from './retry.js';

export {
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerSettings,
  logger,
  buildLoggerOptions,
  createLogger,
  withTiming,
} from './logger.js';

export {
  type CircuitState,
  type CircuitBreakerOptions,
  type CircuitOpenError,
  CircuitBreaker,
  createCircuitBreaker,
  circuitBreakerPresets,
  isCircuitOpenError,
} from './circuit-breaker.js';
