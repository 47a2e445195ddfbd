import { type Result, err } from './result.js';
import { logger } from './logger.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold: number;
  successThreshold: number;
  resetTimeoutMs: number;
  /** Which Err values count against the circuit. Defaults to all of them. */
  isFailure?: (error: unknown) => boolean;
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
  now?: () => number;
}

export interface CircuitOpenError {
  type: 'circuit_open';
  message: string;
  circuitName: string;
}

export const isCircuitOpenError = (value: unknown): value is CircuitOpenError =>
  typeof value === 'object' && value !== null && 'type' in value && value.type === 'circuit_open';

/**
 * Guards a collaborator behind a closed/open/half-open state machine.
 * Operations report failure through their Result, never by throwing.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | undefined;
  private readonly options: CircuitBreakerOptions;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  async execute<T, E>(fn: () => Promise<Result<T, E>>): Promise<Result<T, E | CircuitOpenError>> {
    if (this.state === 'open') {
      if (this.shouldAttemptReset()) {
        this.transitionTo('half-open');
      } else {
        return err({
          type: 'circuit_open',
          message: `Circuit breaker '${this.options.name}' is open`,
          circuitName: this.options.name,
        });
      }
    }

    const result = await fn();
    if (result.ok || !(this.options.isFailure ?? (() => true))(result.error)) {
      this.onSuccess();
    } else {
      this.onFailure();
    }
    return result;
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state === 'half-open') {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.transitionTo('closed');
        this.successCount = 0;
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    this.successCount = 0;

    if (this.state === 'half-open') {
      this.transitionTo('open');
    } else if (this.state === 'closed' && this.failureCount >= this.options.failureThreshold) {
      this.transitionTo('open');
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.lastFailureTime === undefined) return true;
    return this.now() - this.lastFailureTime >= this.options.resetTimeoutMs;
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;

    logger.info(
      { circuitName: this.options.name, from: oldState, to: newState },
      'Circuit breaker state change'
    );

    this.options.onStateChange?.(this.options.name, oldState, newState);
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): { state: CircuitState; failureCount: number; successCount: number } {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = undefined;
  }
}

export function createCircuitBreaker(
  name: string,
  options?: Partial<Omit<CircuitBreakerOptions, 'name'>>
): CircuitBreaker {
  return new CircuitBreaker({
    name,
    failureThreshold: 5,
    successThreshold: 2,
    resetTimeoutMs: 60000,
    ...options,
  });
}

export const circuitBreakerPresets = {
  mailService: {
    failureThreshold: 3,
    successThreshold: 2,
    resetTimeoutMs: 30000,
  },
  groq: {
    failureThreshold: 5,
    successThreshold: 3,
    resetTimeoutMs: 60000,
  },
} as const satisfies Record<string, Partial<CircuitBreakerOptions>>;
