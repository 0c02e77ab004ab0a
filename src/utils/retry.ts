/**
 * Retry and Circuit Breaker patterns for resilient backend calls
 */
import {
  CircuitOpenError,
  RetryExhaustedError,
  TransportError,
} from '../core/errors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  multiplier: 2,
  timeoutMs: 30000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  onLog?: (log: RetryLog) => void;
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

/**
 * Executes a function with exponential backoff retry logic.
 *
 * Errors rejected by `shouldRetry` are rethrown untouched on the spot; once
 * every attempt has failed a RetryExhaustedError carrying the last error is
 * thrown. An aborted signal stops further attempts.
 *
 * A CircuitOpenError never reached the backend: the call waits until the
 * circuit half-opens and does not spend an attempt, at most `maxAttempts`
 * times per call.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { onLog, shouldRetry = isRetryableError, signal } = options;
  let lastError: unknown = null;
  let lastDelay = config.initialDelayMs;
  let attempt = 0;
  let circuitWaits = 0;

  while (attempt < config.maxAttempts) {
    attempt++;
    try {
      const result = await withTimeout(fn, config.timeoutMs);
      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });
      return result;
    } catch (error) {
      lastError = error;
      const retryable = shouldRetry(error);
      const circuitRetryInMs = error instanceof CircuitOpenError ? error.retryInMs : null;
      const circuitOpen = retryable && circuitRetryInMs !== null && circuitWaits < config.maxAttempts;
      if (circuitOpen) {
        circuitWaits++;
        attempt--;
      }
      const hasNext = retryable && attempt < config.maxAttempts && !signal?.aborted;
      const delay = circuitOpen ? Math.max(lastDelay, (circuitRetryInMs ?? 0) + 1) : lastDelay;

      onLog?.({
        timestamp: new Date(),
        attempt: circuitOpen ? attempt + 1 : attempt,
        delay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: hasNext ? delay : undefined,
      });

      if (!retryable) {
        throw error;
      }
      if (!hasNext) {
        break;
      }

      const waited = await sleep(delay, signal);
      if (!waited) {
        break;
      }

      if (!circuitOpen) {
        // Calculate next delay (exponential backoff)
        lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
      }
    }
  }

  throw new RetryExhaustedError(attempt, lastError);
}

async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransportError(`Timeout after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Resolves `true` once `ms` elapsed, or `false` as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Circuit Breaker Pattern
 * Stops calling a backend that keeps failing until `resetTimeout` has passed
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: Array<{ timestamp: Date; state: CircuitState; reason: string }> = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000,
    private now: () => number = Date.now
  ) {}

  /**
   * Execute function with circuit breaker protection.
   * Only errors accepted by `isFailure` count towards opening the circuit.
   */
  async execute<T>(fn: () => Promise<T>, isFailure: (error: unknown) => boolean = () => true): Promise<T> {
    if (this.state === 'open') {
      const now = this.now();
      if (this.lastFailureTime !== null && now - this.lastFailureTime > this.resetTimeout) {
        this.state = 'half-open';
        this.logStateChange('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        throw new CircuitOpenError(this.resetTimeout - (now - (this.lastFailureTime ?? now)));
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          // two successes in half-open close the circuit
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      if (isFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(newState: CircuitState, reason: string) {
    this.logs.push({
      timestamp: new Date(),
      state: newState,
      reason,
    });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime !== null ? new Date(this.lastFailureTime) : null,
      logs: this.logs,
    };
  }

  /**
   * Reset circuit breaker manually
   */
  reset() {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.logStateChange('closed', 'Manual reset');
  }
}

/**
 * Check if an error is retryable: transport failures and network-level errors
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportError) {
    // client errors will not go away on their own
    return error.status === undefined || error.status >= 500 || error.status === 429;
  }

  const errorMessage = error instanceof Error ? error.message.toLowerCase() : '';

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
