import type { JobStatus } from './entities/Job.js';

export type HarnessErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'VALIDATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CIRCUIT_OPEN'
  | 'TIMEOUT'
  | 'WRITE_ERROR'
  | 'BACKEND_UNAVAILABLE'
  | 'RETRY_EXHAUSTED'
  | 'CONFIG_ERROR';

/**
 * Base class for every failure the harness reports on purpose
 */
export class HarnessError extends Error {
  constructor(
    public readonly code: HarnessErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends HarnessError {
  constructor(public readonly jobId: string) {
    super('NOT_FOUND', `Job ${jobId} not found`);
  }
}

export class InvalidTransitionError extends HarnessError {
  constructor(
    public readonly jobId: string,
    public readonly from: JobStatus | null,
    public readonly to: JobStatus
  ) {
    super(
      'INVALID_TRANSITION',
      from === null
        ? `Cannot move unknown job ${jobId} to ${to}`
        : `Cannot move job ${jobId} from ${from} to ${to}`
    );
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends HarnessError {
  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super('VALIDATION_ERROR', message);
  }
}

export class TransportError extends HarnessError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('TRANSPORT_ERROR', message, options);
  }
}

export class CircuitOpenError extends TransportError {
  constructor(public readonly retryInMs: number) {
    super(`Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${retryInMs}ms`);
  }
}

export class JobTimeoutError extends HarnessError {
  constructor(public readonly jobId: string, public readonly timeoutMs: number) {
    super('TIMEOUT', `Job ${jobId} timed out after ${timeoutMs}ms`);
  }
}

export class WriteError extends HarnessError {
  constructor(public readonly target: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('WRITE_ERROR', `Failed to write ${target}${reason}`, options);
  }
}

export class BackendUnavailableError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('BACKEND_UNAVAILABLE', message, options);
  }
}

export class RetryExhaustedError extends HarnessError {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super('RETRY_EXHAUSTED', `Failed after ${attempts} attempts. Last error: ${reason}`, {
      cause: lastError,
    });
  }
}

export class ConfigError extends HarnessError {
  constructor(public readonly issues: ValidationIssue[]) {
    super(
      'CONFIG_ERROR',
      `Configuration validation failed:\n${issues.map((i) => `  • ${i.path || 'root'}: ${i.message}`).join('\n')}`
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
