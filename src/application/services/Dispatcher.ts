import { z } from 'zod';
import { isTerminalStatus, type JobInput } from '../../core/entities/Job.js';
import type { JobResult } from '../../core/entities/JobResult.js';
import {
  BackendUnavailableError,
  JobTimeoutError,
  NotFoundError,
  RetryExhaustedError,
  TransportError,
  ValidationError,
  errorMessage,
} from '../../core/errors.js';
import type { IJobBackend, StatusResponse } from '../../core/interfaces/IJobBackend.js';
import { JobInputSchema } from '../../core/schemas.js';
import { DEFAULT_RETRY_CONFIG, sleep, withRetry, type RetryConfig } from '../../utils/retry.js';

export interface DispatchOptions {
  workers: number;
  pollIntervalMs: number;
  jobTimeoutMs?: number;
  retry: RetryConfig;
  signal?: AbortSignal;
  onProgress?: (event: DispatchProgressEvent) => void;
}

export type DispatchProgressEvent =
  | { type: 'submitted'; slot: number; index: number; jobId: string; inFlight: number }
  | { type: 'settled'; slot: number; result: JobResult; completed: number; total: number };

export interface BatchRun {
  results: JobResult[]; // sorted by original index
  workers: number;
  startedAt: Date;
  finishedAt: Date;
  elapsedMs: number;
  maxInFlight: number;
}

export const DEFAULT_DISPATCH_OPTIONS: DispatchOptions = {
  workers: 5,
  pollIntervalMs: 500,
  jobTimeoutMs: 300000,
  retry: DEFAULT_RETRY_CONFIG,
};

const DispatchSettingsSchema = z.object({
  workers: z.number().int('workers must be an integer').min(1, 'workers must be >= 1'),
  pollIntervalMs: z.number().finite().nonnegative('pollIntervalMs must be >= 0'),
  jobTimeoutMs: z.number().finite().positive('jobTimeoutMs must be > 0').optional(),
});

const BatchSchema = z.array(JobInputSchema).min(1, 'Batch must contain at least one job');

interface JobContext {
  index: number;
  input: JobInput;
  slot: number;
  submittedAt: Date;
  startMs: number;
}

/**
 * Client-side batch orchestrator.
 *
 * Runs `workers` slots over a shared cursor: a slot claims the next input,
 * submits it, polls it to a terminal state, then claims again. At most
 * `workers` jobs are outstanding at any time and every input yields exactly
 * one JobResult.
 */
export class Dispatcher {
  private readonly defaults: DispatchOptions;

  constructor(
    private backend: IJobBackend,
    defaults: Partial<DispatchOptions> = {}
  ) {
    this.defaults = { ...DEFAULT_DISPATCH_OPTIONS, ...defaults };
  }

  async run(inputs: unknown, overrides: Partial<DispatchOptions> = {}): Promise<BatchRun> {
    const options = this.resolveOptions(overrides);
    const batch = parseBatch(inputs);

    await this.checkHealth(options);

    const total = batch.length;
    const results: Array<JobResult | undefined> = new Array(total);
    const startedAt = new Date();
    let cursor = 0;
    let inFlight = 0;
    let maxInFlight = 0;
    let completed = 0;

    const claim = (): number | null => {
      if (options.signal?.aborted || cursor >= total) return null;
      return cursor++;
    };

    const runSlot = async (slot: number): Promise<void> => {
      for (let index = claim(); index !== null; index = claim()) {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        let result: JobResult;
        try {
          const ctx: JobContext = {
            index,
            input: batch[index],
            slot,
            submittedAt: new Date(),
            startMs: Date.now(),
          };
          result = await this.processJob(ctx, options, () => inFlight);
        } finally {
          inFlight--;
        }
        results[index] = result;
        completed++;
        notifyProgress(options, { type: 'settled', slot, result, completed, total });
      }
    };

    const slotCount = Math.min(options.workers, total);
    await Promise.all(Array.from({ length: slotCount }, (_, slot) => runSlot(slot)));

    // inputs left unclaimed after a batch cancellation
    const finishedAt = new Date();
    const settled = Array.from(
      { length: total },
      (_, index) =>
        results[index] ??
        freezeResult({
          index,
          input: batch[index],
          outcome: 'NOT_SUBMITTED',
          success: false,
          waitTime: 0,
          totalTimeMs: 0,
          submittedAt: finishedAt,
          finishedAt,
          error: 'Batch cancelled before submission',
        })
    );

    return {
      results: settled,
      workers: options.workers,
      startedAt,
      finishedAt,
      elapsedMs: finishedAt.getTime() - startedAt.getTime(),
      maxInFlight,
    };
  }

  private resolveOptions(overrides: Partial<DispatchOptions>): DispatchOptions {
    const options: DispatchOptions = { ...this.defaults, ...overrides };
    const parsed = DispatchSettingsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid dispatch options',
        parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }
    return options;
  }

  private async checkHealth(options: DispatchOptions): Promise<void> {
    try {
      await withRetry(() => this.backend.health(), options.retry);
    } catch (error) {
      throw new BackendUnavailableError(`Backend health check failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private call<T>(fn: () => Promise<T>, options: DispatchOptions, label: string): Promise<T> {
    return withRetry(fn, options.retry, {
      onLog: (log) => {
        if (!log.success && log.nextRetryInMs !== undefined) {
          console.error(
            `[Dispatcher] ${label} attempt ${log.attempt}/${options.retry.maxAttempts} failed (${log.error}), retrying in ${log.nextRetryInMs}ms`
          );
        }
      },
    });
  }

  private async processJob(
    ctx: JobContext,
    options: DispatchOptions,
    inFlight: () => number
  ): Promise<JobResult> {
    let jobId: string;
    try {
      const submitted = await this.call(() => this.backend.submit(ctx.input), options, `submit #${ctx.index}`);
      jobId = submitted.id;
    } catch (error) {
      return this.finish(ctx, {
        outcome: isTransportFailure(error) ? 'TRANSPORT_ERROR' : 'FAILED',
        error: errorMessage(error),
      });
    }

    notifyProgress(options, { type: 'submitted', slot: ctx.slot, index: ctx.index, jobId, inFlight: inFlight() });

    const { signal, jobTimeoutMs, pollIntervalMs } = options;
    let cancelRequested = false;

    while (true) {
      if (signal?.aborted && !cancelRequested) {
        cancelRequested = true;
        if (await this.tryCancel(jobId, options)) {
          return this.finish(ctx, { jobId, outcome: 'CANCELLED', error: 'Cancelled with the batch' });
        }
      }

      let status: StatusResponse;
      try {
        status = await this.call(() => this.backend.poll(jobId), options, `poll ${jobId}`);
      } catch (error) {
        return this.finish(ctx, {
          jobId,
          outcome: error instanceof NotFoundError || !isTransportFailure(error) ? 'FAILED' : 'TRANSPORT_ERROR',
          error: errorMessage(error),
        });
      }

      if (isTerminalStatus(status.status)) {
        return this.fromTerminalStatus(ctx, status, cancelRequested);
      }

      const elapsed = Date.now() - ctx.startMs;
      if (jobTimeoutMs !== undefined && elapsed >= jobTimeoutMs) {
        await this.tryCancel(jobId, options);
        return this.finish(ctx, {
          jobId,
          outcome: cancelRequested ? 'CANCELLED_AFTER_START' : 'TIMEOUT',
          error: new JobTimeoutError(jobId, jobTimeoutMs).message,
        });
      }

      const untilDeadline = jobTimeoutMs === undefined ? pollIntervalMs : jobTimeoutMs - elapsed;
      // once cancellation is requested the signal stays aborted; keep the interval
      await sleep(Math.min(pollIntervalMs, untilDeadline), cancelRequested ? undefined : signal);
    }
  }

  /**
   * Best-effort cancel; true only when the backend accepted it
   */
  private async tryCancel(jobId: string, options: DispatchOptions): Promise<boolean> {
    try {
      const response = await this.call(() => this.backend.cancel(jobId), options, `cancel ${jobId}`);
      return response.cancelled;
    } catch (error) {
      console.error(`[Dispatcher] Cancel of ${jobId} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private fromTerminalStatus(ctx: JobContext, status: StatusResponse, cancelRequested: boolean): JobResult {
    const waitTime = status.output?.wait_time ?? 0;

    if (status.status === 'CANCELLED') {
      return this.finish(ctx, { jobId: status.id, outcome: 'CANCELLED', error: status.error ?? 'Job was cancelled' });
    }
    if (cancelRequested) {
      return this.finish(ctx, {
        jobId: status.id,
        outcome: 'CANCELLED_AFTER_START',
        waitTime,
        output: status.output,
        error: status.error ?? `Job had already started and finished as ${status.status}`,
      });
    }
    if (status.status === 'COMPLETED') {
      return this.finish(ctx, { jobId: status.id, outcome: 'COMPLETED', waitTime, output: status.output });
    }
    return this.finish(ctx, { jobId: status.id, outcome: 'FAILED', error: status.error ?? 'Job failed' });
  }

  private finish(
    ctx: JobContext,
    fields: Pick<JobResult, 'outcome'> & Partial<Pick<JobResult, 'jobId' | 'waitTime' | 'output' | 'error'>>
  ): JobResult {
    const finishedAt = new Date();
    return freezeResult({
      index: ctx.index,
      input: ctx.input,
      success: fields.outcome === 'COMPLETED',
      waitTime: 0,
      submittedAt: ctx.submittedAt,
      finishedAt,
      totalTimeMs: finishedAt.getTime() - ctx.startMs,
      ...fields,
    });
  }
}

function parseBatch(inputs: unknown): JobInput[] {
  const parsed = BatchSchema.safeParse(inputs);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid batch request',
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return parsed.data;
}

function notifyProgress(options: DispatchOptions, event: DispatchProgressEvent): void {
  try {
    options.onProgress?.(event);
  } catch (error) {
    console.error(`[Dispatcher] ✗ Progress listener failed on ${event.type}:`, error);
  }
}

function isTransportFailure(error: unknown): boolean {
  return error instanceof RetryExhaustedError || error instanceof TransportError;
}

function freezeResult(result: JobResult): JobResult {
  return Object.freeze(result);
}
