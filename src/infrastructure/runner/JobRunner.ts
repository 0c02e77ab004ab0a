import type { JobInput, JobOutput } from '../../core/entities/Job.js';
import { InvalidTransitionError } from '../../core/errors.js';
import { sleep } from '../../utils/retry.js';
import type { JobStore } from '../store/JobStore.js';

export interface JobRunnerOptions {
  minDuration: number; // time units
  maxDuration: number; // time units
  timeUnitMs: number;
  failureRate: number; // probability in [0, 1] that a finished job is marked FAILED
  startDelayMs: number; // delay before a PENDING job is picked up
  randomFn: () => number;
}

export const DEFAULT_RUNNER_OPTIONS: JobRunnerOptions = {
  minDuration: 1,
  maxDuration: 5,
  timeUnitMs: 1000,
  failureRate: 0,
  startDelayMs: 0,
  randomFn: Math.random,
};

/**
 * Simulated backend execution. Each accepted job gets its own timer chain and
 * cancellation token; runners never wait on each other.
 */
export class JobRunner {
  private readonly options: JobRunnerOptions;
  private active: Map<string, AbortController> = new Map();

  constructor(private readonly store: JobStore, options: Partial<JobRunnerOptions> = {}) {
    this.options = { ...DEFAULT_RUNNER_OPTIONS, ...options };
    if (this.options.minDuration < 0 || this.options.maxDuration < this.options.minDuration) {
      throw new Error(
        `Invalid duration range [${this.options.minDuration}, ${this.options.maxDuration}]`
      );
    }
  }

  /**
   * Start the lifecycle of a freshly created job
   */
  schedule(jobId: string, input: JobInput): void {
    const controller = new AbortController();
    this.active.set(jobId, controller);
    void this.execute(jobId, input, controller.signal);
  }

  /**
   * Stop the timers of one job. Returns false when nothing was running.
   */
  abort(jobId: string): boolean {
    const controller = this.active.get(jobId);
    if (!controller) return false;

    controller.abort();
    this.active.delete(jobId);
    return true;
  }

  abortAll(): number {
    const count = this.active.size;
    for (const controller of this.active.values()) {
      controller.abort();
    }
    this.active.clear();
    return count;
  }

  activeCount(): number {
    return this.active.size;
  }

  /**
   * Duration in time units: the declared `wait_time`, or a uniform draw
   */
  resolveDuration(input: JobInput): number {
    if (typeof input.wait_time === 'number' && Number.isFinite(input.wait_time) && input.wait_time >= 0) {
      return input.wait_time;
    }
    const { minDuration, maxDuration, randomFn } = this.options;
    return minDuration + randomFn() * (maxDuration - minDuration);
  }

  private async execute(jobId: string, input: JobInput, signal: AbortSignal): Promise<void> {
    try {
      if (!(await sleep(this.options.startDelayMs, signal))) return;
      this.store.transition(jobId, 'IN_PROGRESS');

      const waitTime = this.resolveDuration(input);
      const executionTime = Math.round(waitTime * this.options.timeUnitMs);
      if (!(await sleep(executionTime, signal))) return;

      const { failureRate, randomFn } = this.options;
      if (failureRate > 0 && randomFn() < failureRate) {
        this.store.transition(jobId, 'FAILED', {
          error: `Simulated backend fault after ${waitTime.toFixed(2)}s`,
          executionTime,
        });
        return;
      }

      this.store.transition(jobId, 'COMPLETED', {
        output: buildJobOutput(jobId, waitTime, input),
        executionTime,
      });
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        // job was cancelled or reset under us
        console.error(`[JobRunner] Skipping job ${jobId}: ${error.message}`);
        return;
      }
      console.error(`[JobRunner] ✗ Unexpected failure while running job ${jobId}:`, error);
    } finally {
      if (this.active.get(jobId)?.signal === signal) {
        this.active.delete(jobId);
      }
    }
  }
}

export function buildJobOutput(jobId: string, waitTime: number, input: JobInput): JobOutput {
  const resultText = [
    'Job Report',
    '==================',
    `Job ID: ${jobId}`,
    `Wait time: ${waitTime.toFixed(2)}s`,
    `Input data: ${JSON.stringify(input, null, 2)}`,
    `Completed at: ${new Date().toISOString()}`,
    '==================',
    '',
  ].join('\n');

  return {
    result_text: resultText,
    wait_time: waitTime,
    input_data: input,
  };
}
