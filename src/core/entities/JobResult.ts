import type { JobInput, JobOutput } from './Job.js';

/**
 * How the dispatcher finished with one input of a batch
 */
export type JobOutcome =
  | 'COMPLETED'
  | 'FAILED'
  | 'CANCELLED'
  | 'CANCELLED_AFTER_START'
  | 'TIMEOUT'
  | 'TRANSPORT_ERROR'
  | 'NOT_SUBMITTED';

export const JOB_OUTCOMES: readonly JobOutcome[] = [
  'COMPLETED',
  'FAILED',
  'CANCELLED',
  'CANCELLED_AFTER_START',
  'TIMEOUT',
  'TRANSPORT_ERROR',
  'NOT_SUBMITTED',
];

/**
 * Per-job outcome collected by the dispatcher. Created once, never mutated.
 */
export interface JobResult {
  readonly index: number;
  readonly jobId?: string;
  readonly input: JobInput;
  readonly outcome: JobOutcome;
  readonly success: boolean;
  readonly waitTime: number; // simulated duration reported by the backend, in time units
  readonly totalTimeMs: number; // wall time from submission to result, request overhead included
  readonly submittedAt: Date;
  readonly finishedAt: Date;
  readonly output?: JobOutput;
  readonly error?: string;
}

export interface NumericStats {
  mean: number;
  median: number;
  total: number;
  min: number;
  max: number;
}

export interface BaselineComparison {
  sequentialTimeMs: number;
  parallelTimeMs: number;
  speedup: number;
  efficiency: number; // speedup / workers
  timeSavedMs: number;
}

export interface BatchSummary {
  timestamp: string;
  workers: number;
  total: number;
  successful: number;
  failed: number;
  outcomes: Record<JobOutcome, number>;
  wallTimeMs: number;
  throughput: number; // jobs per second
  waitTime: NumericStats;
  totalTime: NumericStats; // per-job wall time in ms
  comparison?: BaselineComparison;
}
