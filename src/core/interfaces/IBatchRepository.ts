import type { JobInput, JobOutput } from '../entities/Job.js';
import type { BatchSummary, JobOutcome } from '../entities/JobResult.js';
import type { IReportSink } from './IReportSink.js';

export interface BatchRunRecord {
  id: string;
  createdAt: Date;
  workers: number | null;
  total: number;
  successful: number;
  failed: number;
  wallTimeMs: number | null;
  throughput: number | null;
}

export interface StoredJobResult {
  index: number;
  jobId: string | null;
  outcome: JobOutcome;
  success: boolean;
  waitTime: number;
  totalTimeMs: number;
  submittedAt: Date;
  finishedAt: Date;
  input: JobInput;
  output: JobOutput | null;
  error: string | null;
}

export interface StoredBatch extends BatchRunRecord {
  summary: BatchSummary | null;
  results: StoredJobResult[];
}

/**
 * Interface for batch history persistence
 */
export interface IBatchRepository extends IReportSink {
  getBatch(batchId: string): StoredBatch | null;

  listBatches(limit?: number): BatchRunRecord[];

  deleteBatchesByAge(hoursOld: number): number;
}
