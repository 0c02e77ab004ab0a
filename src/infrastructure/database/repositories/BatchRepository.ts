import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { BatchSummary, JobResult } from '../../../core/entities/JobResult.js';
import { WriteError } from '../../../core/errors.js';
import type {
  BatchRunRecord,
  IBatchRepository,
  StoredBatch,
  StoredJobResult,
} from '../../../core/interfaces/IBatchRepository.js';
import {
  BatchSummarySchema,
  JobInputSchema,
  JobOutcomeSchema,
  JobOutputSchema,
} from '../../../core/schemas.js';

const BatchRunRowSchema = z.object({
  id: z.string(),
  created_at: z.string(),
  workers: z.number().nullable(),
  total: z.number(),
  successful: z.number(),
  failed: z.number(),
  wall_time_ms: z.number().nullable(),
  throughput: z.number().nullable(),
  summary: z.string().nullable(),
});

const BatchResultRowSchema = z.object({
  job_index: z.number(),
  job_id: z.string().nullable(),
  outcome: JobOutcomeSchema,
  success: z.number(),
  wait_time: z.number(),
  total_time_ms: z.number(),
  submitted_at: z.string(),
  finished_at: z.string(),
  input: z.string(),
  output: z.string().nullable(),
  error: z.string().nullable(),
});

type BatchRunRow = z.infer<typeof BatchRunRowSchema>;

/**
 * SQLite history of batch runs. Doubles as a report sink so a batch can be
 * persisted through the same path as the file reports.
 */
export class BatchRepository implements IBatchRepository {
  readonly name = 'sqlite';

  constructor(private db: Database.Database) {}

  async writeJobReport(batchId: string, result: JobResult): Promise<string> {
    const target = `batch_results/${batchId}/${result.index}`;
    this.guardWrite(target, () => {
      // the run row may not exist until its summary is written
      this.db
        .prepare('INSERT OR IGNORE INTO batch_runs (id, created_at) VALUES (?, ?)')
        .run(batchId, new Date().toISOString());

      this.db
        .prepare(
          `
        INSERT OR REPLACE INTO batch_results (
          batch_id, job_index, job_id, outcome, success, wait_time, total_time_ms,
          submitted_at, finished_at, input, output, error
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `
        )
        .run(
          batchId,
          result.index,
          result.jobId ?? null,
          result.outcome,
          result.success ? 1 : 0,
          result.waitTime,
          result.totalTimeMs,
          result.submittedAt.toISOString(),
          result.finishedAt.toISOString(),
          JSON.stringify(result.input),
          result.output ? JSON.stringify(result.output) : null,
          result.error ?? null
        );
    });
    return target;
  }

  async writeSummary(batchId: string, summary: BatchSummary, _results: readonly JobResult[]): Promise<string> {
    const target = `batch_runs/${batchId}`;
    this.guardWrite(target, () => {
      this.db
        .prepare(
          `
        INSERT INTO batch_runs (id, created_at, workers, total, successful, failed, wall_time_ms, throughput, summary)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          created_at = excluded.created_at,
          workers = excluded.workers,
          total = excluded.total,
          successful = excluded.successful,
          failed = excluded.failed,
          wall_time_ms = excluded.wall_time_ms,
          throughput = excluded.throughput,
          summary = excluded.summary
      `
        )
        .run(
          batchId,
          summary.timestamp,
          summary.workers,
          summary.total,
          summary.successful,
          summary.failed,
          summary.wallTimeMs,
          summary.throughput,
          JSON.stringify(summary)
        );
    });
    return target;
  }

  getBatch(batchId: string): StoredBatch | null {
    const row = this.db.prepare('SELECT * FROM batch_runs WHERE id = ?').get(batchId);
    if (row === undefined) return null;

    const run = BatchRunRowSchema.parse(row);
    const results = this.db
      .prepare('SELECT * FROM batch_results WHERE batch_id = ? ORDER BY job_index')
      .all(batchId)
      .map((resultRow) => toStoredResult(BatchResultRowSchema.parse(resultRow)));

    return {
      ...toRecord(run),
      summary: run.summary === null ? null : BatchSummarySchema.parse(JSON.parse(run.summary)),
      results,
    };
  }

  listBatches(limit: number = 20): BatchRunRecord[] {
    return this.db
      .prepare('SELECT * FROM batch_runs ORDER BY created_at DESC LIMIT ?')
      .all(limit)
      .map((row) => toRecord(BatchRunRowSchema.parse(row)));
  }

  deleteBatchesByAge(hoursOld: number = 24): number {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000).toISOString();
    // batch_results rows go with their run (ON DELETE CASCADE)
    const result = this.db.prepare('DELETE FROM batch_runs WHERE created_at < ?').run(cutoffTime);
    return result.changes;
  }

  private guardWrite(target: string, write: () => void): void {
    try {
      write();
    } catch (error) {
      throw new WriteError(target, { cause: error });
    }
  }
}

function toRecord(row: BatchRunRow): BatchRunRecord {
  return {
    id: row.id,
    createdAt: new Date(row.created_at),
    workers: row.workers,
    total: row.total,
    successful: row.successful,
    failed: row.failed,
    wallTimeMs: row.wall_time_ms,
    throughput: row.throughput,
  };
}

function toStoredResult(row: z.infer<typeof BatchResultRowSchema>): StoredJobResult {
  return {
    index: row.job_index,
    jobId: row.job_id,
    outcome: row.outcome,
    success: row.success === 1,
    waitTime: row.wait_time,
    totalTimeMs: row.total_time_ms,
    submittedAt: new Date(row.submitted_at),
    finishedAt: new Date(row.finished_at),
    input: JobInputSchema.parse(JSON.parse(row.input)),
    output: row.output === null ? null : JobOutputSchema.parse(JSON.parse(row.output)),
    error: row.error,
  };
}
