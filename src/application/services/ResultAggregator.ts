import { randomUUID } from 'crypto';
import {
  JOB_OUTCOMES,
  type BaselineComparison,
  type BatchSummary,
  type JobOutcome,
  type JobResult,
  type NumericStats,
} from '../../core/entities/JobResult.js';
import { WriteError } from '../../core/errors.js';
import type { IReportSink } from '../../core/interfaces/IReportSink.js';

export interface SummarizeOptions {
  workers: number;
  wallTimeMs?: number; // defaults to first submission -> last result
  baselineMs?: number; // sequential run of the same batch
  timestamp?: Date;
}

export interface ReportOptions extends SummarizeOptions {
  batchId?: string;
}

export interface BatchReport {
  batchId: string;
  summary: BatchSummary;
  written: string[];
  writeErrors: WriteError[];
}

/**
 * Turns a batch of JobResults into statistics and hands them to report sinks
 */
export class ResultAggregator {
  constructor(private idFactory: () => string = randomUUID) {}

  summarize(results: readonly JobResult[], options: SummarizeOptions): BatchSummary {
    const successful = results.filter((result) => result.success);
    const wallTimeMs = options.wallTimeMs ?? spanOf(results);

    const outcomes = countOutcomes(results);

    const summary: BatchSummary = {
      timestamp: (options.timestamp ?? new Date()).toISOString(),
      workers: options.workers,
      total: results.length,
      successful: successful.length,
      failed: results.length - successful.length,
      outcomes,
      wallTimeMs,
      throughput: wallTimeMs > 0 ? successful.length / (wallTimeMs / 1000) : 0,
      waitTime: computeStats(successful.map((result) => result.waitTime)),
      totalTime: computeStats(successful.map((result) => result.totalTimeMs)),
    };

    if (options.baselineMs !== undefined) {
      summary.comparison = this.compare(options.baselineMs, wallTimeMs, options.workers);
    }
    return summary;
  }

  compare(sequentialTimeMs: number, parallelTimeMs: number, workers: number): BaselineComparison {
    const speedup = parallelTimeMs > 0 ? sequentialTimeMs / parallelTimeMs : 0;
    return {
      sequentialTimeMs,
      parallelTimeMs,
      speedup,
      efficiency: workers > 0 ? speedup / workers : 0,
      timeSavedMs: sequentialTimeMs - parallelTimeMs,
    };
  }

  /**
   * Summarize and write every per-job report plus one summary to each sink.
   * A failed write is collected and the remaining writes still happen.
   */
  async report(
    results: readonly JobResult[],
    options: ReportOptions,
    sinks: readonly IReportSink[]
  ): Promise<BatchReport> {
    const batchId = options.batchId ?? this.idFactory();
    const summary = this.summarize(results, options);
    const written: string[] = [];
    const writeErrors: WriteError[] = [];

    const attempt = async (target: string, write: () => Promise<string>) => {
      try {
        written.push(await write());
      } catch (error) {
        const failure = error instanceof WriteError ? error : new WriteError(target, { cause: error });
        console.error(`[ResultAggregator] ${failure.message}`);
        writeErrors.push(failure);
      }
    };

    for (const sink of sinks) {
      for (const result of results) {
        await attempt(`${sink.name} report for job #${result.index}`, () => sink.writeJobReport(batchId, result));
      }
      await attempt(`${sink.name} summary for batch ${batchId}`, () => sink.writeSummary(batchId, summary, results));
    }

    return { batchId, summary, written, writeErrors };
  }

  formatSummary(summary: BatchSummary): string {
    const rule = '='.repeat(60);
    const pct = summary.total > 0 ? (summary.successful / summary.total) * 100 : 0;
    const lines = [
      rule,
      'Batch Summary',
      rule,
      `Jobs:        ${summary.total} (workers: ${summary.workers})`,
      `Successful:  ${summary.successful}/${summary.total} (${pct.toFixed(1)}%)`,
      `Failed:      ${summary.failed}`,
    ];

    const nonZero = JOB_OUTCOMES.filter((outcome) => outcome !== 'COMPLETED' && summary.outcomes[outcome] > 0);
    for (const outcome of nonZero) {
      lines.push(`  ${outcome}: ${summary.outcomes[outcome]}`);
    }

    lines.push(
      `Wall time:   ${seconds(summary.wallTimeMs)}`,
      `Throughput:  ${summary.throughput.toFixed(2)} jobs/s`,
      `Wait time:   mean ${summary.waitTime.mean.toFixed(2)}, median ${summary.waitTime.median.toFixed(2)}, min ${summary.waitTime.min.toFixed(2)}, max ${summary.waitTime.max.toFixed(2)}`,
      `Job time:    mean ${seconds(summary.totalTime.mean)}, median ${seconds(summary.totalTime.median)}`
    );

    if (summary.comparison) {
      const { comparison } = summary;
      lines.push(
        '',
        'Sequential vs parallel',
        `  Sequential:  ${seconds(comparison.sequentialTimeMs)}`,
        `  Parallel:    ${seconds(comparison.parallelTimeMs)}`,
        `  Speedup:     ${comparison.speedup.toFixed(2)}x`,
        `  Efficiency:  ${(comparison.efficiency * 100).toFixed(1)}%`,
        `  Time saved:  ${seconds(comparison.timeSavedMs)}`
      );
    }

    lines.push(rule);
    return lines.join('\n');
  }
}

export function computeStats(values: readonly number[]): NumericStats {
  if (values.length === 0) {
    return { mean: 0, median: 0, total: 0, min: 0, max: 0 };
  }
  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    mean: total / values.length,
    median: median(values),
    total,
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function countOutcomes(results: readonly JobResult[]): Record<JobOutcome, number> {
  const counts: Record<JobOutcome, number> = {
    COMPLETED: 0,
    FAILED: 0,
    CANCELLED: 0,
    CANCELLED_AFTER_START: 0,
    TIMEOUT: 0,
    TRANSPORT_ERROR: 0,
    NOT_SUBMITTED: 0,
  };
  for (const result of results) {
    counts[result.outcome]++;
  }
  return counts;
}

function spanOf(results: readonly JobResult[]): number {
  if (results.length === 0) return 0;
  const start = Math.min(...results.map((result) => result.submittedAt.getTime()));
  const end = Math.max(...results.map((result) => result.finishedAt.getTime()));
  return Math.max(0, end - start);
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}
