import fs from 'fs/promises';
import path from 'path';
import type { BatchSummary, JobResult } from '../../core/entities/JobResult.js';
import { WriteError } from '../../core/errors.js';
import type { IReportSink } from '../../core/interfaces/IReportSink.js';

/**
 * Writes one text report per job and a `summary.json` into a directory
 */
export class FileReportSink implements IReportSink {
  readonly name = 'file';

  constructor(private outputDir: string) {}

  async writeJobReport(_batchId: string, result: JobResult): Promise<string> {
    const filePath = path.join(this.outputDir, jobReportFileName(result));
    const text = result.output?.result_text ?? formatFailureReport(result);
    await this.write(filePath, text);
    return filePath;
  }

  async writeSummary(batchId: string, summary: BatchSummary, results: readonly JobResult[]): Promise<string> {
    const filePath = path.join(this.outputDir, 'summary.json');
    const payload = {
      timestamp: summary.timestamp,
      batch_id: batchId,
      total_jobs: summary.total,
      successful: summary.successful,
      failed: summary.failed,
      statistics: {
        workers: summary.workers,
        outcomes: summary.outcomes,
        wall_time_ms: summary.wallTimeMs,
        throughput: summary.throughput,
        wait_time: summary.waitTime,
        total_time_ms: summary.totalTime,
        comparison: summary.comparison ?? null,
      },
      results: results.map(serializeResult),
    };
    await this.write(filePath, JSON.stringify(payload, null, 2));
    return filePath;
  }

  private async write(filePath: string, contents: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, contents, 'utf-8');
    } catch (error) {
      throw new WriteError(filePath, { cause: error });
    }
  }
}

export function jobReportFileName(result: JobResult): string {
  const index = String(result.index).padStart(2, '0');
  const shortId = (result.jobId ?? 'unsubmitted').slice(0, 8);
  return `result_${index}_${shortId}.txt`;
}

export function formatFailureReport(result: JobResult): string {
  return [
    'Job Report',
    '==================',
    `Job ID: ${result.jobId ?? 'not assigned'}`,
    `Outcome: ${result.outcome}`,
    `Error: ${result.error ?? 'none'}`,
    `Input data: ${JSON.stringify(result.input, null, 2)}`,
    `Finished at: ${result.finishedAt.toISOString()}`,
    '==================',
    '',
  ].join('\n');
}

function serializeResult(result: JobResult) {
  return {
    job_index: result.index,
    job_id: result.jobId ?? null,
    outcome: result.outcome,
    success: result.success,
    wait_time: result.waitTime,
    total_time_ms: result.totalTimeMs,
    submitted_at: result.submittedAt.toISOString(),
    finished_at: result.finishedAt.toISOString(),
    input: result.input,
    output: result.output ?? null,
    error: result.error ?? null,
  };
}
