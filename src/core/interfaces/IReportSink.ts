import type { BatchSummary, JobResult } from '../entities/JobResult.js';

/**
 * Destination for batch reports. Each write resolves to where the data went.
 */
export interface IReportSink {
  readonly name: string;
  writeJobReport(batchId: string, result: JobResult): Promise<string>;
  writeSummary(batchId: string, summary: BatchSummary, results: readonly JobResult[]): Promise<string>;
}
