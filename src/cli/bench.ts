#!/usr/bin/env node

/**
 * Batch benchmark: dispatches a generated batch against the backend, optionally
 * after a sequential baseline, and writes the reports.
 */

import { getConfig, printConfigInfo, type Config } from '../config.js';
import { Dispatcher, type DispatchProgressEvent } from '../application/services/Dispatcher.js';
import { ResultAggregator, type BatchReport } from '../application/services/ResultAggregator.js';
import type { JobInput } from '../core/entities/Job.js';
import { HarnessError, errorMessage } from '../core/errors.js';
import type { IJobBackend } from '../core/interfaces/IJobBackend.js';
import type { IReportSink } from '../core/interfaces/IReportSink.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { BatchRepository } from '../infrastructure/database/repositories/BatchRepository.js';
import { JobApiClient } from '../infrastructure/http/JobApiClient.js';
import { InProcessJobBackend } from '../infrastructure/local/InProcessJobBackend.js';
import { FileReportSink } from '../infrastructure/reports/FileReportSink.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG } from '../utils/retry.js';

export interface BenchOptions {
  signal?: AbortSignal;
  randomFn?: () => number;
  out?: (text: string) => void; // report output, stdout by default
  progress?: (event: DispatchProgressEvent) => void;
}

export interface BenchResult {
  report: BatchReport;
  baselineMs?: number;
}

/**
 * One input per job, with a wait_time drawn uniformly from [min, max] and rounded to 2 decimals
 */
export function generateInputs(
  count: number,
  minDuration: number,
  maxDuration: number,
  randomFn: () => number = Math.random
): JobInput[] {
  return Array.from({ length: count }, (_, i) => ({
    task_name: `job_${i + 1}`,
    wait_time: Math.round((minDuration + randomFn() * (maxDuration - minDuration)) * 100) / 100,
    data: `test data ${i + 1}`,
  }));
}

export async function runBench(config: Config, options: BenchOptions = {}): Promise<BenchResult> {
  const { client, reports } = config;
  const out = options.out ?? ((text: string) => console.log(text));
  const progress = options.progress ?? printProgress;

  const local = client.local ? InProcessJobBackend.create(config.runner) : null;
  const backend: IJobBackend =
    local ??
    new JobApiClient(client.baseUrl, client.endpointId, {
      requestTimeoutMs: client.requestTimeoutMs,
      // half-opens within one backoff step so a brief outage does not outlast the retries
      circuitBreaker: new CircuitBreaker(5, client.retry.maxDelayMs),
    });

  const database = reports.persist ? new DatabaseConnection(reports.dbFile) : null;

  try {
    const dispatcher = new Dispatcher(backend, {
      workers: client.workers,
      pollIntervalMs: client.pollIntervalMs,
      jobTimeoutMs: client.jobTimeoutMs,
      retry: { ...DEFAULT_RETRY_CONFIG, ...client.retry },
    });
    const inputs = generateInputs(client.jobCount, client.minDuration, client.maxDuration, options.randomFn);

    let baselineMs: number | undefined;
    if (client.compare) {
      console.error(`[Bench] Sequential baseline: ${inputs.length} jobs on 1 worker`);
      const baseline = await dispatcher.run(inputs, { workers: 1, signal: options.signal });
      baselineMs = baseline.elapsedMs;
    }

    console.error(`[Bench] Dispatching ${inputs.length} jobs on ${client.workers} workers`);
    const run = await dispatcher.run(inputs, { signal: options.signal, onProgress: progress });

    const sinks: IReportSink[] = [new FileReportSink(reports.outputDir)];
    if (database) {
      sinks.push(new BatchRepository(database.getDatabase()));
    }

    const aggregator = new ResultAggregator();
    const report = await aggregator.report(
      run.results,
      { workers: run.workers, wallTimeMs: run.elapsedMs, baselineMs, timestamp: run.finishedAt },
      sinks
    );

    out(aggregator.formatSummary(report.summary));
    out(`Batch ${report.batchId}: ${report.written.length} report(s) written, ${report.writeErrors.length} failed`);

    return { report, baselineMs };
  } finally {
    local?.shutdown();
    database?.close();
  }
}

function printProgress(event: DispatchProgressEvent): void {
  if (event.type !== 'settled') return;
  const { result } = event;
  const pct = ((event.completed / event.total) * 100).toFixed(1);
  console.error(
    `[Bench] ${event.completed}/${event.total} (${pct}%) job #${result.index} ${result.outcome} in ${(result.totalTimeMs / 1000).toFixed(2)}s`
  );
}

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('\n📛 Cancelling batch...');
    controller.abort();
  });

  try {
    const config = getConfig();
    printConfigInfo(config);
    await runBench(config, { signal: controller.signal });
  } catch (error) {
    const code = error instanceof HarnessError ? error.code : 'INTERNAL_ERROR';
    console.log(JSON.stringify({ success: false, error: { code, message: errorMessage(error) } }, null, 2));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
