import fs from 'fs';
import os from 'os';
import path from 'path';
import { Dispatcher } from '../src/application/services/Dispatcher.js';
import { ResultAggregator } from '../src/application/services/ResultAggregator.js';
import { StatusService } from '../src/application/services/StatusService.js';
import { generateInputs, runBench } from '../src/cli/bench.js';
import { getConfig } from '../src/config.js';
import { JobApiClient } from '../src/infrastructure/http/JobApiClient.js';
import { JobRunner } from '../src/infrastructure/runner/JobRunner.js';
import { JobStore } from '../src/infrastructure/store/JobStore.js';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { CircuitBreaker, type RetryConfig } from '../src/utils/retry.js';
import { delay, waitFor } from './helpers.js';

const TIME_UNIT_MS = 40;
const FAST_RETRY: RetryConfig = { maxAttempts: 2, initialDelayMs: 5, maxDelayMs: 10, multiplier: 2, timeoutMs: 2000 };

// Park-Miller generator, deterministic across runs
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
}

describe('batch over HTTP', () => {
  let service: StatusService;
  let server: WebServer;
  let dispatcher: Dispatcher;

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const store = new JobStore();
    service = new StatusService(store, new JobRunner(store, { timeUnitMs: TIME_UNIT_MS }));
    server = new WebServer(service, 0);
    await server.start();
    const client = new JobApiClient(server.getUrl(), 'test-endpoint', { circuitBreaker: null });
    dispatcher = new Dispatcher(client, { pollIntervalMs: 5, retry: FAST_RETRY });
  });

  afterEach(async () => {
    service.resetAll();
    await server.stop();
    jest.restoreAllMocks();
  });

  test('should run equal jobs side by side', async () => {
    const inputs = Array.from({ length: 5 }, (_, i) => ({ wait_time: 2, task_name: `job_${i + 1}` }));

    const run = await dispatcher.run(inputs, { workers: 5, jobTimeoutMs: 5000 });

    expect(run.results.map((result) => result.outcome)).toEqual(Array(5).fill('COMPLETED'));
    expect(run.maxInFlight).toBe(5);
    // five 2-unit jobs in parallel take about 2 units, far below the 10 units of a serial run
    expect(run.elapsedMs).toBeGreaterThanOrEqual(2 * TIME_UNIT_MS);
    expect(run.elapsedMs).toBeLessThan(8 * TIME_UNIT_MS);
    expect(service.getStatistics().COMPLETED).toBe(5);
  });

  test('should beat the sequential baseline', async () => {
    // durations 1.0 to 4.9 units, 27.48 in total
    const inputs = generateInputs(10, 1, 5, seededRandom(42));

    const sequential = await dispatcher.run(inputs, { workers: 1 });
    const parallel = await dispatcher.run(inputs, { workers: 5 });
    const summary = new ResultAggregator().summarize(parallel.results, {
      workers: 5,
      wallTimeMs: parallel.elapsedMs,
      baselineMs: sequential.elapsedMs,
    });

    expect(sequential.maxInFlight).toBe(1);
    expect(parallel.maxInFlight).toBe(5);
    expect(summary.successful).toBe(10);
    expect(summary.comparison?.speedup).toBeGreaterThanOrEqual(1.5);
    expect(summary.comparison?.timeSavedMs).toBeGreaterThan(0);
  }, 15000);

  test('should time out a job that outlives the deadline', async () => {
    const run = await dispatcher.run([{ wait_time: 10 }, { wait_time: 0 }], {
      workers: 2,
      jobTimeoutMs: TIME_UNIT_MS,
    });

    const [slow, fast] = run.results;
    expect(slow.outcome).toBe('TIMEOUT');
    expect(slow.success).toBe(false);
    expect(slow.error).toBe(`Job ${slow.jobId} timed out after ${TIME_UNIT_MS}ms`);
    expect(fast.outcome).toBe('COMPLETED');
  });

  test('should ride out a brief outage behind an open circuit', async () => {
    const port = server.getPort();
    const client = new JobApiClient(server.getUrl(), 'test-endpoint', { circuitBreaker: new CircuitBreaker(2, 50) });
    const guarded = new Dispatcher(client, {
      pollIntervalMs: 5,
      retry: { maxAttempts: 5, initialDelayMs: 20, maxDelayMs: 50, multiplier: 2, timeoutMs: 2000 },
    });
    const inputs = Array.from({ length: 12 }, () => ({ wait_time: 2 }));

    const pending = guarded.run(inputs, { workers: 6 });
    await waitFor(() => service.listAll().length >= 6);
    await server.stop();
    await delay(100);
    server = new WebServer(service, port);
    await server.start();
    const run = await pending;

    expect(run.results.map((result) => result.outcome)).toEqual(Array(12).fill('COMPLETED'));
    expect(client.getCircuitBreakerState()).toBe('closed');
  }, 15000);
});

describe('runBench', () => {
  let workDir: string;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-harness-bench-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  test('should run a local batch with a baseline and write every report', async () => {
    const outputDir = path.join(workDir, 'results');
    const config = getConfig(
      [
        'node',
        'bench.js',
        '--local',
        '--compare',
        '--jobs=4',
        '--workers=2',
        '--min-duration=1',
        '--max-duration=1',
        '--time-unit=10',
        '--poll-interval=5',
        `--output-dir=${outputDir}`,
      ],
      {}
    );
    const printed: string[] = [];

    const { report, baselineMs } = await runBench(config, {
      randomFn: () => 0.5,
      out: (text) => printed.push(text),
      progress: () => undefined,
    });

    expect(baselineMs).toBeGreaterThan(0);
    expect(report.summary.total).toBe(4);
    expect(report.summary.successful).toBe(4);
    expect(report.summary.workers).toBe(2);
    expect(report.summary.comparison?.sequentialTimeMs).toBe(baselineMs);
    expect(report.writeErrors).toEqual([]);

    const files = fs.readdirSync(outputDir).sort();
    expect(files).toHaveLength(5);
    expect(files[0]).toMatch(/^result_00_[0-9a-f]{8}\.txt$/);
    expect(files).toContain('summary.json');

    expect(printed).toHaveLength(2);
    expect(printed[0].split('\n')).toContain('Jobs:        4 (workers: 2)');
    expect(printed[1]).toBe(`Batch ${report.batchId}: 5 report(s) written, 0 failed`);
  });

  test('should still report a batch cancelled before any submission', async () => {
    const outputDir = path.join(workDir, 'results');
    const config = getConfig(['node', 'bench.js', '--local', '--jobs=3', `--output-dir=${outputDir}`], {});
    const controller = new AbortController();
    controller.abort();

    const { report } = await runBench(config, {
      signal: controller.signal,
      out: () => undefined,
      progress: () => undefined,
    });

    expect(report.summary.total).toBe(3);
    expect(report.summary.outcomes.NOT_SUBMITTED).toBe(3);
    expect(report.summary.successful).toBe(0);
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      'result_00_unsubmit.txt',
      'result_01_unsubmit.txt',
      'result_02_unsubmit.txt',
      'summary.json',
    ]);
  });
});
