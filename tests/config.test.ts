import { getConfig, parseArgs, printConfigInfo } from '../src/config.js';
import { ConfigError } from '../src/core/errors.js';

const argv = (...args: string[]) => ['node', 'bench.js', ...args];

describe('parseArgs', () => {
  test('should read flags, values and inline values', () => {
    expect(parseArgs(argv('--workers', '4', '--compare', '--url=http://localhost:9000'))).toEqual({
      workers: '4',
      compare: true,
      url: 'http://localhost:9000',
    });
  });

  test('should ignore positional arguments', () => {
    expect(parseArgs(argv('extra', '--local'))).toEqual({ local: true });
  });
});

describe('getConfig', () => {
  test('should fall back to defaults', () => {
    const config = getConfig(argv(), {});

    expect(config.server).toEqual({ host: '127.0.0.1', port: 5000, debug: false });
    expect(config.runner).toEqual({
      minDuration: 1,
      maxDuration: 5,
      failureRate: 0,
      startDelayMs: 0,
      timeUnitMs: 1000,
    });
    expect(config.client).toMatchObject({
      baseUrl: 'http://127.0.0.1:5000',
      endpointId: 'test-endpoint',
      workers: 10,
      jobCount: 100,
      pollIntervalMs: 500,
      jobTimeoutMs: 300000,
      compare: false,
      local: false,
      retry: { maxAttempts: 3, initialDelayMs: 200, maxDelayMs: 2000 },
    });
    expect(config.reports).toEqual({ outputDir: 'results', dbFile: 'batches.db', persist: false });
  });

  test('should read environment variables', () => {
    const config = getConfig(argv(), {
      PORT: '6000',
      DEBUG: 'true',
      TIME_UNIT_MS: '50',
      RUNNER_FAILURE_RATE: '0.25',
      WORKERS: '3',
      JOB_COUNT: '20',
      BACKEND_URL: 'http://backend.internal:8080',
      REPORT_PERSIST_DB: 'true',
    });

    expect(config.server.port).toBe(6000);
    expect(config.server.debug).toBe(true);
    expect(config.runner.timeUnitMs).toBe(50);
    expect(config.runner.failureRate).toBe(0.25);
    expect(config.client.workers).toBe(3);
    expect(config.client.jobCount).toBe(20);
    expect(config.client.baseUrl).toBe('http://backend.internal:8080');
    expect(config.reports.persist).toBe(true);
  });

  test('should prefer CLI arguments over the environment', () => {
    const config = getConfig(argv('--workers', '7', '--local', '--compare', '--jobs=12'), {
      WORKERS: '3',
      LOCAL: 'false',
    });

    expect(config.client.workers).toBe(7);
    expect(config.client.jobCount).toBe(12);
    expect(config.client.local).toBe(true);
    expect(config.client.compare).toBe(true);
  });

  test('should derive the default backend URL from host and port', () => {
    const config = getConfig(argv('--port', '7001'), { HOST: '0.0.0.0' });
    expect(config.client.baseUrl).toBe('http://0.0.0.0:7001');
  });

  test('should reject invalid values with every issue listed', () => {
    const load = () =>
      getConfig(argv('--workers', '0', '--failure-rate', '2', '--url', 'not a url'), { JOB_COUNT: 'many' });

    expect(load).toThrow(ConfigError);
    try {
      load();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        const paths = error.issues.map((issue) => issue.path);
        expect(paths).toEqual(expect.arrayContaining(['runner.failureRate', 'client.workers', 'client.baseUrl', 'client.jobCount']));
        expect(error.message).toContain('  • client.workers: At least 1 worker is required');
      }
    }
  });

  test('should reject an inverted duration range', () => {
    expect(() => getConfig(argv('--min-duration', '5', '--max-duration', '1'), {})).toThrow(
      'client minDuration must not exceed maxDuration'
    );
  });
});

describe('printConfigInfo', () => {
  test('should print to stderr only', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    printConfigInfo(getConfig(argv('--compare'), {}));

    expect(errorSpy).toHaveBeenCalledWith('   Sequential baseline: enabled');
    expect(logSpy).not.toHaveBeenCalled();
    errorSpy.mockRestore();
    logSpy.mockRestore();
  });
});
