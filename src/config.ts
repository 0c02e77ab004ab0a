import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './core/errors.js';

// Load environment variables from .env file
dotenv.config();

const DurationRange = (label: string) =>
  z
    .object({
      minDuration: z.number().finite().nonnegative(`${label} minDuration must be >= 0`),
      maxDuration: z.number().finite().nonnegative(`${label} maxDuration must be >= 0`),
    })
    .refine((range) => range.minDuration <= range.maxDuration, {
      message: `${label} minDuration must not exceed maxDuration`,
      path: ['minDuration'],
    });

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1, 'Host must not be empty'),
    port: z.number().int().min(0).max(65535),
    debug: z.boolean(),
  }),
  runner: DurationRange('runner').and(
    z.object({
      failureRate: z.number().min(0, 'failureRate must be >= 0').max(1, 'failureRate must be <= 1'),
      startDelayMs: z.number().int().min(0),
      timeUnitMs: z.number().positive('timeUnitMs must be > 0'),
    })
  ),
  client: DurationRange('client').and(
    z.object({
      baseUrl: z.string().url('Invalid backend URL format'),
      endpointId: z.string().min(1, 'Endpoint id must not be empty'),
      workers: z.number().int().min(1, 'At least 1 worker is required'),
      jobCount: z.number().int().min(1, 'At least 1 job is required'),
      pollIntervalMs: z.number().int().min(0),
      jobTimeoutMs: z.number().int().positive(),
      requestTimeoutMs: z.number().int().positive(),
      retry: z.object({
        maxAttempts: z.number().int().min(1).max(10),
        initialDelayMs: z.number().int().min(0),
        maxDelayMs: z.number().int().min(0),
      }),
      compare: z.boolean(),
      local: z.boolean(),
    })
  ),
  reports: z.object({
    outputDir: z.string().min(1),
    dbFile: z.string().min(1),
    persist: z.boolean(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse command line arguments
 * Usage: node dist/src/cli/bench.js --workers 10 --jobs 100 --compare
 */
export function parseArgs(argv: readonly string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

      if (eq !== -1) {
        args[key] = arg.slice(eq + 1);
      } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        // Next arg is the value, not another flag
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from CLI arguments, then environment variables, then defaults.
 * Throws ConfigError listing every invalid value.
 */
export function getConfig(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const raw = (cliKey: string, envKey: string): string | boolean | undefined => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey];
    const envValue = env[envKey];
    return envValue === undefined || envValue === '' ? undefined : envValue;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const value = raw(cliKey, envKey);
    return typeof value === 'string' ? value : defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const value = raw(cliKey, envKey);
    if (value === undefined) return defaultValue;
    return value === true || value === 'true' || value === '1';
  };

  // non-numeric text becomes NaN and is reported by the schema
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = raw(cliKey, envKey);
    if (value === undefined) return defaultValue;
    return typeof value === 'string' ? Number(value) : NaN;
  };

  const port = getNumber('port', 'PORT', 5000);
  const host = getString('host', 'HOST', '127.0.0.1');

  const rawConfig = {
    server: {
      host,
      port,
      debug: getBoolean('debug', 'DEBUG', false),
    },
    runner: {
      minDuration: getNumber('runner-min-duration', 'RUNNER_MIN_DURATION', 1),
      maxDuration: getNumber('runner-max-duration', 'RUNNER_MAX_DURATION', 5),
      failureRate: getNumber('failure-rate', 'RUNNER_FAILURE_RATE', 0),
      startDelayMs: getNumber('start-delay', 'RUNNER_START_DELAY_MS', 0),
      timeUnitMs: getNumber('time-unit', 'TIME_UNIT_MS', 1000),
    },
    client: {
      baseUrl: getString('url', 'BACKEND_URL', `http://${host}:${port}`),
      endpointId: getString('endpoint', 'ENDPOINT_ID', 'test-endpoint'),
      workers: getNumber('workers', 'WORKERS', 10),
      jobCount: getNumber('jobs', 'JOB_COUNT', 100),
      minDuration: getNumber('min-duration', 'JOB_MIN_DURATION', 1),
      maxDuration: getNumber('max-duration', 'JOB_MAX_DURATION', 5),
      pollIntervalMs: getNumber('poll-interval', 'POLL_INTERVAL_MS', 500),
      jobTimeoutMs: getNumber('job-timeout', 'JOB_TIMEOUT_MS', 300000),
      requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 10000),
      retry: {
        maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
        initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 200),
        maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 2000),
      },
      compare: getBoolean('compare', 'COMPARE', false),
      local: getBoolean('local', 'LOCAL', false),
    },
    reports: {
      outputDir: getString('output-dir', 'REPORT_DIR', 'results'),
      dbFile: getString('db-file', 'REPORT_DB_FILE', 'batches.db'),
      persist: getBoolean('persist', 'REPORT_PERSIST_DB', false),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return parsed.data;
}

/**
 * Print configuration to stderr
 */
export function printConfigInfo(config: Config): void {
  const { server, runner, client, reports } = config;

  console.error('╔' + '═'.repeat(66) + '╗');
  console.error('║' + '  Parallel Job Harness - Configuration'.padEnd(66) + '║');
  console.error('╚' + '═'.repeat(66) + '╝');

  console.error(`\n📊 Backend: http://${server.host}:${server.port} ${server.debug ? '(Debug Mode)' : ''}`);
  console.error(
    `⏱️  Runner: ${runner.minDuration}-${runner.maxDuration} units x ${runner.timeUnitMs}ms | failure rate ${runner.failureRate} | start delay ${runner.startDelayMs}ms`
  );

  console.error(`\n🚀 Client: ${client.local ? 'in-process backend' : client.baseUrl} (endpoint ${client.endpointId})`);
  console.error(`   Jobs: ${client.jobCount} x ${client.minDuration}-${client.maxDuration} units | Workers: ${client.workers}`);
  console.error(
    `   Poll: ${client.pollIntervalMs}ms | Timeout: ${client.jobTimeoutMs}ms | Retry: ${client.retry.maxAttempts}x (${client.retry.initialDelayMs}-${client.retry.maxDelayMs}ms)`
  );
  if (client.compare) {
    console.error('   Sequential baseline: enabled');
  }

  console.error(`\n💾 Reports: ${reports.outputDir}${reports.persist ? ` + data/${reports.dbFile}` : ''}`);
  console.error('\n' + '─'.repeat(68));
}
