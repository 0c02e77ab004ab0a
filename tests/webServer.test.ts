import fetch from 'node-fetch';
import WebSocket from 'ws';
import { StatusService } from '../src/application/services/StatusService.js';
import { CircuitOpenError, NotFoundError, TransportError, ValidationError } from '../src/core/errors.js';
import { JobSnapshotSchema } from '../src/core/schemas.js';
import { JobApiClient } from '../src/infrastructure/http/JobApiClient.js';
import { JobRunner } from '../src/infrastructure/runner/JobRunner.js';
import { JobStore } from '../src/infrastructure/store/JobStore.js';
import { WebServer, type ServerMessage } from '../src/infrastructure/web/WebServer.js';
import { CircuitBreaker } from '../src/utils/retry.js';
import { waitFor } from './helpers.js';

const TIME_UNIT_MS = 20;

describe('WebServer + JobApiClient', () => {
  let service: StatusService;
  let server: WebServer;
  let client: JobApiClient;

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const store = new JobStore();
    // jobs stay PENDING long enough to be cancelled over HTTP
    service = new StatusService(store, new JobRunner(store, { timeUnitMs: TIME_UNIT_MS, startDelayMs: 100 }));
    server = new WebServer(service, 0);
    await server.start();
    client = new JobApiClient(server.getUrl(), 'test-endpoint', { circuitBreaker: null });
  });

  afterEach(async () => {
    service.resetAll();
    await server.stop();
    jest.restoreAllMocks();
  });

  describe('job routes', () => {
    test('should submit and poll a job to completion', async () => {
      const submitted = await client.submit({ wait_time: 1, task_name: 'job_1' });
      expect(submitted.status).toBe('PENDING');

      await waitFor(() => service.poll(submitted.id).status === 'COMPLETED');
      const status = await client.poll(submitted.id);

      expect(status.id).toBe(submitted.id);
      expect(status.status).toBe('COMPLETED');
      expect(status.output?.wait_time).toBe(1);
      expect(status.output?.input_data).toEqual({ wait_time: 1, task_name: 'job_1' });
      expect(status.output?.result_text).toContain(`Job ID: ${submitted.id}`);
    });

    test('should serve snapshot timestamps on the status route', async () => {
      const { id } = await client.submit({ wait_time: 0 });
      await waitFor(() => service.poll(id).status === 'COMPLETED');

      const res = await fetch(`${server.getUrl()}/v2/any-endpoint/status/${id}`);
      expect(res.status).toBe(200);
      const body = JobSnapshotSchema.parse(await res.json());

      expect(body).toMatchObject({ id, status: 'COMPLETED', executionTime: 0 });
      expect(Date.parse(body.created_at)).not.toBeNaN();
      expect(body.started_at).toBeDefined();
      expect(body.completed_at).toBeDefined();
    });

    test('should map unknown job ids to NotFoundError', async () => {
      await expect(client.poll('unknown-id')).rejects.toBeInstanceOf(NotFoundError);
      await expect(client.cancel('unknown-id')).rejects.toBeInstanceOf(NotFoundError);

      const res = await fetch(`${server.getUrl()}/v2/test-endpoint/status/unknown-id`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Job not found' });
    });

    test('should cancel pending jobs only', async () => {
      const pending = await client.submit({ wait_time: 1 });
      expect(await client.cancel(pending.id)).toEqual({ id: pending.id, status: 'CANCELLED', cancelled: true });

      const finished = await client.submit({ wait_time: 0 });
      await waitFor(() => service.poll(finished.id).status === 'COMPLETED');
      expect(await client.cancel(finished.id)).toEqual({ id: finished.id, status: 'COMPLETED', cancelled: false });
    });

    test('should reject invalid submissions with a 400', async () => {
      const res = await fetch(`${server.getUrl()}/v2/test-endpoint/run`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ input: { wait_time: -1 } }),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Invalid submission payload',
        details: [{ path: 'input.wait_time', message: 'wait_time must be >= 0' }],
      });

      const rejected = client.submit({ wait_time: -1 });
      await expect(rejected).rejects.toBeInstanceOf(ValidationError);
      await expect(rejected).rejects.toThrow('Invalid submission payload');
      expect(service.listAll()).toEqual([]);
    });

    test('should reject malformed JSON bodies', async () => {
      const res = await fetch(`${server.getUrl()}/v2/test-endpoint/run`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"input":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Malformed JSON body' });
    });

    test('should answer unknown routes with a 404', async () => {
      const res = await fetch(`${server.getUrl()}/v1/nothing-here`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Route not found' });
    });
  });

  describe('diagnostic routes', () => {
    test('should report health', async () => {
      expect(await client.health()).toEqual({ status: 'ok', active_jobs: 0, total_jobs: 0 });

      const { id } = await client.submit({ wait_time: 5 });
      await waitFor(() => service.poll(id).status === 'IN_PROGRESS');

      expect(await client.health()).toEqual({ status: 'ok', active_jobs: 1, total_jobs: 1 });
    });

    test('should list every job and reset them', async () => {
      const a = await client.submit({ wait_time: 5 });
      const b = await client.submit({ wait_time: 5 });

      const jobs = await client.listJobs();
      expect(jobs.map((job) => job.id)).toEqual([a.id, b.id]);

      expect(await client.reset()).toBe(2);
      expect(await client.listJobs()).toEqual([]);
    });
  });

  describe('WebSocket feed', () => {
    test('should greet clients and broadcast job updates', async () => {
      const messages: ServerMessage[] = [];
      const socket = new WebSocket(server.getUrl().replace('http://', 'ws://'));
      socket.on('message', (data) => messages.push(JSON.parse(data.toString())));

      await waitFor(() => messages.length > 0);
      expect(messages[0].type).toBe('connected');

      const { id } = await client.submit({ wait_time: 1 });
      await waitFor(() => messages.some((m) => m.type === 'job_updated' && m.status === 'COMPLETED'));

      const statuses = messages.flatMap((m) => (m.type === 'job_updated' && m.jobId === id ? [m.status] : []));
      expect(statuses).toEqual(['PENDING', 'IN_PROGRESS', 'COMPLETED']);

      socket.close();
    });
  });
});

describe('JobApiClient transport failures', () => {
  let deadUrl: string;

  beforeAll(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const store = new JobStore();
    const server = new WebServer(new StatusService(store, new JobRunner(store)), 0);
    await server.start();
    deadUrl = server.getUrl();
    await server.stop();
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  test('should raise TransportError when the backend is unreachable', async () => {
    const client = new JobApiClient(deadUrl, 'test-endpoint', { circuitBreaker: null });
    await expect(client.health()).rejects.toBeInstanceOf(TransportError);
  });

  test('should open the circuit after repeated transport failures', async () => {
    const client = new JobApiClient(deadUrl, 'test-endpoint', { circuitBreaker: new CircuitBreaker(2, 60000) });

    await expect(client.health()).rejects.toBeInstanceOf(TransportError);
    await expect(client.health()).rejects.toBeInstanceOf(TransportError);
    expect(client.getCircuitBreakerState()).toBe('open');

    await expect(client.submit({ wait_time: 1 })).rejects.toBeInstanceOf(CircuitOpenError);
  });
});
