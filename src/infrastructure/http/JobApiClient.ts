import fetch, { type Response } from 'node-fetch';
import type { z } from 'zod';
import type { JobInput, JobSnapshot } from '../../core/entities/Job.js';
import {
  NotFoundError,
  TransportError,
  ValidationError,
  errorMessage,
} from '../../core/errors.js';
import type {
  BackendHealth,
  CancelResponse,
  IJobBackend,
  StatusResponse,
  SubmitResponse,
} from '../../core/interfaces/IJobBackend.js';
import {
  CancelResponseSchema,
  ErrorResponseSchema,
  HealthResponseSchema,
  JobSnapshotSchema,
  ResetResponseSchema,
  StatusResponseSchema,
  SubmitResponseSchema,
} from '../../core/schemas.js';
import { CircuitBreaker } from '../../utils/retry.js';

export interface JobApiClientOptions {
  requestTimeoutMs?: number;
  circuitBreaker?: CircuitBreaker | null; // null disables the breaker
}

type HttpMethod = 'GET' | 'POST';

/**
 * HTTP client for the job backend (`/v2/{endpointId}/...`).
 *
 * Maps wire failures onto the harness error taxonomy: 404 on a job route is a
 * NotFoundError, 400 a ValidationError, everything else a TransportError.
 * Retrying is left to the caller.
 */
export class JobApiClient implements IJobBackend {
  private baseUrl: string;
  private requestTimeoutMs: number;
  private circuitBreaker: CircuitBreaker | null;

  constructor(
    baseUrl: string,
    private endpointId: string,
    options: JobApiClientOptions = {}
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.circuitBreaker =
      options.circuitBreaker === undefined ? new CircuitBreaker(5, 60000) : options.circuitBreaker;
  }

  async submit(input: JobInput): Promise<SubmitResponse> {
    return this.request('POST', `${this.jobsPath()}/run`, SubmitResponseSchema, { body: { input } });
  }

  async poll(jobId: string): Promise<StatusResponse> {
    return this.request(
      'GET',
      `${this.jobsPath()}/status/${encodeURIComponent(jobId)}`,
      StatusResponseSchema,
      { jobId }
    );
  }

  async cancel(jobId: string): Promise<CancelResponse> {
    return this.request(
      'POST',
      `${this.jobsPath()}/cancel/${encodeURIComponent(jobId)}`,
      CancelResponseSchema,
      { jobId }
    );
  }

  async health(): Promise<BackendHealth> {
    return this.request('GET', '/health', HealthResponseSchema);
  }

  async listJobs(): Promise<JobSnapshot[]> {
    return this.request('GET', '/jobs', JobSnapshotSchema.array());
  }

  async reset(): Promise<number> {
    const response = await this.request('POST', '/reset', ResetResponseSchema);
    return response.cleared;
  }

  getCircuitBreakerState() {
    return this.circuitBreaker?.getState() ?? 'closed';
  }

  private jobsPath(): string {
    return `/v2/${encodeURIComponent(this.endpointId)}`;
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { body?: unknown; jobId?: string } = {}
  ): Promise<T> {
    const call = () => this.send(method, path, schema, options);
    if (!this.circuitBreaker) {
      return call();
    }
    // only transport failures say anything about the backend's health
    return this.circuitBreaker.execute(call, (error) => error instanceof TransportError);
  }

  private async send<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { body?: unknown; jobId?: string }
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: { 'Content-Type': 'application/json' },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        timeout: this.requestTimeoutMs,
      });
    } catch (error) {
      throw new TransportError(`${method} ${path} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (res.status === 404 && options.jobId !== undefined) {
      await res.text().catch(() => '');
      throw new NotFoundError(options.jobId);
    }

    if (res.status === 400) {
      const payload = ErrorResponseSchema.safeParse(await res.json().catch(() => null));
      throw new ValidationError(
        payload.success ? payload.data.error : `${method} ${path} was rejected`,
        payload.success ? payload.data.details ?? [] : []
      );
    }

    if (!res.ok) {
      await res.text().catch(() => '');
      throw new TransportError(`HTTP error! status: ${res.status} (${method} ${path})`, res.status);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new TransportError(`${method} ${path} returned invalid JSON`, res.status, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError(`${method} ${path} returned an unexpected payload`, res.status, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
