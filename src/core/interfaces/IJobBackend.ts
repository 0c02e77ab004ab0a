import type { JobInput, JobOutput, JobStatus } from '../entities/Job.js';

export interface SubmitResponse {
  id: string;
  status: JobStatus;
}

export interface StatusResponse {
  id: string;
  status: JobStatus;
  output?: JobOutput;
  error?: string;
}

export interface CancelResponse {
  id: string;
  status: JobStatus;
  cancelled: boolean;
}

export interface BackendHealth {
  status: string;
  active_jobs?: number;
  total_jobs?: number;
}

/**
 * Client-side view of the job backend used by the dispatcher.
 *
 * Implementations throw NotFoundError for unknown ids and TransportError for
 * failures of the call itself.
 */
export interface IJobBackend {
  submit(input: JobInput): Promise<SubmitResponse>;

  poll(jobId: string): Promise<StatusResponse>;

  cancel(jobId: string): Promise<CancelResponse>;

  health(): Promise<BackendHealth>;
}
