/**
 * Job domain entity
 */
export type JobStatus = 'PENDING' | 'IN_PROGRESS' | 'COMPLETED' | 'FAILED' | 'CANCELLED';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['COMPLETED', 'FAILED', 'CANCELLED'];

/**
 * Allowed edges of the job lifecycle. Terminal statuses have no outgoing edge.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  PENDING: ['IN_PROGRESS', 'CANCELLED'],
  IN_PROGRESS: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
};

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Submitted payload. `wait_time` is the simulated duration in time units;
 * when absent the runner draws one from its configured range.
 */
export interface JobInput {
  wait_time?: number;
  [key: string]: unknown;
}

export interface JobOutput {
  result_text: string;
  wait_time: number;
  input_data: JobInput;
}

export interface Job {
  id: string;
  status: JobStatus;
  input: JobInput;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  output?: JobOutput;
  error?: string;
  executionTime?: number; // simulated duration in ms
}

export interface JobTransitionDetail {
  output?: JobOutput;
  error?: string;
  executionTime?: number;
}

/**
 * Wire representation served by the status endpoint
 */
export interface JobSnapshot {
  id: string;
  status: JobStatus;
  input: JobInput;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  output?: JobOutput;
  error?: string;
  executionTime?: number;
}

export function toJobSnapshot(job: Job): JobSnapshot {
  return {
    id: job.id,
    status: job.status,
    input: job.input,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString(),
    completed_at: job.completedAt?.toISOString(),
    output: job.output,
    error: job.error,
    executionTime: job.executionTime,
  };
}
