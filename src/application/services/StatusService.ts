import type { Job, JobInput } from '../../core/entities/Job.js';
import { ValidationError } from '../../core/errors.js';
import { JobInputSchema, SubmitRequestSchema } from '../../core/schemas.js';
import type { JobRunner } from '../../infrastructure/runner/JobRunner.js';
import type { JobStatistics, JobStore, JobUpdateListener } from '../../infrastructure/store/JobStore.js';

export interface HealthReport {
  status: 'ok';
  active_jobs: number;
  total_jobs: number;
}

/**
 * Accept/poll/cancel surface over the job store and its runner.
 * Holds no state of its own.
 */
export class StatusService {
  constructor(
    private jobStore: JobStore,
    private jobRunner: JobRunner
  ) {}

  /**
   * Validate a raw `{ input }` request body and submit it
   */
  submitRequest(body: unknown): string {
    const parsed = SubmitRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid submission payload',
        parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        }))
      );
    }
    return this.submit(parsed.data.input);
  }

  /**
   * Submit a new job and start its simulated execution
   */
  submit(input: JobInput): string {
    const parsed = JobInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid job input',
        parsed.error.issues.map((issue) => ({
          path: ['input', ...issue.path].join('.'),
          message: issue.message,
        }))
      );
    }

    const jobId = this.jobStore.create(parsed.data);
    this.jobRunner.schedule(jobId, parsed.data);
    return jobId;
  }

  /**
   * Current snapshot; throws NotFoundError for unknown ids
   */
  poll(jobId: string): Job {
    return this.jobStore.get(jobId);
  }

  /**
   * Cancel a job that has not started yet. Running or finished jobs are left as they are.
   */
  cancel(jobId: string): boolean {
    const job = this.jobStore.get(jobId);
    if (job.status !== 'PENDING') {
      return false;
    }

    this.jobStore.transition(jobId, 'CANCELLED');
    this.jobRunner.abort(jobId);
    return true;
  }

  health(): HealthReport {
    const stats = this.jobStore.getStatistics();
    return {
      status: 'ok',
      active_jobs: stats.IN_PROGRESS,
      total_jobs: stats.total,
    };
  }

  listAll(): Job[] {
    return this.jobStore.list();
  }

  getStatistics(): JobStatistics {
    return this.jobStore.getStatistics();
  }

  /**
   * Stop every runner and drop all jobs
   */
  resetAll(): number {
    this.jobRunner.abortAll();
    return this.jobStore.clear();
  }

  onJobUpdated(listener: JobUpdateListener): () => void {
    return this.jobStore.onJobUpdated(listener);
  }
}
