import type { JobInput } from '../../core/entities/Job.js';
import type {
  BackendHealth,
  CancelResponse,
  IJobBackend,
  StatusResponse,
  SubmitResponse,
} from '../../core/interfaces/IJobBackend.js';
import { StatusService } from '../../application/services/StatusService.js';
import { JobRunner, type JobRunnerOptions } from '../runner/JobRunner.js';
import { JobStore } from '../store/JobStore.js';

/**
 * Backend adapter that calls a StatusService living in the same process
 */
export class InProcessJobBackend implements IJobBackend {
  constructor(readonly statusService: StatusService) {}

  /**
   * Wire a fresh store and runner behind the adapter
   */
  static create(runnerOptions: Partial<JobRunnerOptions> = {}): InProcessJobBackend {
    const store = new JobStore();
    return new InProcessJobBackend(new StatusService(store, new JobRunner(store, runnerOptions)));
  }

  /**
   * Stop every simulated job; nothing is left scheduled afterwards
   */
  shutdown(): number {
    return this.statusService.resetAll();
  }

  async submit(input: JobInput): Promise<SubmitResponse> {
    const id = this.statusService.submit(input);
    return { id, status: 'PENDING' };
  }

  async poll(jobId: string): Promise<StatusResponse> {
    const job = this.statusService.poll(jobId);
    return {
      id: job.id,
      status: job.status,
      output: job.output,
      error: job.error,
    };
  }

  async cancel(jobId: string): Promise<CancelResponse> {
    const cancelled = this.statusService.cancel(jobId);
    const job = this.statusService.poll(jobId);
    return { id: job.id, status: job.status, cancelled };
  }

  async health(): Promise<BackendHealth> {
    return this.statusService.health();
  }
}
