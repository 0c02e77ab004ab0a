import { randomUUID } from 'crypto';
import {
  ALLOWED_TRANSITIONS,
  isTerminalStatus,
  type Job,
  type JobInput,
  type JobStatus,
  type JobTransitionDetail,
} from '../../core/entities/Job.js';
import { InvalidTransitionError, NotFoundError } from '../../core/errors.js';

export type JobUpdateListener = (job: Job) => void;

export type JobStatistics = Record<JobStatus, number> & { total: number };

/**
 * In-memory registry of job records.
 *
 * Every mutation is a synchronous update of a single record on the event loop,
 * so a reader sees a record either before or after a transition. Callers only
 * ever receive copies.
 */
export class JobStore {
  private jobs: Map<string, Job> = new Map();
  private listeners: Set<JobUpdateListener> = new Set();

  constructor(private readonly idFactory: () => string = randomUUID) {}

  /**
   * Insert a new PENDING job and return its id
   */
  create(input: JobInput): string {
    const job: Job = {
      id: this.idFactory(),
      status: 'PENDING',
      input: structuredClone(input),
      createdAt: new Date(),
    };

    this.jobs.set(job.id, job);
    this.emit(job);

    return job.id;
  }

  /**
   * Snapshot of a job; throws NotFoundError for unknown or cleared ids
   */
  get(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return structuredClone(job);
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /**
   * Apply one lifecycle edge. Rejected requests leave the record untouched.
   */
  transition(jobId: string, next: JobStatus, detail: JobTransitionDetail = {}): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new InvalidTransitionError(jobId, null, next);
    }
    if (!ALLOWED_TRANSITIONS[job.status].includes(next)) {
      throw new InvalidTransitionError(jobId, job.status, next);
    }

    const now = new Date();
    const updated: Job = { ...job, status: next };

    if (next === 'IN_PROGRESS') {
      updated.startedAt = now;
    }
    if (isTerminalStatus(next)) {
      updated.completedAt = now;
      if (detail.executionTime !== undefined) updated.executionTime = detail.executionTime;
    }
    if (next === 'COMPLETED' && detail.output) {
      updated.output = structuredClone(detail.output);
    }
    if (next === 'FAILED') {
      updated.error = detail.error ?? 'Job failed';
    }

    // whole-record swap keeps the update atomic for readers
    this.jobs.set(jobId, updated);
    this.emit(updated);

    return structuredClone(updated);
  }

  /**
   * All jobs in submission order
   */
  list(): Job[] {
    return Array.from(this.jobs.values(), (job) => structuredClone(job));
  }

  /**
   * Remove every record, returning how many were dropped
   */
  clear(): number {
    const cleared = this.jobs.size;
    this.jobs.clear();
    return cleared;
  }

  getStatistics(): JobStatistics {
    const stats: JobStatistics = {
      total: this.jobs.size,
      PENDING: 0,
      IN_PROGRESS: 0,
      COMPLETED: 0,
      FAILED: 0,
      CANCELLED: 0,
    };
    for (const job of this.jobs.values()) {
      stats[job.status] += 1;
    }
    return stats;
  }

  /**
   * Attach a listener notified after every create and transition
   */
  onJobUpdated(listener: JobUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(job: Job): void {
    if (this.listeners.size === 0) return;

    const snapshot = structuredClone(job);
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error(`[JobStore] ✗ Job update listener failed for ${job.id}:`, error);
      }
    }
  }
}
