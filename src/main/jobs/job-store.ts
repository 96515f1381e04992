/**
 * Voice Reshaper - Job Store
 * Storage for job records; readers always receive detached copies
 */

import type { Job } from '../../shared/types/job';

export interface JobStore {
  create(job: Job): void;
  /** Copy of the record, or undefined for an unknown id */
  get(jobId: string): Job | undefined;
  /** Merge `changes` into an existing record and return the updated copy */
  update(jobId: string, changes: Partial<Omit<Job, 'id' | 'kind'>>): Job | undefined;
  list(): Job[];
  delete(jobId: string): boolean;
}

/**
 * Process-local store backed by a Map
 */
export class InMemoryJobStore implements JobStore {
  private jobs: Map<string, Job> = new Map();

  create(job: Job): void {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job already exists: ${job.id}`);
    }
    this.jobs.set(job.id, structuredClone(job));
  }

  get(jobId: string): Job | undefined {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : undefined;
  }

  update(jobId: string, changes: Partial<Omit<Job, 'id' | 'kind'>>): Job | undefined {
    const job = this.jobs.get(jobId);
    if (!job) return undefined;
    Object.assign(job, structuredClone(changes));
    return structuredClone(job);
  }

  list(): Job[] {
    return Array.from(this.jobs.values(), (job) => structuredClone(job));
  }

  delete(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }
}
