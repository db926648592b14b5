/**
 * Job persistence
 *
 * The orchestrator writes every state and progress change through a
 * JobStore; the queue and the HTTP layer read jobs back by id.
 */

import type { SyncJob, SyncJobState } from "../../types/index.js";

export interface ListJobsOptions {
  state?: SyncJobState;
  limit?: number;
}

export interface JobStore {
  /** Insert or replace the job with this id */
  save(job: SyncJob): Promise<void>;
  get(id: string): Promise<SyncJob | null>;
  /** Newest first */
  list(options?: ListJobsOptions): Promise<SyncJob[]>;
}

export const DEFAULT_LIST_LIMIT = 50;

/**
 * JobStore kept in process memory. Jobs are copied on the way in and out.
 */
export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, SyncJob>();

  save(job: SyncJob): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
    return Promise.resolve();
  }

  get(id: string): Promise<SyncJob | null> {
    const job = this.jobs.get(id);
    return Promise.resolve(job === undefined ? null : structuredClone(job));
  }

  list(options: ListJobsOptions = {}): Promise<SyncJob[]> {
    const jobs = [...this.jobs.values()]
      .filter((job) => options.state === undefined || job.state === options.state)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, options.limit ?? DEFAULT_LIST_LIMIT)
      .map((job) => structuredClone(job));
    return Promise.resolve(jobs);
  }
}
