/**
 * SyncJobQueue - accepts apply requests and runs them in the background
 *
 * Jobs against the same network view run one after another; jobs against
 * different views run concurrently.
 */

import { randomUUID } from "node:crypto";

import { NotFoundError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { TERMINAL_JOB_STATES } from "../../types/index.js";
import { createSyncJob } from "./orchestrator.js";

import type { ApplyRequest, SyncJob } from "../../types/index.js";
import type { JobStore, ListJobsOptions } from "./job-store.js";
import type { SyncOrchestrator } from "./orchestrator.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncJobQueueOptions {
  generateId?: () => string;
}

interface ActiveJob {
  job: SyncJob;
  controller: AbortController;
  done: Promise<SyncJob>;
}

// ============================================================================
// Sync Job Queue
// ============================================================================

export class SyncJobQueue {
  private readonly active = new Map<string, ActiveJob>();
  /** Last job admitted per view; cleared once that job finishes */
  private readonly viewTails = new Map<
    string,
    { jobId: string; done: Promise<SyncJob> }
  >();
  private readonly generateId: () => string;

  constructor(
    private readonly orchestrator: SyncOrchestrator,
    private readonly store: JobStore,
    options: SyncJobQueueOptions = {}
  ) {
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Accept a request and return its job id. The job starts once every
   * earlier job for the same view has finished.
   */
  async submit(request: ApplyRequest): Promise<string> {
    const job = createSyncJob(this.generateId(), request);
    await this.store.save(job);

    const controller = new AbortController();
    const previous =
      this.viewTails.get(job.networkView)?.done ?? Promise.resolve();
    const done = this.runAfter(previous, job, request, controller.signal);

    this.viewTails.set(job.networkView, { jobId: job.id, done });
    this.active.set(job.id, { job, controller, done });

    syncLogger.info(
      {
        jobId: job.id,
        networkView: job.networkView,
        records: request.records.length,
        waiting: this.active.size - 1,
      },
      "Sync job submitted"
    );
    return job.id;
  }

  /**
   * @throws NotFoundError for an unknown job id
   */
  async getStatus(jobId: string): Promise<SyncJob> {
    const job = await this.store.get(jobId);
    if (job === null) {
      throw new NotFoundError(`Sync job '${jobId}' not found`);
    }
    return job;
  }

  /**
   * Network views with a job still waiting or running
   */
  get busyViews(): string[] {
    return [...this.viewTails.keys()];
  }

  list(options?: ListJobsOptions): Promise<SyncJob[]> {
    return this.store.list(options);
  }

  /**
   * Ask a job to stop. Resolves false when it had already finished.
   *
   * @throws NotFoundError for an unknown job id
   */
  async cancel(jobId: string): Promise<boolean> {
    const entry = this.active.get(jobId);
    if (entry === undefined) {
      // Unknown ids throw; finished jobs cannot be cancelled
      await this.getStatus(jobId);
      return false;
    }
    if (TERMINAL_JOB_STATES.includes(entry.job.state)) return false;

    entry.controller.abort();
    syncLogger.info({ jobId }, "Sync job cancellation requested");
    return true;
  }

  /**
   * Resolve with the job once it reaches a terminal state
   */
  async waitFor(jobId: string): Promise<SyncJob> {
    const entry = this.active.get(jobId);
    if (entry !== undefined) {
      await entry.done;
    }
    return this.getStatus(jobId);
  }

  /**
   * Wait for every job accepted so far
   */
  async drain(): Promise<void> {
    await Promise.all([...this.active.values()].map((entry) => entry.done));
  }

  /**
   * Cancel every running or waiting job and wait for them to stop
   */
  async shutdown(): Promise<void> {
    for (const entry of this.active.values()) {
      entry.controller.abort();
    }
    await this.drain();
  }

  private async runAfter(
    previous: Promise<unknown>,
    job: SyncJob,
    request: ApplyRequest,
    signal: AbortSignal
  ): Promise<SyncJob> {
    await previous;
    try {
      if (signal.aborted) {
        job.state = "Cancelled";
        job.error = "Job was cancelled before it started";
        job.completedAt = new Date();
        await this.store.save(job);
        return job;
      }
      return await this.orchestrator.run(job, request, signal);
    } catch (error) {
      // Only the job store can fail here; the orchestrator records the rest
      syncLogger.error(
        { jobId: job.id, error: errorMessage(error) },
        "Sync job could not be persisted"
      );
      job.state = "Failed";
      job.error = errorMessage(error);
      return job;
    } finally {
      this.active.delete(job.id);
      if (this.viewTails.get(job.networkView)?.jobId === job.id) {
        this.viewTails.delete(job.networkView);
      }
    }
  }
}
