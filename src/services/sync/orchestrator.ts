/**
 * SyncOrchestrator - drives one apply job against the DDI store
 *
 * Records are applied one at a time, in input order, so progress is strictly
 * ordered. Per-record failures are folded into the job outcome; only bad
 * credentials, a missing target or cancellation end the job early.
 */

import { AuthenticationError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { mapTags } from "../../mapping/attribute-mapper.js";
import { sleep } from "../../utils/async.js";

import type { DdiClient } from "../../ddi/client.js";
import type {
  ApplyRequest,
  ExtAttrs,
  NetworkRecord,
  SyncJob,
} from "../../types/index.js";
import type { JobStore } from "./job-store.js";

// ============================================================================
// Types
// ============================================================================

/** The DDI calls the apply loop needs */
export type SyncTarget = Pick<
  DdiClient,
  "getNetworkBySubnet" | "createNetwork" | "updateNetwork"
>;

export interface SyncOrchestratorOptions {
  /** Pause between records, on top of the client's own throttle */
  itemDelayMs?: number;
}

type ProgressCallback = (job: SyncJob) => void;

export const DEFAULT_ITEM_DELAY_MS = 100;

export function networkComment(record: NetworkRecord): string {
  return `Account: ${record.account}, Region: ${record.region}`;
}

/**
 * A Pending job for `request`, with an empty outcome
 */
export function createSyncJob(id: string, request: ApplyRequest): SyncJob {
  return {
    id,
    networkView: request.networkView,
    state: "Pending",
    progress: { current: 0, total: request.records.length, message: "queued" },
    outcome: { createdCount: 0, updatedCount: 0, failedCount: 0, errors: [] },
    createdAt: new Date(),
  };
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private readonly itemDelayMs: number;
  private onProgress?: ProgressCallback;

  /**
   * @param target - null when no DDI store is configured; every job then fails
   */
  constructor(
    private readonly target: SyncTarget | null,
    private readonly store: JobStore,
    options: SyncOrchestratorOptions = {}
  ) {
    this.itemDelayMs = options.itemDelayMs ?? DEFAULT_ITEM_DELAY_MS;
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run `job` to a terminal state. The job object is updated in place and
   * persisted after every change; the same object is returned.
   */
  async run(
    job: SyncJob,
    request: ApplyRequest,
    signal?: AbortSignal
  ): Promise<SyncJob> {
    const log = syncLogger.child({
      jobId: job.id,
      networkView: job.networkView,
    });

    if (this.target === null) {
      log.error("DDI store is not configured, failing job");
      return this.finish(job, "Failed", "DDI store is not configured");
    }
    const target = this.target;

    const total = request.records.length;
    job.state = "Running";
    job.startedAt = new Date();
    job.progress = { current: 0, total, message: "starting" };
    await this.store.save(job);
    log.info({ records: total }, "Sync job started");

    try {
      for (const [index, record] of request.records.entries()) {
        signal?.throwIfAborted();

        job.progress = {
          current: index + 1,
          total,
          message: `processing ${record.subnet}`,
        };
        await this.store.save(job);
        this.onProgress?.(job);

        await this.applyRecord(target, job, record, request, signal);

        if (index < total - 1 && this.itemDelayMs > 0) {
          await sleep(this.itemDelayMs, signal);
        }
      }
    } catch (error) {
      if (signal?.aborted === true) {
        log.warn({ progress: job.progress }, "Sync job cancelled");
        return this.finish(job, "Cancelled", "Job was cancelled");
      }
      log.error({ error: errorMessage(error) }, "Sync job failed");
      return this.finish(job, "Failed", errorMessage(error));
    }

    job.progress = { ...job.progress, message: "completed" };
    log.info(
      {
        created: job.outcome.createdCount,
        updated: job.outcome.updatedCount,
        failed: job.outcome.failedCount,
      },
      "Sync job completed"
    );
    return this.finish(job, "Succeeded");
  }

  private async applyRecord(
    target: SyncTarget,
    job: SyncJob,
    record: NetworkRecord,
    request: ApplyRequest,
    signal?: AbortSignal
  ): Promise<void> {
    const extattrs: ExtAttrs =
      record.mappedAttributes ?? mapTags(record.tags, request.mappings);

    let action: "update" | "create" | "lookup" = "lookup";
    try {
      const existing = await target.getNetworkBySubnet(
        record.subnet,
        request.networkView,
        signal
      );

      if (existing !== null) {
        action = "update";
        await target.updateNetwork(existing.ref, { extattrs }, signal);
        job.outcome.updatedCount++;
      } else {
        action = "create";
        await target.createNetwork(
          {
            subnet: record.subnet,
            networkView: request.networkView,
            comment: networkComment(record),
            extattrs,
          },
          signal
        );
        job.outcome.createdCount++;
      }
    } catch (error) {
      if (error instanceof AuthenticationError || signal?.aborted === true) {
        throw error;
      }

      const message =
        action === "lookup"
          ? `Error processing ${record.subnet}: ${errorMessage(error)}`
          : `Failed to ${action} ${record.subnet}: ${errorMessage(error)}`;
      job.outcome.failedCount++;
      job.outcome.errors.push(message);
      syncLogger.warn(
        { jobId: job.id, subnet: record.subnet, action },
        message
      );
    }
  }

  private async finish(
    job: SyncJob,
    state: "Succeeded" | "Failed" | "Cancelled",
    error?: string
  ): Promise<SyncJob> {
    job.state = state;
    if (error !== undefined) job.error = error;
    job.completedAt = new Date();
    await this.store.save(job);
    this.onProgress?.(job);
    return job;
  }
}
