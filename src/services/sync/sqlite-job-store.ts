/**
 * JobStore backed by the `sync_jobs` table (Kysely over better-sqlite3)
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { TERMINAL_JOB_STATES } from "../../types/index.js";
import { DEFAULT_LIST_LIMIT } from "./job-store.js";

import type { Database, NewSyncJobRow, SyncJobRow } from "../../db/schema.js";
import type { SyncJob, SyncJobState, SyncOutcome } from "../../types/index.js";
import type { JobStore, ListJobsOptions } from "./job-store.js";
import type { Kysely } from "kysely";

const SyncOutcomeSchema = Type.Object({
  createdCount: Type.Integer({ minimum: 0 }),
  updatedCount: Type.Integer({ minimum: 0 }),
  failedCount: Type.Integer({ minimum: 0 }),
  errors: Type.Array(Type.String()),
});

const JOB_STATES: readonly SyncJobState[] = [
  "Pending",
  "Running",
  ...TERMINAL_JOB_STATES,
];

function toState(value: string): SyncJobState {
  const state = JOB_STATES.find((candidate) => candidate === value);
  if (state === undefined) {
    throw new Error(`Unknown job state '${value}' in sync_jobs`);
  }
  return state;
}

function toOutcome(value: string, jobId: string): SyncOutcome {
  const parsed: unknown = JSON.parse(value);
  if (!Value.Check(SyncOutcomeSchema, parsed)) {
    throw new Error(`Malformed outcome for job ${jobId} in sync_jobs`);
  }
  return parsed;
}

function toDate(value: string | null): Date | undefined {
  return value === null ? undefined : new Date(value);
}

function toRow(job: SyncJob): NewSyncJobRow {
  return {
    id: job.id,
    network_view: job.networkView,
    state: job.state,
    progress_current: job.progress.current,
    progress_total: job.progress.total,
    progress_message: job.progress.message,
    outcome: JSON.stringify(job.outcome),
    error: job.error ?? null,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString() ?? null,
    completed_at: job.completedAt?.toISOString() ?? null,
  };
}

function fromRow(row: SyncJobRow): SyncJob {
  const job: SyncJob = {
    id: row.id,
    networkView: row.network_view,
    state: toState(row.state),
    progress: {
      current: row.progress_current,
      total: row.progress_total,
      message: row.progress_message,
    },
    outcome: toOutcome(row.outcome, row.id),
    createdAt: new Date(row.created_at),
  };

  const startedAt = toDate(row.started_at);
  const completedAt = toDate(row.completed_at);
  if (row.error !== null) job.error = row.error;
  if (startedAt !== undefined) job.startedAt = startedAt;
  if (completedAt !== undefined) job.completedAt = completedAt;
  return job;
}

export class SqliteJobStore implements JobStore {
  constructor(private readonly db: Kysely<Database>) {}

  async save(job: SyncJob): Promise<void> {
    const row = toRow(job);
    const { id: _id, created_at: _createdAt, ...changes } = row;

    await this.db
      .insertInto("sync_jobs")
      .values(row)
      .onConflict((oc) => oc.column("id").doUpdateSet(changes))
      .execute();
  }

  async get(id: string): Promise<SyncJob | null> {
    const row = await this.db
      .selectFrom("sync_jobs")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();

    return row === undefined ? null : fromRow(row);
  }

  async list(options: ListJobsOptions = {}): Promise<SyncJob[]> {
    let query = this.db
      .selectFrom("sync_jobs")
      .selectAll()
      .orderBy("created_at", "desc")
      .limit(options.limit ?? DEFAULT_LIST_LIMIT);

    if (options.state !== undefined) {
      query = query.where("state", "=", options.state);
    }

    const rows = await query.execute();
    return rows.map(fromRow);
  }
}
