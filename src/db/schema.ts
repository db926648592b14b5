import type { Insertable, Selectable } from "kysely";

// ============================================================================
// Table Types
// ============================================================================

export interface SyncJobsTable {
  id: string;
  network_view: string;
  state: string;
  progress_current: number;
  progress_total: number;
  progress_message: string;
  /** JSON-encoded SyncOutcome */
  outcome: string;
  error: string | null;
  created_at: string; // ISO-8601
  started_at: string | null;
  completed_at: string | null;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  sync_jobs: SyncJobsTable;
}

// ============================================================================
// Helper Types
// ============================================================================

export type SyncJobRow = Selectable<SyncJobsTable>;
export type NewSyncJobRow = Insertable<SyncJobsTable>;
