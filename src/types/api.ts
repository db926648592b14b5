/**
 * API Request/Response Types
 */

import type {
  SyncJobState,
  SyncOutcome,
  SyncProgress,
} from "./index.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Job Types
// ============================================================================

export interface SyncJobDto {
  id: string;
  networkView: string;
  state: SyncJobState;
  progress: SyncProgress;
  outcome: SyncOutcome;
  error: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}
