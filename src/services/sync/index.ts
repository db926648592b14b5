// Sync Services - Re-exports
export {
  SyncOrchestrator,
  createSyncJob,
  networkComment,
  DEFAULT_ITEM_DELAY_MS,
  type SyncTarget,
  type SyncOrchestratorOptions,
} from "./orchestrator.js";
export { SyncJobQueue, type SyncJobQueueOptions } from "./queue.js";
export {
  MemoryJobStore,
  type JobStore,
  type ListJobsOptions,
} from "./job-store.js";
export { SqliteJobStore } from "./sqlite-job-store.js";
