/**
 * Domain types for inventory records, DDI networks, mappings and sync jobs
 */

// ============================================================================
// Inventory
// ============================================================================

/**
 * Attribute value envelope used by the DDI store for extensible attributes
 */
export interface ExtAttrValue {
  value: string;
}

export type ExtAttrs = Record<string, ExtAttrValue>;

/**
 * One network from a cloud inventory export, in canonical form.
 */
export interface NetworkRecord {
  /** Canonical IPv4 CIDR, e.g. "10.0.0.0/24" */
  subnet: string;
  account: string;
  region: string;
  tags: Record<string, string>;
  /** The whole input row, keyed by the original header names */
  rawFields: Record<string, string>;
  /** Set by the attribute mapper; keyed by target attribute name */
  mappedAttributes?: ExtAttrs;
}

// ============================================================================
// DDI store
// ============================================================================

export interface TargetNetwork {
  cidr: string;
  ref: string;
  /** Raw attribute values as returned by the store (usually `{ value }`) */
  extendedAttributes: Record<string, unknown>;
  comment: string;
}

export interface NetworkView {
  name: string;
  comment?: string;
}

export type AttributeType =
  | "STRING"
  | "INTEGER"
  | "EMAIL"
  | "URL"
  | "DATE"
  | "ENUM";

export interface AttributeDefinition {
  name: string;
  type: string;
  comment?: string;
}

/**
 * A network to create through the batch path
 */
export interface NetworkCandidate {
  subnet: string;
  comment?: string;
  extattrs?: ExtAttrs;
}

export interface BatchCreateResult {
  createdCount: number;
  failedCount: number;
  errors: string[];
}

// ============================================================================
// Attribute mapping
// ============================================================================

export interface AttributeMapping {
  sourceKey: string;
  targetKey: string;
  /** In [0, 1] */
  confidence: number;
  exactMatch: boolean;
}

export interface MappingSuggestion {
  suggestions: AttributeMapping[];
  canCreateNew: boolean;
}

/** Source tag key -> target attribute name ("" skips the tag) */
export type MappingTable = Record<string, string>;

// ============================================================================
// Reconciliation
// ============================================================================

export interface AttributeConflict {
  attribute: string;
  sourceValue: string;
  targetValue: string;
}

export interface ReconciledRecord extends NetworkRecord {
  targetRef?: string;
  attributeConflicts?: AttributeConflict[];
}

export interface ReconciliationResult {
  new: ReconciledRecord[];
  existing: ReconciledRecord[];
  conflicting: ReconciledRecord[];
}

// ============================================================================
// Sync jobs
// ============================================================================

export type SyncJobState =
  | "Pending"
  | "Running"
  | "Succeeded"
  | "Failed"
  | "Cancelled";

export const TERMINAL_JOB_STATES: readonly SyncJobState[] = [
  "Succeeded",
  "Failed",
  "Cancelled",
];

export interface SyncProgress {
  current: number;
  total: number;
  message: string;
}

export interface SyncOutcome {
  createdCount: number;
  updatedCount: number;
  failedCount: number;
  errors: string[];
}

export interface SyncJob {
  id: string;
  networkView: string;
  state: SyncJobState;
  progress: SyncProgress;
  outcome: SyncOutcome;
  /** Job-level failure reason (Failed/Cancelled only) */
  error?: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface ApplyRequest {
  records: NetworkRecord[];
  networkView: string;
  mappings: MappingTable;
}
