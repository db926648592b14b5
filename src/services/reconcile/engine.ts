/**
 * Reconciliation Engine
 *
 * Classifies inventory records against the networks already in the DDI
 * store: absent (new), present with matching attributes (existing), or
 * present with differing attributes (conflicting). Pure; performs no I/O.
 */

import { mapTags } from "../../mapping/attribute-mapper.js";

import type {
  AttributeConflict,
  MappingTable,
  NetworkRecord,
  ReconciledRecord,
  ReconciliationResult,
  TargetNetwork,
} from "../../types/index.js";

export interface ReconcileOptions {
  /** Used for records that have no `mappedAttributes` yet */
  mappings?: MappingTable;
}

export interface CandidateSelection {
  existing?: boolean;
  conflicting?: boolean;
}

export interface ReconciliationSummary {
  total: number;
  new: number;
  existing: number;
  conflicting: number;
}

// ============================================================================
// Attribute comparison
// ============================================================================

/**
 * Attribute values as plain strings, with the `{ value }` envelope removed
 */
function unwrapValue(raw: unknown): string {
  const inner =
    typeof raw === "object" && raw !== null && "value" in raw
      ? raw.value
      : raw;

  if (typeof inner === "string") return inner;
  if (inner === null || inner === undefined) return "";
  if (typeof inner === "object") return JSON.stringify(inner);
  return String(inner);
}

function sourceAttributes(
  record: NetworkRecord,
  mappings: MappingTable | undefined
): Record<string, string> {
  const attributes =
    record.mappedAttributes ??
    (mappings === undefined ? undefined : mapTags(record.tags, mappings));
  if (attributes === undefined) return record.tags;

  const values: Record<string, string> = {};
  for (const [key, envelope] of Object.entries(attributes)) {
    values[key] = envelope.value;
  }
  return values;
}

/**
 * Attributes present on both sides whose string values differ, in source
 * key order
 */
export function compareAttributes(
  source: Record<string, string>,
  target: Record<string, unknown>
): AttributeConflict[] {
  const conflicts: AttributeConflict[] = [];
  for (const [attribute, sourceValue] of Object.entries(source)) {
    if (!Object.hasOwn(target, attribute)) continue;
    const targetValue = unwrapValue(target[attribute]);
    if (sourceValue !== targetValue) {
      conflicts.push({ attribute, sourceValue, targetValue });
    }
  }
  return conflicts;
}

// ============================================================================
// Reconciliation
// ============================================================================

export function reconcile(
  records: readonly NetworkRecord[],
  targets: readonly TargetNetwork[],
  options: ReconcileOptions = {}
): ReconciliationResult {
  // Later entries for the same CIDR replace earlier ones
  const byCidr = new Map<string, TargetNetwork>();
  for (const target of targets) {
    byCidr.set(target.cidr, target);
  }

  const result: ReconciliationResult = {
    new: [],
    existing: [],
    conflicting: [],
  };

  for (const record of records) {
    const target = byCidr.get(record.subnet);
    if (target === undefined) {
      result.new.push({ ...record });
      continue;
    }

    const conflicts = compareAttributes(
      sourceAttributes(record, options.mappings),
      target.extendedAttributes
    );

    if (conflicts.length === 0) {
      result.existing.push({ ...record, targetRef: target.ref });
    } else {
      result.conflicting.push({
        ...record,
        targetRef: target.ref,
        attributeConflicts: conflicts,
      });
    }
  }

  return result;
}

/**
 * Records to send to the apply phase. New records are always included;
 * existing and conflicting ones only when asked for.
 */
export function selectCandidates(
  result: ReconciliationResult,
  selection: CandidateSelection = {}
): ReconciledRecord[] {
  return [
    ...result.new,
    ...(selection.existing === true ? result.existing : []),
    ...(selection.conflicting === true ? result.conflicting : []),
  ];
}

export function summarize(
  result: ReconciliationResult
): ReconciliationSummary {
  return {
    total:
      result.new.length + result.existing.length + result.conflicting.length,
    new: result.new.length,
    existing: result.existing.length,
    conflicting: result.conflicting.length,
  };
}
