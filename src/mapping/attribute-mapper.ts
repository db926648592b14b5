/**
 * Attribute Mapper
 *
 * Suggests which DDI extensible attribute a cloud tag key most likely
 * corresponds to, and rewrites record tags into attribute-value form.
 */

import synonymData from "./synonyms.json" with { type: "json" };
import { sequenceRatio } from "./similarity.js";

import type {
  AttributeMapping,
  AttributeType,
  ExtAttrs,
  MappingSuggestion,
  MappingTable,
  NetworkRecord,
} from "../types/index.js";

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_THRESHOLD = 0.8;
export const MAX_SUGGESTIONS = 3;

const SYNONYM_SCORE = 0.95;
const SUBSTRING_SCORE = 0.85;
const PREFIX_SCORE = 0.7;
const PREFIX_LENGTH = 3;

const EMAIL_PATTERN = /^[\w.-]+@[\w.-]+\.\w+$/;
const URL_PATTERN = /^https?:\/\/[\w.-]+/;

export interface ScoredAttribute {
  name: string;
  score: number;
}

export interface AttributeValueCheck {
  valid: boolean;
  message?: string;
}

// ============================================================================
// AttributeMapper
// ============================================================================

export class AttributeMapper {
  private readonly canonicalNames = new Map<string, string>();

  /**
   * @param synonymGroups - Groups of equivalent names; the first member of
   * each group is its canonical name.
   */
  constructor(
    synonymGroups: readonly (readonly string[])[] = synonymData.groups
  ) {
    for (const group of synonymGroups) {
      const canonical = group[0];
      if (canonical === undefined) continue;
      for (const variant of group) {
        this.canonicalNames.set(
          AttributeMapper.normalize(variant),
          AttributeMapper.normalize(canonical)
        );
      }
    }
  }

  /**
   * Lower-case and collapse runs of hyphens/whitespace into "_"
   */
  static normalize(name: string): string {
    return name.toLowerCase().replace(/[-\s]+/g, "_");
  }

  /**
   * Score how likely `target` is the attribute meant by `source`, in [0, 1].
   */
  score(source: string, target: string): number {
    const a = AttributeMapper.normalize(source);
    const b = AttributeMapper.normalize(target);

    let score = sequenceRatio(a, b);

    if (a.includes(b) || b.includes(a)) {
      score = Math.max(score, SUBSTRING_SCORE);
    }

    if (
      a.startsWith(b.slice(0, PREFIX_LENGTH)) ||
      b.startsWith(a.slice(0, PREFIX_LENGTH))
    ) {
      score = Math.max(score, PREFIX_SCORE);
    }

    const canonicalA = this.canonicalNames.get(a);
    if (canonicalA !== undefined && canonicalA === this.canonicalNames.get(b)) {
      score = Math.max(score, SYNONYM_SCORE);
    }

    return score;
  }

  /**
   * Target attributes scoring at or above `threshold`, best first.
   * Equal scores are ordered by attribute name.
   */
  findSimilarAttributes(
    source: string,
    targets: readonly string[],
    threshold = DEFAULT_THRESHOLD
  ): ScoredAttribute[] {
    const matches: ScoredAttribute[] = [];
    for (const name of new Set(targets)) {
      if (name.trim() === "") continue;
      const score = this.score(source, name);
      if (score >= threshold) {
        matches.push({ name, score });
      }
    }

    return matches.sort(
      (left, right) =>
        right.score - left.score || compareNames(left.name, right.name)
    );
  }

  /**
   * Up to three candidate attributes per source tag key
   */
  suggestMappings(
    sourceKeys: readonly string[],
    targetKeys: readonly string[],
    threshold = DEFAULT_THRESHOLD
  ): Record<string, MappingSuggestion> {
    const result: Record<string, MappingSuggestion> = {};

    for (const sourceKey of sourceKeys) {
      const suggestions: AttributeMapping[] = this.findSimilarAttributes(
        sourceKey,
        targetKeys,
        threshold
      )
        .slice(0, MAX_SUGGESTIONS)
        .map(({ name, score }) => ({
          sourceKey,
          targetKey: name,
          confidence: Math.round(score * 1000) / 1000,
          exactMatch: score === 1,
        }));

      result[sourceKey] = { suggestions, canCreateNew: true };
    }

    return result;
  }

  /**
   * Rewrite each record's tags into `mappedAttributes` using `table`
   * (source tag key -> attribute name, "" to skip). Unmapped tags are
   * dropped. Records are copied, never mutated.
   */
  applyMappings(
    records: readonly NetworkRecord[],
    table: MappingTable
  ): NetworkRecord[] {
    return records.map((record) => ({
      ...record,
      mappedAttributes: mapTags(record.tags, table),
    }));
  }

  validateAttributeValue(
    value: string,
    type: AttributeType = "STRING"
  ): AttributeValueCheck {
    switch (type) {
      case "INTEGER":
        return /^[+-]?\d+$/.test(value.trim())
          ? { valid: true }
          : { valid: false, message: `Value '${value}' is not a valid integer` };
      case "EMAIL":
        return EMAIL_PATTERN.test(value)
          ? { valid: true }
          : {
              valid: false,
              message: `Value '${value}' is not a valid email address`,
            };
      case "URL":
        return URL_PATTERN.test(value)
          ? { valid: true }
          : { valid: false, message: `Value '${value}' is not a valid URL` };
      default:
        return { valid: true };
    }
  }
}

function compareNames(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Map tags through a mapping table into the DDI attribute-value envelope
 */
export function mapTags(
  tags: Record<string, string>,
  table: MappingTable
): ExtAttrs {
  const mapped: ExtAttrs = {};
  for (const [tagKey, tagValue] of Object.entries(tags)) {
    if (!Object.hasOwn(table, tagKey)) continue;
    const targetKey = table[tagKey];
    if (targetKey === undefined || targetKey === "") continue;
    mapped[targetKey] = { value: tagValue };
  }
  return mapped;
}
