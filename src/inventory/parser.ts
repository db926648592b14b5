/**
 * Inventory Parser
 *
 * Turns a cloud network export (CSV with a header row) into canonical
 * NetworkRecords. Required columns are matched case-insensitively; the tag
 * column may be called TAG or TAGS.
 */

import { readFile } from "node:fs/promises";

import { CsvError, parse } from "csv-parse/sync";

import { ValidationError } from "../errors.js";
import { inventoryLogger } from "../logger.js";
import { canonicalizeSubnet } from "./subnet.js";

import type { NetworkRecord } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export const REQUIRED_COLUMNS = ["subnet", "account", "region"] as const;
export const TAG_COLUMN_NAMES = ["TAG", "TAGS"] as const;

type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export interface ParseInventoryOptions {
  /**
   * What to do with rows whose subnet is not a valid network:
   * "error" (default) rejects the whole file, "skip" drops the rows.
   */
  invalidSubnets?: "error" | "skip";
}

export interface InvalidRow {
  row: number;
  subnet: string;
  reason: string;
}

interface ColumnLayout {
  headers: string[];
  required: Record<RequiredColumn, number>;
  tag: number;
}

// ============================================================================
// Tag parsing
// ============================================================================

type TagStrategy = (text: string) => Record<string, string> | null;

function stringifyTagValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (value === null || value === undefined) return "";
  return JSON.stringify(value);
}

const parseJsonTags: TagStrategy = (text) => {
  if (!text.startsWith("{")) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const tags: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    tags[key.trim()] = stringifyTagValue(value);
  }
  return tags;
};

function delimitedPairs(separator: "=" | ":"): TagStrategy {
  return (text) => {
    if (!text.includes(separator)) return null;

    const tags: Record<string, string> = {};
    for (const pair of text.split(/[,;]/)) {
      const index = pair.indexOf(separator);
      if (index === -1) continue;
      const key = pair.slice(0, index).trim();
      if (key === "") continue;
      tags[key] = pair.slice(index + 1).trim();
    }
    return Object.keys(tags).length > 0 ? tags : null;
  };
}

const TAG_STRATEGIES: readonly TagStrategy[] = [
  parseJsonTags,
  delimitedPairs("="),
  delimitedPairs(":"),
];

/**
 * Parse a tag cell into a key/value map.
 *
 * Accepted formats, tried in order: a JSON object, `k=v` pairs and `k:v`
 * pairs (pairs separated by `,` or `;`). Anything else yields no tags.
 */
export function parseTags(
  cell: string | null | undefined
): Record<string, string> {
  const text = (cell ?? "").trim();
  if (text === "") return {};

  for (const strategy of TAG_STRATEGIES) {
    const tags = strategy(text);
    if (tags !== null) return tags;
  }

  inventoryLogger.debug({ cell: text }, "Unparsable tag cell, ignoring");
  return {};
}

// ============================================================================
// Column handling
// ============================================================================

function isRowArray(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) =>
        Array.isArray(row) && row.every((cell) => typeof cell === "string")
    )
  );
}

function resolveColumns(headers: string[]): ColumnLayout {
  const normalized = headers.map((header) => header.trim().toLowerCase());
  const required: Record<RequiredColumn, number> = {
    subnet: normalized.indexOf("subnet"),
    account: normalized.indexOf("account"),
    region: normalized.indexOf("region"),
  };
  const missing: string[] = REQUIRED_COLUMNS.filter(
    (column) => required[column] === -1
  );

  const tag = normalized.findIndex((header) =>
    TAG_COLUMN_NAMES.some((name) => name.toLowerCase() === header)
  );
  if (tag === -1) {
    missing.push(TAG_COLUMN_NAMES[0]);
  }

  if (missing.length > 0) {
    throw new ValidationError(
      `Missing required columns: ${missing.join(", ")}`,
      { missingColumns: missing }
    );
  }

  return { headers: headers.map((header) => header.trim()), required, tag };
}

// ============================================================================
// Parsing
// ============================================================================

function readCsv(input: string | Buffer): unknown {
  try {
    return parse(input, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new ValidationError("Inventory file could not be read as CSV", {
        reason: error.message,
      });
    }
    throw error;
  }
}

/**
 * Parse an inventory export into canonical records, in input row order.
 */
export function parseInventory(
  input: string | Buffer,
  options: ParseInventoryOptions = {}
): NetworkRecord[] {
  const invalidSubnets = options.invalidSubnets ?? "error";

  const parsed = readCsv(input);
  if (!isRowArray(parsed)) {
    throw new ValidationError("Inventory file could not be read as a table");
  }

  const [headerRow = [], ...rows] = parsed;
  const layout = resolveColumns(headerRow);

  const records: NetworkRecord[] = [];
  const invalid: InvalidRow[] = [];

  for (const [index, row] of rows.entries()) {
    // Row numbers are 1-based and count the header
    const rowNumber = index + 2;
    const cell = (column: number): string => row[column] ?? "";

    const subnetText = cell(layout.required.subnet).trim();
    if (subnetText === "") continue;

    const subnet = canonicalizeSubnet(subnetText);
    if (!subnet.ok) {
      invalid.push({
        row: rowNumber,
        subnet: subnetText,
        reason: subnet.reason,
      });
      continue;
    }

    const rawFields: Record<string, string> = {};
    for (const [column, header] of layout.headers.entries()) {
      rawFields[header] = cell(column);
    }

    records.push({
      subnet: subnet.cidr,
      account: cell(layout.required.account).trim(),
      region: cell(layout.required.region).trim(),
      tags: parseTags(cell(layout.tag)),
      rawFields,
    });
  }

  if (invalid.length > 0) {
    if (invalidSubnets === "error") {
      throw new ValidationError(
        `Invalid subnet in ${String(invalid.length)} row(s)`,
        { invalidRows: invalid }
      );
    }
    inventoryLogger.warn(
      { invalidRows: invalid },
      "Skipping rows with invalid subnets"
    );
  }

  inventoryLogger.debug(
    { records: records.length, rows: rows.length },
    "Parsed inventory"
  );

  return records;
}

/**
 * Read and parse an inventory export from disk
 */
export async function readInventoryFile(
  path: string,
  options?: ParseInventoryOptions
): Promise<NetworkRecord[]> {
  inventoryLogger.info({ path }, "Reading inventory file");
  const content = await readFile(path);
  return parseInventory(content, options);
}

/**
 * Sorted, de-duplicated tag keys across all records
 */
export function collectTagKeys(records: readonly NetworkRecord[]): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record.tags)) {
      keys.add(key);
    }
  }
  return [...keys].sort();
}

/**
 * Canonicalize the subnets of records received from outside the parser
 * (e.g. an API request body).
 *
 * @throws ValidationError listing every record with an invalid subnet
 */
export function canonicalizeRecords(
  records: readonly NetworkRecord[]
): NetworkRecord[] {
  const invalid: InvalidRow[] = [];
  const canonical: NetworkRecord[] = [];

  for (const [index, record] of records.entries()) {
    const subnet = canonicalizeSubnet(record.subnet);
    if (subnet.ok) {
      canonical.push({ ...record, subnet: subnet.cidr });
    } else {
      invalid.push({
        row: index + 1,
        subnet: record.subnet,
        reason: subnet.reason,
      });
    }
  }

  if (invalid.length > 0) {
    throw new ValidationError(
      `Invalid subnet in ${String(invalid.length)} record(s)`,
      { invalidRows: invalid }
    );
  }
  return canonical;
}
