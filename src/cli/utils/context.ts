/**
 * Shared plumbing for CLI commands: configuration, input files and the
 * mapping table.
 */

import { readFile, writeFile } from "node:fs/promises";

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { loadDdiConfig } from "../../config.js";
import { ConfigurationError, ValidationError } from "../../errors.js";
import { readInventoryFile } from "../../inventory/parser.js";
import { AttributeMapper } from "../../mapping/attribute-mapper.js";

import type { DdiClientConfig } from "../../ddi/config.js";
import type {
  MappingSuggestion,
  MappingTable,
  NetworkRecord,
} from "../../types/index.js";

const MappingTableFileSchema = Type.Record(Type.String(), Type.String());

export const DEFAULT_NETWORK_VIEW = "default";

/**
 * @throws ConfigurationError when DDI_HOST is not set
 */
export function requireDdiConfig(): DdiClientConfig {
  const config = loadDdiConfig();
  if (config === null) {
    throw new ConfigurationError(
      "DDI store is not configured; set DDI_HOST, DDI_USERNAME and DDI_PASSWORD"
    );
  }
  return config;
}

/**
 * Read a JSON mapping table (`{ "<tag key>": "<attribute name>" }`)
 */
export async function readMappingFile(path: string): Promise<MappingTable> {
  const parsed: unknown = JSON.parse(await readFile(path, "utf8"));
  if (!Value.Check(MappingTableFileSchema, parsed)) {
    throw new ValidationError(
      `Mapping file ${path} must be a JSON object of tag key to attribute name`
    );
  }
  return parsed;
}

export async function writeMappingFile(
  path: string,
  table: MappingTable
): Promise<void> {
  await writeFile(path, `${JSON.stringify(table, null, 2)}\n`, "utf8");
}

/**
 * Mapping table built from the best suggestion for each key
 */
export function mappingTableFromSuggestions(
  suggestions: Record<string, MappingSuggestion>
): MappingTable {
  const table: MappingTable = {};
  for (const [sourceKey, suggestion] of Object.entries(suggestions)) {
    table[sourceKey] = suggestion.suggestions[0]?.targetKey ?? "";
  }
  return table;
}

/**
 * Read an inventory file and attach mapped attributes when a mapping file is
 * given
 */
export async function loadRecords(
  file: string,
  options: { mappings?: string; skipInvalid?: boolean }
): Promise<{ records: NetworkRecord[]; mappings: MappingTable }> {
  const records = await readInventoryFile(file, {
    invalidSubnets: options.skipInvalid === true ? "skip" : "error",
  });
  if (options.mappings === undefined) {
    return { records, mappings: {} };
  }

  const mappings = await readMappingFile(options.mappings);
  return {
    records: new AttributeMapper().applyMappings(records, mappings),
    mappings,
  };
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ValidationError(`Expected a number, got '${value}'`);
  }
  return parsed;
}
