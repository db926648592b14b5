import ora from "ora";

import { withDdiClient } from "../../ddi/client.js";
import { errorMessage } from "../../errors.js";
import { reconcile } from "../../services/reconcile/engine.js";
import { networkComment } from "../../services/sync/orchestrator.js";
import {
  DEFAULT_NETWORK_VIEW,
  loadRecords,
  parseInteger,
  requireDdiConfig,
} from "../utils/context.js";
import { displayBatchResult } from "../utils/display.js";

import type { NetworkCandidate } from "../../types/index.js";
import type { Command } from "commander";

interface ImportOptions {
  view: string;
  mappings?: string;
  skipInvalid?: boolean;
  batchSize: string;
  batchDelay: string;
}

// ============================================================================
// Import Command
// ============================================================================

export function registerImportCommand(program: Command): void {
  program
    .command("import <file>")
    .description(
      "Bulk-create the networks that are missing from a DDI view, in concurrent batches"
    )
    .option("-v, --view <name>", "Network view", DEFAULT_NETWORK_VIEW)
    .option("-m, --mappings <file>", "JSON mapping file (tag key -> attribute)")
    .option("--skip-invalid", "Drop rows with invalid subnets instead of failing")
    .option("--batch-size <n>", "Networks created concurrently", "10")
    .option("--batch-delay <ms>", "Pause between batches", "500")
    .action(async (file: string, options: ImportOptions) => {
      const spinner = ora(`Reading ${file}...`).start();

      try {
        const { records, mappings } = await loadRecords(file, options);
        const batchSize = parseInteger(options.batchSize);
        const batchDelayMs = parseInteger(options.batchDelay);

        const result = await withDdiClient(requireDdiConfig(), async (client) => {
          spinner.text = `Fetching networks in view ${options.view}...`;
          const targets = await client.listNetworksBatched(options.view);
          const missing = reconcile(records, targets, { mappings }).new;

          const candidates: NetworkCandidate[] = missing.map((record) => ({
            subnet: record.subnet,
            comment: networkComment(record),
            extattrs: record.mappedAttributes,
          }));

          spinner.text = `Creating ${String(candidates.length)} networks...`;
          return client.createNetworksBatch(candidates, options.view, {
            batchSize,
            batchDelayMs,
          });
        });

        if (result.failedCount === 0) {
          spinner.succeed(`Created ${String(result.createdCount)} networks`);
        } else {
          spinner.warn(
            `Created ${String(result.createdCount)} networks, ${String(result.failedCount)} failed`
          );
          process.exitCode = 1;
        }
        displayBatchResult(result);
      } catch (error) {
        spinner.fail(`Import failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
