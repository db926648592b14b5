import ora from "ora";

import { withDdiClient } from "../../ddi/client.js";
import { errorMessage } from "../../errors.js";
import { reconcile, summarize } from "../../services/reconcile/engine.js";
import {
  DEFAULT_NETWORK_VIEW,
  loadRecords,
  requireDdiConfig,
} from "../utils/context.js";
import {
  displayConflictsTable,
  displayReconciliationSummary,
} from "../utils/display.js";

import type { Command } from "commander";

interface DiffOptions {
  view: string;
  mappings?: string;
  skipInvalid?: boolean;
  json?: boolean;
}

// ============================================================================
// Diff Command
// ============================================================================

export function registerDiffCommand(program: Command): void {
  program
    .command("diff <file>")
    .description("Compare an inventory CSV with the networks in a DDI view")
    .option("-v, --view <name>", "Network view", DEFAULT_NETWORK_VIEW)
    .option("-m, --mappings <file>", "JSON mapping file (tag key -> attribute)")
    .option("--skip-invalid", "Drop rows with invalid subnets instead of failing")
    .option("--json", "Print the full reconciliation result as JSON")
    .action(async (file: string, options: DiffOptions) => {
      const spinner = ora(`Reading ${file}...`).start();

      try {
        const { records, mappings } = await loadRecords(file, options);

        spinner.text = `Fetching networks in view ${options.view}...`;
        const targets = await withDdiClient(requireDdiConfig(), (client) =>
          client.listNetworksBatched(options.view)
        );

        const result = reconcile(records, targets, { mappings });
        spinner.succeed(
          `Compared ${String(records.length)} records with ${String(targets.length)} networks`
        );

        if (options.json === true) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }

        displayReconciliationSummary(summarize(result));
        if (result.conflicting.length > 0) {
          displayConflictsTable(result.conflicting);
        }
      } catch (error) {
        spinner.fail(`Diff failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
