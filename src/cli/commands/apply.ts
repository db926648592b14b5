import { randomUUID } from "node:crypto";

import ora from "ora";

import { closeDatabase, createDatabase } from "../../db/connection.js";
import { migrate } from "../../db/migrate.js";
import { withDdiClient } from "../../ddi/client.js";
import { errorMessage } from "../../errors.js";
import {
  reconcile,
  selectCandidates,
  summarize,
} from "../../services/reconcile/engine.js";
import {
  SyncOrchestrator,
  createSyncJob,
} from "../../services/sync/orchestrator.js";
import { SqliteJobStore } from "../../services/sync/sqlite-job-store.js";
import {
  DEFAULT_NETWORK_VIEW,
  loadRecords,
  parseInteger,
  requireDdiConfig,
} from "../utils/context.js";
import { displayJob, displayReconciliationSummary } from "../utils/display.js";

import type { Command } from "commander";

interface ApplyOptions {
  view: string;
  mappings?: string;
  skipInvalid?: boolean;
  updateExisting?: boolean;
  updateConflicting?: boolean;
  itemDelay: string;
}

// ============================================================================
// Apply Command
// ============================================================================

export function registerApplyCommand(program: Command): void {
  program
    .command("apply <file>")
    .description(
      "Create new networks (and optionally update existing ones) one at a time, tracked as a sync job"
    )
    .option("-v, --view <name>", "Network view", DEFAULT_NETWORK_VIEW)
    .option("-m, --mappings <file>", "JSON mapping file (tag key -> attribute)")
    .option("--skip-invalid", "Drop rows with invalid subnets instead of failing")
    .option("--update-existing", "Also write attributes of unchanged networks")
    .option(
      "--update-conflicting",
      "Overwrite attributes of networks whose values differ"
    )
    .option("--item-delay <ms>", "Pause between networks", "100")
    .action(async (file: string, options: ApplyOptions) => {
      const spinner = ora(`Reading ${file}...`).start();
      const db = createDatabase();
      const controller = new AbortController();
      const onInterrupt = (): void => {
        spinner.text = "Cancelling...";
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      try {
        await migrate(db);
        const { records, mappings } = await loadRecords(file, options);
        const itemDelayMs = parseInteger(options.itemDelay);

        const job = await withDdiClient(requireDdiConfig(), async (client) => {
          spinner.text = `Fetching networks in view ${options.view}...`;
          const targets = await client.listNetworksBatched(
            options.view,
            undefined,
            controller.signal
          );
          const result = reconcile(records, targets, { mappings });
          const candidates = selectCandidates(result, {
            existing: options.updateExisting,
            conflicting: options.updateConflicting,
          });

          spinner.stop();
          displayReconciliationSummary(summarize(result));
          spinner.start(`Applying ${String(candidates.length)} networks...`);

          const store = new SqliteJobStore(db);
          const orchestrator = new SyncOrchestrator(client, store, {
            itemDelayMs,
          });
          orchestrator.setProgressCallback((current) => {
            spinner.text = `Applying: ${String(current.progress.current)}/${String(current.progress.total)} (${current.progress.message})`;
          });

          const request = {
            records: candidates,
            networkView: options.view,
            mappings,
          };
          const pending = createSyncJob(randomUUID(), request);
          await store.save(pending);
          return orchestrator.run(pending, request, controller.signal);
        });

        if (job.state === "Succeeded" && job.outcome.failedCount === 0) {
          spinner.succeed(`Job ${job.id} completed`);
        } else if (job.state === "Succeeded") {
          spinner.warn(`Job ${job.id} completed with failures`);
          process.exitCode = 1;
        } else {
          spinner.fail(`Job ${job.id} ${job.state.toLowerCase()}`);
          process.exitCode = 1;
        }
        displayJob(job);
      } catch (error) {
        spinner.fail(`Apply failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        process.off("SIGINT", onInterrupt);
        await closeDatabase(db);
      }
    });
}
