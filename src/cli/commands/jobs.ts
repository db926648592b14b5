import chalk from "chalk";

import { closeDatabase, createDatabase } from "../../db/connection.js";
import { migrate } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { SqliteJobStore } from "../../services/sync/sqlite-job-store.js";
import { TERMINAL_JOB_STATES } from "../../types/index.js";
import { parseInteger } from "../utils/context.js";
import { displayJob, displayJobsTable } from "../utils/display.js";

import type { SyncJobState } from "../../types/index.js";
import type { Command } from "commander";

const JOB_STATES: readonly SyncJobState[] = [
  "Pending",
  "Running",
  ...TERMINAL_JOB_STATES,
];

// ============================================================================
// Job Commands
// ============================================================================

export function registerJobsCommand(program: Command): void {
  const jobs = program.command("jobs").description("Inspect sync jobs");

  // jobs list
  jobs
    .command("list")
    .description("List recent sync jobs, newest first")
    .option("-s, --state <state>", `Filter by state (${JOB_STATES.join(", ")})`)
    .option("-l, --limit <n>", "Maximum number of jobs", "20")
    .action(async (options: { state?: string; limit: string }) => {
      const db = createDatabase();

      try {
        await migrate(db);
        const state =
          options.state === undefined
            ? undefined
            : JOB_STATES.find((candidate) => candidate === options.state);
        if (options.state !== undefined && state === undefined) {
          throw new Error(`Unknown job state '${options.state}'`);
        }

        const list = await new SqliteJobStore(db).list({
          state,
          limit: parseInteger(options.limit),
        });
        if (list.length === 0) {
          console.log("No sync jobs found");
          return;
        }
        displayJobsTable(list);
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      } finally {
        await closeDatabase(db);
      }
    });

  // jobs show <id>
  jobs
    .command("show <jobId>")
    .description("Show a sync job's progress, outcome and errors")
    .action(async (jobId: string) => {
      const db = createDatabase();

      try {
        await migrate(db);
        const job = await new SqliteJobStore(db).get(jobId);
        if (job === null) {
          console.error(chalk.red(`Sync job '${jobId}' not found`));
          process.exitCode = 1;
          return;
        }
        displayJob(job);
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      } finally {
        await closeDatabase(db);
      }
    });
}
