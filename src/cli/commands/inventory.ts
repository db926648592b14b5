import chalk from "chalk";
import ora from "ora";

import { errorMessage } from "../../errors.js";
import { collectTagKeys, readInventoryFile } from "../../inventory/parser.js";
import { displayRecordsTable } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Inventory Commands
// ============================================================================

export function registerInventoryCommand(program: Command): void {
  const inventory = program
    .command("inventory")
    .description("Inspect cloud inventory exports");

  // inventory parse <file>
  inventory
    .command("parse <file>")
    .description("Parse an inventory CSV and show the canonical records")
    .option("--skip-invalid", "Drop rows with invalid subnets instead of failing")
    .option("--json", "Print records as JSON")
    .action(
      async (file: string, options: { skipInvalid?: boolean; json?: boolean }) => {
        const spinner = ora(`Parsing ${file}...`).start();

        try {
          const records = await readInventoryFile(file, {
            invalidSubnets: options.skipInvalid === true ? "skip" : "error",
          });
          spinner.succeed(`Parsed ${String(records.length)} records`);

          if (options.json === true) {
            console.log(JSON.stringify(records, null, 2));
          } else {
            displayRecordsTable(records);
          }
        } catch (error) {
          spinner.fail(`Parse failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      }
    );

  // inventory tags <file>
  inventory
    .command("tags <file>")
    .description("List the distinct tag keys found in an inventory CSV")
    .option("--skip-invalid", "Drop rows with invalid subnets instead of failing")
    .action(async (file: string, options: { skipInvalid?: boolean }) => {
      try {
        const records = await readInventoryFile(file, {
          invalidSubnets: options.skipInvalid === true ? "skip" : "error",
        });
        const keys = collectTagKeys(records);

        console.log(chalk.bold(`\nTag keys (${String(keys.length)}):\n`));
        for (const key of keys) {
          console.log(`  ${chalk.cyan(key)}`);
        }
        console.log();
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
