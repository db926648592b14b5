#!/usr/bin/env node

/**
 * DDI Inventory Sync CLI
 *
 * Reconciles cloud network inventory exports with a DDI store and applies
 * the differences.
 */

import { Command } from "commander";

import { registerApplyCommand } from "./commands/apply.js";
import { registerDiffCommand } from "./commands/diff.js";
import { registerImportCommand } from "./commands/import.js";
import { registerInventoryCommand } from "./commands/inventory.js";
import { registerJobsCommand } from "./commands/jobs.js";
import { registerMappingsCommand } from "./commands/mappings.js";
import { registerTargetCommand } from "./commands/target.js";

const program = new Command();

program
  .name("ddi-sync")
  .description("Reconcile cloud network inventory with a DDI store")
  .version("0.1.0");

// Register all commands
registerInventoryCommand(program);
registerTargetCommand(program);
registerMappingsCommand(program);
registerDiffCommand(program);
registerApplyCommand(program);
registerImportCommand(program);
registerJobsCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
