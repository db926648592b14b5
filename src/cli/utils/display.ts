/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { ReconciliationSummary } from "../../services/reconcile/engine.js";
import type {
  AttributeDefinition,
  BatchCreateResult,
  MappingSuggestion,
  NetworkRecord,
  NetworkView,
  ReconciledRecord,
  SyncJob,
  SyncJobState,
} from "../../types/index.js";

function formatTags(tags: Record<string, string>): string {
  return Object.entries(tags)
    .map(([key, value]) => `${key}=${value}`)
    .join(", ");
}

function formatState(state: SyncJobState): string {
  switch (state) {
    case "Succeeded":
      return chalk.green(state);
    case "Failed":
      return chalk.red(state);
    case "Cancelled":
      return chalk.yellow(state);
    case "Running":
      return chalk.cyan(state);
    default:
      return chalk.gray(state);
  }
}

/**
 * Display parsed inventory records in a formatted table
 */
export function displayRecordsTable(records: NetworkRecord[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Subnet"),
      chalk.cyan("Account"),
      chalk.cyan("Region"),
      chalk.cyan("Tags"),
    ],
    colWidths: [20, 16, 14, 60],
    wordWrap: true,
  });

  for (const record of records) {
    table.push([
      chalk.green(record.subnet),
      record.account,
      record.region,
      formatTags(record.tags),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display mapping suggestions, one row per candidate attribute
 */
export function displaySuggestionsTable(
  suggestions: Record<string, MappingSuggestion>
): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Tag key"),
      chalk.cyan("Attribute"),
      chalk.cyan("Confidence"),
    ],
    colWidths: [30, 30, 12],
  });

  for (const [sourceKey, suggestion] of Object.entries(suggestions)) {
    if (suggestion.suggestions.length === 0) {
      table.push([sourceKey, chalk.gray("(new attribute)"), chalk.gray("-")]);
      continue;
    }
    for (const mapping of suggestion.suggestions) {
      table.push([
        sourceKey,
        mapping.exactMatch ? chalk.green(mapping.targetKey) : mapping.targetKey,
        mapping.confidence.toFixed(3),
      ]);
    }
  }

  console.log(table.toString());
}

export function displayReconciliationSummary(
  summary: ReconciliationSummary
): void {
  console.log(chalk.bold("\nReconciliation summary:"));
  console.log(`  Total:       ${String(summary.total)}`);
  console.log(`  New:         ${chalk.green(String(summary.new))}`);
  console.log(`  Existing:    ${chalk.gray(String(summary.existing))}`);
  console.log(`  Conflicting: ${chalk.yellow(String(summary.conflicting))}`);
  console.log();
}

/**
 * Display attribute conflicts, one row per differing attribute
 */
export function displayConflictsTable(records: ReconciledRecord[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Subnet"),
      chalk.cyan("Attribute"),
      chalk.cyan("Inventory"),
      chalk.cyan("DDI store"),
    ],
    colWidths: [20, 24, 30, 30],
    wordWrap: true,
  });

  for (const record of records) {
    for (const conflict of record.attributeConflicts ?? []) {
      table.push([
        record.subnet,
        conflict.attribute,
        chalk.green(conflict.sourceValue),
        chalk.red(conflict.targetValue),
      ]);
    }
  }

  console.log(table.toString());
}

export function displayViewsTable(views: NetworkView[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Network view"), chalk.cyan("Comment")],
    colWidths: [30, 60],
    wordWrap: true,
  });

  for (const view of views) {
    table.push([chalk.green(view.name), view.comment ?? ""]);
  }

  console.log(table.toString());
}

export function displayAttributesTable(attributes: AttributeDefinition[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Name"), chalk.cyan("Type"), chalk.cyan("Comment")],
    colWidths: [30, 10, 50],
    wordWrap: true,
  });

  for (const attribute of attributes) {
    table.push([
      chalk.green(attribute.name),
      attribute.type,
      attribute.comment ?? "",
    ]);
  }

  console.log(table.toString());
}

export function displayBatchResult(result: BatchCreateResult): void {
  console.log(chalk.bold("\nImport result:"));
  console.log(`  Created: ${chalk.green(String(result.createdCount))}`);
  console.log(`  Failed:  ${chalk.red(String(result.failedCount))}`);
  for (const error of result.errors) {
    console.log(`    ${chalk.red("✗")} ${error}`);
  }
  console.log();
}

/**
 * Display recent jobs in a formatted table
 */
export function displayJobsTable(jobs: SyncJob[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Job"),
      chalk.cyan("View"),
      chalk.cyan("State"),
      chalk.cyan("Progress"),
      chalk.cyan("Created"),
    ],
    colWidths: [38, 16, 12, 12, 22],
  });

  for (const job of jobs) {
    table.push([
      job.id,
      job.networkView,
      formatState(job.state),
      `${String(job.progress.current)}/${String(job.progress.total)}`,
      job.createdAt.toISOString().replace("T", " ").slice(0, 19),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display one job with its outcome and errors
 */
export function displayJob(job: SyncJob): void {
  console.log(chalk.bold.underline(`\nJob: ${job.id}\n`));
  console.log(`  Network view: ${job.networkView}`);
  console.log(`  State:        ${formatState(job.state)}`);
  console.log(
    `  Progress:     ${String(job.progress.current)}/${String(job.progress.total)} (${job.progress.message})`
  );
  console.log(`  Created:      ${job.createdAt.toISOString()}`);
  if (job.completedAt !== undefined) {
    console.log(`  Completed:    ${job.completedAt.toISOString()}`);
  }
  if (job.error !== undefined) {
    console.log(`  Error:        ${chalk.red(job.error)}`);
  }

  console.log(chalk.bold("\nOutcome:"));
  console.log(`  Created: ${chalk.green(String(job.outcome.createdCount))}`);
  console.log(`  Updated: ${chalk.cyan(String(job.outcome.updatedCount))}`);
  console.log(`  Failed:  ${chalk.red(String(job.outcome.failedCount))}`);
  for (const error of job.outcome.errors) {
    console.log(`    ${chalk.red("✗")} ${error}`);
  }
  console.log();
}
