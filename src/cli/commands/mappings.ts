import chalk from "chalk";
import ora from "ora";

import { withDdiClient } from "../../ddi/client.js";
import { errorMessage } from "../../errors.js";
import { collectTagKeys, readInventoryFile } from "../../inventory/parser.js";
import {
  AttributeMapper,
  DEFAULT_THRESHOLD,
} from "../../mapping/attribute-mapper.js";
import {
  mappingTableFromSuggestions,
  requireDdiConfig,
  writeMappingFile,
} from "../utils/context.js";
import { displaySuggestionsTable } from "../utils/display.js";

import type { Command } from "commander";

interface SuggestOptions {
  targets?: string;
  threshold: string;
  output?: string;
}

// ============================================================================
// Mapping Commands
// ============================================================================

export function registerMappingsCommand(program: Command): void {
  const mappings = program
    .command("mappings")
    .description("Map inventory tag keys to DDI extensible attributes");

  // mappings suggest <file>
  mappings
    .command("suggest <file>")
    .description("Suggest attribute names for every tag key in an inventory CSV")
    .option(
      "--targets <names>",
      "Comma-separated attribute names (default: fetch from the DDI store)"
    )
    .option("--threshold <score>", "Minimum similarity score", String(DEFAULT_THRESHOLD))
    .option("-o, --output <file>", "Write the best suggestions as a mapping file")
    .action(async (file: string, options: SuggestOptions) => {
      const spinner = ora(`Reading tag keys from ${file}...`).start();

      try {
        const threshold = Number(options.threshold);
        if (Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
          throw new Error("--threshold must be a number between 0 and 1");
        }

        const sourceKeys = collectTagKeys(
          await readInventoryFile(file, { invalidSubnets: "skip" })
        );

        let targetKeys: string[];
        if (options.targets !== undefined) {
          targetKeys = options.targets
            .split(",")
            .map((name) => name.trim())
            .filter((name) => name !== "");
        } else {
          spinner.text = "Fetching extensible attributes...";
          const attributes = await withDdiClient(requireDdiConfig(), (client) =>
            client.getExtensibleAttributes()
          );
          targetKeys = attributes.map((attribute) => attribute.name);
        }

        const suggestions = new AttributeMapper().suggestMappings(
          sourceKeys,
          targetKeys,
          threshold
        );
        spinner.succeed(
          `Matched ${String(sourceKeys.length)} tag keys against ${String(targetKeys.length)} attributes`
        );
        displaySuggestionsTable(suggestions);

        if (options.output !== undefined) {
          await writeMappingFile(
            options.output,
            mappingTableFromSuggestions(suggestions)
          );
          console.log(chalk.green(`Mapping file written to ${options.output}`));
        }
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
