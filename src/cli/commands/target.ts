import chalk from "chalk";
import ora from "ora";

import { withDdiClient } from "../../ddi/client.js";
import { errorMessage } from "../../errors.js";
import { requireDdiConfig } from "../utils/context.js";
import { displayAttributesTable, displayViewsTable } from "../utils/display.js";

import type { AttributeType } from "../../types/index.js";
import type { Command } from "commander";

const ATTRIBUTE_TYPES: readonly AttributeType[] = [
  "STRING",
  "INTEGER",
  "EMAIL",
  "URL",
  "DATE",
  "ENUM",
];

function parseAttributeType(value: string): AttributeType {
  const type = ATTRIBUTE_TYPES.find(
    (candidate) => candidate === value.toUpperCase()
  );
  if (type === undefined) {
    throw new Error(
      `Unknown attribute type '${value}' (expected ${ATTRIBUTE_TYPES.join(", ")})`
    );
  }
  return type;
}

// ============================================================================
// Target Store Commands
// ============================================================================

export function registerTargetCommand(program: Command): void {
  const target = program
    .command("target")
    .description("Query and configure the DDI store");

  // target ping
  target
    .command("ping")
    .description("Check that the DDI store is reachable with the configured credentials")
    .action(async () => {
      const spinner = ora("Connecting to DDI store...").start();

      try {
        const config = requireDdiConfig();
        const reachable = await withDdiClient(config, (client) =>
          client.testConnection()
        );

        if (reachable) {
          spinner.succeed(`Connected to ${config.host}`);
        } else {
          spinner.fail(`DDI store at ${config.host} is not reachable`);
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.fail(`Connection failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // target views
  target
    .command("views")
    .description("List network views")
    .action(async () => {
      const spinner = ora("Fetching network views...").start();

      try {
        const views = await withDdiClient(requireDdiConfig(), (client) =>
          client.getNetworkViews()
        );
        spinner.succeed(`Found ${String(views.length)} network views`);
        displayViewsTable(views);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // target attributes
  target
    .command("attributes")
    .description("List extensible attribute definitions")
    .action(async () => {
      const spinner = ora("Fetching extensible attributes...").start();

      try {
        const attributes = await withDdiClient(requireDdiConfig(), (client) =>
          client.getExtensibleAttributes()
        );
        spinner.succeed(`Found ${String(attributes.length)} attributes`);
        displayAttributesTable(attributes);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // target create-attribute <name>
  target
    .command("create-attribute <name>")
    .description("Define a new extensible attribute")
    .option("-t, --type <type>", "Attribute type", "STRING")
    .option("-c, --comment <text>", "Description", "")
    .action(
      async (name: string, options: { type: string; comment: string }) => {
        const spinner = ora(`Creating attribute ${name}...`).start();

        try {
          const type = parseAttributeType(options.type);
          const ref = await withDdiClient(requireDdiConfig(), (client) =>
            client.createExtensibleAttribute({
              name,
              type,
              comment: options.comment,
            })
          );
          spinner.succeed(`Created attribute ${chalk.green(name)}`);
          console.log(chalk.gray(`  ${ref}`));
        } catch (error) {
          spinner.fail(`Failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      }
    );
}
