// pattern: Imperative Shell
// CLI command loading the prefetched environment on its own

import { Command } from "@commander-js/extra-typings";

import {
  formatOverlay,
  loadEnvironmentFile,
} from "../hermetic/env-loader/index.js";

import { withHarnessConfig } from "./_utils/with-harness-config.js";
import { parseChoice } from "./_utils/parse-options.js";
import { CLI_LOGGER } from "./_deps.js";

const OVERLAY_FORMATS = ["env", "json"] as const;

/**
 * Create the 'sealcheck env' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeEnvCommand() {
  return new Command("env")
    .description("Load the environment file and print the variables it sets")
    .addHelpText(
      "after",
      `
Validates the environment file without building anything. Exits 11 when the
file is missing or malformed.

Examples:
  sealcheck env                                Print the overlay as export lines
  sealcheck env --format json                  Print the overlay as JSON
  sealcheck env --env-file deps/prefetch.json  Check another file
      `
    )
    .option("--env-file <path>", "Environment file written by the prefetch step")
    .option(
      "--format <format>",
      "Output format (env or json)",
      parseChoice(OVERLAY_FORMATS),
      "env" as const
    )
    .action(
      withHarnessConfig(
        options => ({ envFile: options.envFile }),
        async (config, options) => {
          const overlay = await loadEnvironmentFile({
            filePath: config.environment.file,
            format: config.environment.format,
            logger: CLI_LOGGER,
          });

          CLI_LOGGER.debug(
            `Loaded ${Object.keys(overlay).length} variables from ${config.environment.file}`
          );
          process.stdout.write(formatOverlay(overlay, options.format));
        }
      )
    );
}
