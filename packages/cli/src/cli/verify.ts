// pattern: Imperative Shell
// CLI command running the whole verification pipeline

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { Command } from "@commander-js/extra-typings";

import { runHermeticPipeline } from "../hermetic/pipeline/index.js";

import { withHarnessConfig } from "./_utils/with-harness-config.js";
import { parseTimeoutMs } from "./_utils/parse-options.js";
import { CLI_LOGGER } from "./_deps.js";

import type { PipelineReport } from "../hermetic/types.js";

async function writeReport(
  reportPath: string,
  report: PipelineReport
): Promise<void> {
  const target = resolve(reportPath);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, `${JSON.stringify(report, null, 2)}\n`, "utf8");
  CLI_LOGGER.debug(`Pipeline report written to ${target}`);
}

/**
 * Create the 'sealcheck verify' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeVerifyCommand() {
  return new Command("verify")
    .description(
      "Check the network is isolated, then build and smoke test offline"
    )
    .addHelpText(
      "before",
      `
Runs the four verification steps in order and stops at the first failure:
  1. probe        the probe URL must NOT be reachable
  2. environment  the prefetched environment file is loaded
  3. build        the toolchain builds the source tree with that environment
  4. smoke test   the artifact must exit 0 on the smoke test arguments

Exit codes: 0 verified, 10 network reachable, 11 environment file unusable,
12 build failed, 13 smoke test failed, 2 bad configuration.
      `
    )
    .addHelpText(
      "after",
      `
Examples:
  sealcheck verify                               Use sealcheck.yaml and defaults
  sealcheck verify --env-file deps/prefetch.env  Use another environment file
  sealcheck verify --sandbox                     Build inside a network-less sandbox
  sealcheck verify --report out/report.json      Also write the run report as JSON
      `
    )
    .option("--env-file <path>", "Environment file written by the prefetch step")
    .option("--source-dir <path>", "Source tree to build")
    .option("--output <path>", "Path the build writes the artifact to")
    .option("--probe-url <url>", "URL that must not be reachable")
    .option(
      "--probe-timeout <ms>",
      "Give up on the probe after this many milliseconds",
      parseTimeoutMs
    )
    .option("--sandbox", "Run the build and smoke test inside bubblewrap")
    .option("--no-sandbox", "Run the build and smoke test directly")
    .option("--report <path>", "Write the pipeline report as JSON")
    .action(
      withHarnessConfig(
        options => ({
          envFile: options.envFile,
          sourceDir: options.sourceDir,
          output: options.output,
          probeUrl: options.probeUrl,
          probeTimeoutMs: options.probeTimeout,
          sandbox: options.sandbox,
        }),
        async (config, options) => {
          const { report, error } = await runHermeticPipeline({
            config,
            logger: CLI_LOGGER,
          });

          if (options.report !== undefined) {
            await writeReport(options.report, report);
          }

          if (error) {
            throw error;
          }
        }
      )
    );
}
