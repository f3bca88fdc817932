// pattern: Imperative Shell
// CLI command running only the network isolation probe

import { Command } from "@commander-js/extra-typings";

import { assertNetworkIsolated } from "../hermetic/probe/index.js";

import { withHarnessConfig } from "./_utils/with-harness-config.js";
import { parseTimeoutMs } from "./_utils/parse-options.js";
import { CLI_LOGGER } from "./_deps.js";

/**
 * Create the 'sealcheck probe' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeProbeCommand() {
  return new Command("probe")
    .description("Check that the probe URL cannot be reached")
    .addHelpText(
      "after",
      `
Exits 0 when the network is isolated and 10 when the probe URL answered.

Examples:
  sealcheck probe                                  Probe the configured URL
  sealcheck probe --probe-url https://example.com  Probe another host
  sealcheck probe --json                           Print the probe result as JSON
      `
    )
    .option("--probe-url <url>", "URL that must not be reachable")
    .option(
      "--probe-timeout <ms>",
      "Give up on the probe after this many milliseconds",
      parseTimeoutMs
    )
    .option("--json", "Print the probe result as JSON", false)
    .action(
      withHarnessConfig(
        options => ({
          probeUrl: options.probeUrl,
          probeTimeoutMs: options.probeTimeout,
        }),
        async (config, options) => {
          const result = await assertNetworkIsolated({
            url: config.probe.url,
            timeoutMs: config.probe.timeoutMs,
            logger: CLI_LOGGER,
          });

          if (options.json) {
            process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
          } else {
            CLI_LOGGER.info(
              `${result.url} is unreachable (${result.reason}) after ${result.elapsedMs}ms: ${result.detail}`
            );
          }
        }
      )
    );
}
