// pattern: Imperative Shell

import { loadHarnessSettings } from "../../config/loaders/settings-harness.js";
import {
  type HarnessOverrides,
  resolveHarnessConfig,
  type ResolvedHarnessConfig,
} from "../../config/resolve.js";
import { CLI_LOGGER } from "../_deps.js";
import { getConfigPath, getNoParentFlag, getStartDir } from "../_globals.js";

import { withErrorHandling } from "./with-error-handling.js";

/**
 * Loads the config file chosen by the global options and resolves it
 * against the command's own overrides
 */
export async function loadResolvedHarnessConfig(
  overrides: HarnessOverrides = {}
): Promise<ResolvedHarnessConfig> {
  const loaded = await loadHarnessSettings({
    startDir: getStartDir(),
    configPath: getConfigPath(),
    noParent: getNoParentFlag(),
  });

  if (loaded.configPath) {
    CLI_LOGGER.debug(`Harness config loaded from: ${loaded.configPath}`);
  } else {
    CLI_LOGGER.debug(
      `No sealcheck config file found from ${loaded.baseDir}; using defaults`
    );
  }

  return resolveHarnessConfig(loaded.config, loaded.baseDir, overrides);
}

/**
 * Wraps a Commander action with config loading and error handling.
 * Error handling is the outer wrapper so it catches config loading errors too.
 *
 * @param overridesFrom Picks the config overrides out of the action's arguments
 * @param configAction Action that receives the resolved config first
 */
export function withHarnessConfig<Args extends unknown[]>(
  overridesFrom: (...args: Args) => HarnessOverrides,
  configAction: (
    config: ResolvedHarnessConfig,
    ...args: Args
  ) => Promise<void> | void
): (...args: Args) => Promise<void> {
  return withErrorHandling(async (...args: Args) => {
    const config = await loadResolvedHarnessConfig(overridesFrom(...args));
    await configAction(config, ...args);
  });
}
