// pattern: Imperative Shell
// Picks the sandbox implementation for the current platform

import { SandboxImplementation } from "./base.js";
import { BwrapSandbox } from "./bwrap.js";
import { PassthroughSandbox } from "./passthrough.js";
import { getPlatform, isSandboxSupported } from "./platform.js";

import type { FinalizedSandboxConfig } from "./types.js";
import type { Logger } from "pino";

/**
 * Create a sandbox implementation appropriate for the current platform
 */
export function createSandbox(
  logger: Logger,
  config: FinalizedSandboxConfig
): SandboxImplementation {
  if (!config.enabled) {
    logger.debug("Sandboxing disabled, using passthrough implementation");
    return new PassthroughSandbox(logger, config);
  }

  if (!isSandboxSupported()) {
    logger.debug(
      { platform: getPlatform() },
      "Platform does not support sandboxing, using passthrough"
    );
    return new PassthroughSandbox(logger, config);
  }

  logger.debug("Using bubblewrap sandbox for Linux");
  return new BwrapSandbox(logger, config);
}
