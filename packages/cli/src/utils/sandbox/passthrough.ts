// pattern: Imperative Shell
// Passthrough implementation that doesn't actually sandbox.
// Used for unsupported platforms or when sandboxing is disabled.

import { SandboxImplementation } from "./base.js";
import { getPlatform } from "./platform.js";

import type { SandboxArgs } from "./types.js";

/**
 * Passthrough sandbox implementation that doesn't apply any sandboxing.
 * Used when sandboxing is disabled or on platforms without bubblewrap.
 */
export class PassthroughSandbox extends SandboxImplementation {
  private hasLoggedWarning = false;

  readonly name = "passthrough";

  buildSandboxArgs(
    _command: string,
    _args: string[],
    _cwd?: string
  ): SandboxArgs | null {
    if (!this.hasLoggedWarning && this.config.enabled) {
      this.logger.warn(
        { platform: getPlatform() },
        "Sandboxing requested but only available on Linux. " +
          "The build will run without network isolation; a toolchain that " +
          "falls back to the network will not be caught."
      );
      this.hasLoggedWarning = true;
    }

    return null;
  }

  async validate(): Promise<boolean> {
    return true;
  }
}
