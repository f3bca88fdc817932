// pattern: Mixed (unavoidable)
// Abstract base class for sandbox implementations. Building arguments is pure;
// validation probes the host for the sandbox binary.

import type { FinalizedSandboxConfig, SandboxArgs } from "./types.js";
import type { Logger } from "pino";

/**
 * Abstract base class for platform-specific sandbox implementations.
 * Provides the interface for building sandbox command arguments.
 */
export abstract class SandboxImplementation {
  protected logger: Logger;
  protected config: FinalizedSandboxConfig;

  constructor(logger: Logger, config: FinalizedSandboxConfig) {
    this.logger = logger;
    this.config = config;
  }

  /**
   * Build the sandbox invocation wrapping the given command.
   *
   * @param cwd Directory the command must start in, inside the sandbox
   * @returns The sandbox executable and arguments, or null if the command runs as-is
   */
  abstract buildSandboxArgs(
    command: string,
    args: string[],
    cwd?: string
  ): SandboxArgs | null;

  /**
   * Validate that the sandbox binary is available and functional.
   * This should be called before attempting to use the sandbox.
   */
  abstract validate(): Promise<boolean>;

  /**
   * Get a human-readable name for this sandbox implementation
   */
  abstract get name(): string;
}
