// pattern: Functional Core
// Types describing how a command is confined, without performing any I/O

import type { ResolvedPath } from "../../hermetic/types.js";

/**
 * Sandbox settings after config resolution, before the harness adds the
 * paths every build needs
 */
export interface SandboxConfig {
  /** Whether sandboxing is enabled */
  enabled: boolean;
  /** User-listed paths with read-execute permissions */
  allowRead: ResolvedPath[];
  /** User-listed paths with read-write-execute permissions */
  allowReadWrite: ResolvedPath[];
}

/**
 * Final sandbox configuration handed to a CommandBuilder.
 * There is no networking switch: a sandboxed command never gets a network.
 */
export interface FinalizedSandboxConfig {
  /** Whether sandboxing is enabled */
  enabled: boolean;
  /** Paths bound read-only */
  allowRead: ResolvedPath[];
  /** Paths bound read-write */
  allowReadWrite: ResolvedPath[];
}

/**
 * Platform identifiers for sandbox implementations
 */
export enum SandboxPlatform {
  Linux = "linux",
  MacOS = "darwin",
  Windows = "win32",
  Unknown = "unknown",
}

/**
 * Arguments prepared for sandbox execution
 */
export interface SandboxArgs {
  /** The sandbox executable (e.g., 'bwrap') */
  executable: string;
  /** Arguments to pass to the sandbox executable, ending with the command */
  args: string[];
}
