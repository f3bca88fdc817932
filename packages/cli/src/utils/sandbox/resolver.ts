// pattern: Functional Core
// Turns the user's sandbox settings into the full list of binds a build needs

import { existsSync } from "node:fs";
import { dirname, isAbsolute } from "node:path";
import { fileURLToPath } from "node:url";

import { getDefaultSystemPaths } from "./platform.js";

import type { EnvironmentOverlay, ResolvedPath } from "../../hermetic/types.js";
import type { FinalizedSandboxConfig, SandboxConfig } from "./types.js";

/**
 * Options for resolving sandbox configuration
 */
export interface SandboxResolverOptions {
  /** Sandbox settings from the resolved harness config */
  config: SandboxConfig;
  /** The source tree; bound read-write since toolchains may write into it */
  sourceDir: ResolvedPath;
  /** Directory the artifact is written to */
  outputDir: ResolvedPath;
  /** Injected variables; absolute paths among their values get bound */
  overlay: EnvironmentOverlay;
  /** Resolved toolchain executable, when it lives outside the system paths */
  toolchainPath?: string | undefined;
  /** Parent environment variables (usually process.env) */
  parentEnv: Record<string, string | undefined>;
}

function toPath(value: string): ResolvedPath | null {
  if (value.startsWith("file://")) {
    try {
      return fileURLToPath(value) as ResolvedPath;
    } catch {
      return null;
    }
  }
  return isAbsolute(value) ? (value as ResolvedPath) : null;
}

/**
 * Extracts every filesystem location named by an overlay value.
 * Values are split on commas (GOPROXY lists) and colons (PATH-style lists);
 * remote URLs and anything that is not an absolute path are ignored.
 */
export function overlayPaths(overlay: EnvironmentOverlay): ResolvedPath[] {
  const paths: ResolvedPath[] = [];

  for (const value of Object.values(overlay)) {
    for (const part of value.split(",")) {
      const trimmed = part.trim();
      if (trimmed.includes("://") && !trimmed.startsWith("file://")) {
        continue;
      }
      const candidates = trimmed.startsWith("file://")
        ? [trimmed]
        : trimmed.split(":");
      for (const candidate of candidates) {
        const path = toPath(candidate);
        if (path !== null) {
          paths.push(path);
        }
      }
    }
  }

  return paths;
}

function unique(paths: ResolvedPath[]): ResolvedPath[] {
  return [...new Set(paths)];
}

/**
 * Builds the bind lists for a sandboxed build or smoke test:
 * - system paths and the toolchain's install root, read-only
 * - the source tree, the output directory, the temp directory, overlay
 *   paths and user-listed paths, read-write
 */
export function resolveSandboxConfig(
  options: SandboxResolverOptions
): FinalizedSandboxConfig {
  const { config, sourceDir, outputDir, overlay, toolchainPath, parentEnv } =
    options;

  const allowRead: ResolvedPath[] = [];
  for (const systemPath of getDefaultSystemPaths()) {
    if (existsSync(systemPath)) {
      allowRead.push(systemPath as ResolvedPath);
    }
  }

  // A toolchain finds its own root from the binary location (bin/../)
  if (toolchainPath !== undefined && isAbsolute(toolchainPath)) {
    const toolchainRoot = dirname(dirname(toolchainPath));
    if (toolchainRoot !== "/") {
      allowRead.push(toolchainRoot as ResolvedPath);
    }
  }
  allowRead.push(...config.allowRead);

  const allowReadWrite: ResolvedPath[] = [sourceDir, outputDir];
  const tmpDir = parentEnv["TMPDIR"];
  if (tmpDir !== undefined && isAbsolute(tmpDir)) {
    allowReadWrite.push(tmpDir as ResolvedPath);
  }
  allowReadWrite.push(...overlayPaths(overlay));
  allowReadWrite.push(...config.allowReadWrite);

  return {
    enabled: config.enabled,
    allowRead: unique(allowRead),
    allowReadWrite: unique(allowReadWrite),
  };
}
