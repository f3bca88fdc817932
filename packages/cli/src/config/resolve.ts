// pattern: Functional Core
// Applies defaults and CLI overrides to a loaded config and resolves every path

import { isAbsolute, resolve } from "path";

import { ConfigurationError } from "../utils/errors.js";

import type { ResolvedPath } from "../hermetic/types.js";
import type {
  ArgStringTemplate,
  EnvironmentFileFormat,
  SettingsHarness,
} from "./types/index.js";

export const DEFAULT_PROBE_URL = "https://proxy.golang.org";
export const DEFAULT_PROBE_TIMEOUT_MS = 5000;
export const DEFAULT_ENV_FILE = "prefetch.env";
export const DEFAULT_SOURCE_DIR = "source";
export const DEFAULT_BUILD_COMMAND = "go";
export const DEFAULT_BUILD_ARGS = ["build", "-o", "{{output}}"];
export const DEFAULT_OUTPUT = "dist/retrodep";
export const DEFAULT_SMOKE_ARGS = ["--help"];
export const DEFAULT_SMOKE_TIMEOUT_MS = 10000;

/**
 * Values given on the command line; each one wins over the config file
 */
export interface HarnessOverrides {
  envFile?: string | undefined;
  sourceDir?: string | undefined;
  output?: string | undefined;
  probeUrl?: string | undefined;
  probeTimeoutMs?: number | undefined;
  sandbox?: boolean | undefined;
}

/**
 * Fully-resolved harness configuration with absolute paths and no gaps
 */
export interface ResolvedHarnessConfig {
  probe: {
    url: string;
    timeoutMs: number;
  };
  environment: {
    file: ResolvedPath;
    format: EnvironmentFileFormat;
  };
  sourceDir: ResolvedPath;
  build: {
    command: string;
    args: ArgStringTemplate[];
    output: ResolvedPath;
  };
  smokeTest: {
    args: ArgStringTemplate[];
    timeoutMs: number;
  };
  sandbox: {
    enabled: boolean;
    allowRead: ResolvedPath[];
    allowReadWrite: ResolvedPath[];
  };
}

function toResolvedPath(baseDir: string, path: string): ResolvedPath {
  // ResolvedPath is a branded string; resolve() always yields an absolute path
  return resolve(baseDir, path) as ResolvedPath;
}

function toTemplates(args: readonly string[]): ArgStringTemplate[] {
  return args.map(arg => arg as ArgStringTemplate);
}

function validateProbeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid probe URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(
      `Probe URL must use http or https, got ${parsed.protocol} in ${url}`
    );
  }
  return url;
}

/**
 * Merges config file values, CLI overrides and defaults.
 * Relative paths in the config file resolve against baseDir; relative paths
 * given on the command line resolve against cwd.
 */
export function resolveHarnessConfig(
  settings: SettingsHarness,
  baseDir: string,
  overrides: HarnessOverrides = {},
  cwd: string = process.cwd()
): ResolvedHarnessConfig {
  const fromConfig = (path: string): ResolvedPath =>
    toResolvedPath(baseDir, path);
  const fromCli = (path: string): ResolvedPath => toResolvedPath(cwd, path);

  const probeTimeoutMs =
    overrides.probeTimeoutMs ??
    settings.probe?.timeoutMs ??
    DEFAULT_PROBE_TIMEOUT_MS;
  if (!Number.isInteger(probeTimeoutMs) || probeTimeoutMs <= 0) {
    throw new ConfigurationError(
      `Probe timeout must be a positive integer of milliseconds, got ${probeTimeoutMs}`
    );
  }

  // Relative toolchain paths are taken relative to the config, not the source tree
  const configuredCommand = settings.build?.command ?? DEFAULT_BUILD_COMMAND;
  const command =
    configuredCommand.includes("/") && !isAbsolute(configuredCommand)
      ? fromConfig(configuredCommand)
      : configuredCommand;

  return {
    probe: {
      url: validateProbeUrl(
        overrides.probeUrl ?? settings.probe?.url ?? DEFAULT_PROBE_URL
      ),
      timeoutMs: probeTimeoutMs,
    },
    environment: {
      file:
        overrides.envFile !== undefined
          ? fromCli(overrides.envFile)
          : fromConfig(settings.environment?.file ?? DEFAULT_ENV_FILE),
      format: settings.environment?.format ?? "auto",
    },
    sourceDir:
      overrides.sourceDir !== undefined
        ? fromCli(overrides.sourceDir)
        : fromConfig(settings.source?.dir ?? DEFAULT_SOURCE_DIR),
    build: {
      command,
      args: settings.build?.args ?? toTemplates(DEFAULT_BUILD_ARGS),
      output:
        overrides.output !== undefined
          ? fromCli(overrides.output)
          : fromConfig(settings.build?.output ?? DEFAULT_OUTPUT),
    },
    smokeTest: {
      args: settings.smokeTest?.args ?? toTemplates(DEFAULT_SMOKE_ARGS),
      timeoutMs: settings.smokeTest?.timeoutMs ?? DEFAULT_SMOKE_TIMEOUT_MS,
    },
    sandbox: {
      enabled: overrides.sandbox ?? settings.sandbox?.enabled ?? false,
      allowRead: (settings.sandbox?.allowRead ?? []).map(fromConfig),
      allowReadWrite: (settings.sandbox?.allowReadWrite ?? []).map(fromConfig),
    },
  };
}
