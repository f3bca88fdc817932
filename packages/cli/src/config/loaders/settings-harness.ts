// pattern: Functional Core
import { parse as parseToml } from "@iarna/toml";
import { access, constants, readFile } from "fs/promises";
import { basename, dirname, extname, join, resolve } from "path";
import { parse as parseYaml } from "yaml";

import { ajv, formatAjvErrors } from "../../utils/ajv.js";
import { ConfigurationError, ValidationError } from "../../utils/errors.js";
import { SettingsHarness } from "../types/index.js";

// Compile schema once for reuse
const validateSettingsHarness = ajv.compile<SettingsHarness>(SettingsHarness);

export const CONFIG_FILENAMES = [
  "sealcheck.yaml",
  "sealcheck.yml",
  "sealcheck.json",
  "sealcheck.toml",
] as const;

/**
 * A loaded harness configuration and where it came from
 */
export interface LoadedSettings {
  config: SettingsHarness;
  /** Path of the config file, or null when running on defaults */
  configPath: string | null;
  /** Directory relative paths in the config resolve against */
  baseDir: string;
}

/**
 * Loads and parses configuration from a file path, automatically detecting format
 * by file extension (.json, .yaml/.yml, .toml)
 */
export async function loadSettingsFromFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, "utf8");
  const ext = extname(filePath).toLowerCase();

  try {
    switch (ext) {
      case ".json":
        return JSON.parse(content);
      case ".yaml":
      case ".yml":
        return parseYaml(content);
      case ".toml":
        return parseToml(content);
      default:
        throw new ConfigurationError(
          `Unsupported file format: ${ext}. Supported formats: .json, .yaml, .yml, .toml`,
          filePath
        );
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Could not parse ${basename(filePath)}: ${reason}`,
      filePath
    );
  }
}

/**
 * Validates a JavaScript object against the SettingsHarness schema
 */
export function validateSettingsObject(
  data: unknown
): data is SettingsHarness {
  if (!validateSettingsHarness(data)) {
    const messages = formatAjvErrors(validateSettingsHarness.errors);
    throw new ValidationError(
      `Settings validation failed: ${messages.join(", ")}`,
      messages
    );
  }

  return true;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search for sealcheck configuration files in the start directory and its parents
 */
export async function findHarnessConfig(
  startDir: string = process.cwd(),
  noParent = false
): Promise<string | null> {
  let currentDir = resolve(startDir);

  for (;;) {
    const foundConfigs: string[] = [];
    for (const filename of CONFIG_FILENAMES) {
      const configPath = join(currentDir, filename);
      if (await exists(configPath)) {
        foundConfigs.push(configPath);
      }
    }

    if (foundConfigs.length > 1) {
      throw new ConfigurationError(
        `Multiple sealcheck config files found in ${currentDir}: ${foundConfigs
          .map(path => basename(path))
          .join(", ")}. Please use only one config file per directory.`
      );
    }

    const [found] = foundConfigs;
    if (found) {
      return found;
    }

    const parentDir = dirname(currentDir);
    if (noParent || parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Loads and validates a SettingsHarness configuration from file
 */
export async function loadAndValidateSettings(
  filePath: string
): Promise<SettingsHarness> {
  const data = await loadSettingsFromFile(filePath);

  if (validateSettingsObject(data)) {
    return data;
  }

  // This should never be reached due to the throw in validateSettingsObject
  throw new Error("Unexpected validation state");
}

/**
 * Loads the explicit config file when given, otherwise the nearest one found
 * from startDir. With no config file anywhere, defaults apply.
 */
export async function loadHarnessSettings(options: {
  startDir: string;
  configPath?: string | undefined;
  noParent?: boolean;
}): Promise<LoadedSettings> {
  const startDir = resolve(options.startDir);

  if (options.configPath !== undefined) {
    const configPath = resolve(startDir, options.configPath);
    if (!(await exists(configPath))) {
      throw new ConfigurationError(
        `Config file not found: ${configPath}`,
        configPath
      );
    }
    return {
      config: await loadAndValidateSettings(configPath),
      configPath,
      baseDir: dirname(configPath),
    };
  }

  const found = await findHarnessConfig(startDir, options.noParent ?? false);
  if (!found) {
    return { config: { version: 1 }, configPath: null, baseDir: startDir };
  }

  return {
    config: await loadAndValidateSettings(found),
    configPath: found,
    baseDir: dirname(found),
  };
}
