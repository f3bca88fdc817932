// pattern: Imperative Shell

import { statSync } from "node:fs";
import { resolve } from "node:path";

import { ConfigurationError } from "../utils/errors.js";

// Directory the config search starts from
let START_DIR: string | undefined;

// Explicit config file, bypassing the search
let CONFIG_PATH: string | undefined;

// Global no-parent flag
let NO_PARENT_FLAG = false;

/**
 * Set the start directory override.
 * The process moves there, so relative CLI paths resolve against it too.
 */
export function setStartDir(dir: string | undefined): void {
  START_DIR = dir ? resolve(dir) : process.cwd();
  if (statSync(START_DIR, { throwIfNoEntry: false })?.isDirectory()) {
    process.chdir(START_DIR);
  } else {
    throw new ConfigurationError(
      `Start directory is not a directory: ${START_DIR}`
    );
  }
}

/**
 * Get the directory the config search starts from
 */
export function getStartDir(): string {
  return START_DIR ?? process.cwd();
}

/**
 * Set an explicit config file path
 */
export function setConfigPath(path: string | undefined): void {
  CONFIG_PATH = path ? resolve(path) : undefined;
}

/**
 * Get the explicit config file path, if one was given
 */
export function getConfigPath(): string | undefined {
  return CONFIG_PATH;
}

/**
 * Set the no-parent flag
 * This affects whether config file search climbs parent directories
 */
export function setNoParentFlag(noParent: boolean): void {
  NO_PARENT_FLAG = noParent;
}

/**
 * Get the current no-parent flag setting
 */
export function getNoParentFlag(): boolean {
  return NO_PARENT_FLAG;
}
