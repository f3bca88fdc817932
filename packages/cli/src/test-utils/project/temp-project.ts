// pattern: Imperative Shell

import { chmod, mkdir, mkdtemp, realpath, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { stringify } from "yaml";

import type { SettingsHarness } from "../../config/types/index.js";

/**
 * Configuration for creating a temporary workspace
 */
export interface TempWorkspaceConfig {
  /** Written as sealcheck.yaml when given */
  config?: SettingsHarness;
  /** Optional directory name prefix */
  prefix?: string;
}

/**
 * A scratch directory laid out like a project under verification
 */
export interface TempWorkspace {
  /** Real path of the temporary directory */
  path: string;
  /** Path to the config file, or null when none was written */
  configPath: string | null;
  /** Cleanup function to remove the temporary directory */
  cleanup: () => Promise<void>;
  /** Write a file relative to the workspace; returns its absolute path */
  writeFile: (relativePath: string, content: string) => Promise<string>;
  /** Write an executable sh script; returns its absolute path */
  writeScript: (relativePath: string, content: string) => Promise<string>;
  /** Absolute path of a workspace-relative path */
  resolve: (relativePath: string) => string;
}

/**
 * Creates a temporary workspace, optionally with a sealcheck.yaml
 */
export async function createTempWorkspace(
  config: TempWorkspaceConfig = {}
): Promise<TempWorkspace> {
  const prefix = config.prefix ?? "sealcheck-test-";
  // Real path so that paths reported by child processes compare equal
  const tempDir = await realpath(await mkdtemp(join(tmpdir(), prefix)));

  const write = async (
    relativePath: string,
    content: string
  ): Promise<string> => {
    const fullPath = join(tempDir, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content, "utf8");
    return fullPath;
  };

  let configPath: string | null = null;
  if (config.config) {
    configPath = await write("sealcheck.yaml", stringify(config.config));
  }

  return {
    path: tempDir,
    configPath,
    cleanup: async () => {
      await rm(tempDir, { recursive: true, force: true });
    },
    writeFile: write,
    writeScript: async (relativePath: string, content: string) => {
      const fullPath = await write(relativePath, content);
      await chmod(fullPath, 0o755);
      return fullPath;
    },
    resolve: (relativePath: string) => join(tempDir, relativePath),
  };
}
