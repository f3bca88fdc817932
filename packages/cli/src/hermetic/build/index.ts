// pattern: Mixed (unavoidable)
// Precondition checks and artifact inspection wrap a single toolchain run

import { mkdir, readdir, rm, stat } from "fs/promises";
import { dirname } from "path";

import which from "which";

import { createCommand, type CommandResult } from "../../utils/command/index.js";
import { BuildFailure } from "../../utils/errors.js";
import {
  resolveSandboxConfig,
  type SandboxConfig,
} from "../../utils/sandbox/index.js";
import { renderArgTemplates } from "../../utils/string-templating/index.js";

import type { ArgStringTemplate } from "../../config/types/index.js";
import type { EnvironmentOverlay, ResolvedPath } from "../types.js";
import type { Logger } from "pino";

export interface BuildOptions {
  sourceDir: ResolvedPath;
  overlay: EnvironmentOverlay;
  /** Toolchain executable, looked up on PATH unless it contains a slash */
  command: string;
  /** Mustache templates; see ArgTemplateVariables */
  args: readonly ArgStringTemplate[];
  output: ResolvedPath;
  sandbox: SandboxConfig;
  logger: Logger;
}

export interface BuildResult {
  artifactPath: ResolvedPath;
  /** Absolute path the toolchain command resolved to */
  toolchainPath: string;
  /** Combined toolchain output */
  toolOutput: string;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function assertSourceTree(sourceDir: string): Promise<void> {
  let isDirectory: boolean;
  let entries: string[] = [];
  try {
    isDirectory = (await stat(sourceDir)).isDirectory();
    if (isDirectory) {
      entries = await readdir(sourceDir);
    }
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new BuildFailure(`Source tree not found: ${sourceDir}`);
    }
    throw new BuildFailure(
      `Cannot inspect source tree ${sourceDir}: ${errorMessage(error)}`
    );
  }

  if (!isDirectory) {
    throw new BuildFailure(`Source tree is not a directory: ${sourceDir}`);
  }
  if (entries.length === 0) {
    throw new BuildFailure(`Source tree is empty: ${sourceDir}`);
  }
}

/**
 * Clears the output location so that only this run's artifact can pass
 */
async function prepareOutput(output: ResolvedPath): Promise<void> {
  const outputDir = dirname(output);
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new BuildFailure(
      `Cannot create output directory ${outputDir}: ${errorMessage(error)}`
    );
  }
  try {
    await rm(output, { force: true });
  } catch (error) {
    throw new BuildFailure(
      `Cannot remove previous artifact ${output}: ${errorMessage(error)}`
    );
  }
}

/**
 * Checks that a path is a regular file with at least one execute bit.
 * A missing path, or one running through a non-directory, is not executable.
 */
export async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile() && (info.mode & 0o111) !== 0;
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

function describeBuildFailure(result: CommandResult): string {
  if (result.exitCode !== undefined) {
    return `Build command exited with code ${result.exitCode}`;
  }
  if (result.signal !== undefined) {
    return `Build command was killed by ${result.signal}`;
  }
  return `Build command could not be started: ${result.failureMessage}`;
}

/**
 * Runs the toolchain build against the source tree with the overlay applied.
 * The process environment is inherited; overlay values win on conflicts.
 */
export async function runOfflineBuild(
  options: BuildOptions
): Promise<BuildResult> {
  const { sourceDir, overlay, output, logger } = options;

  await assertSourceTree(sourceDir);

  const toolchainPath = await which(options.command, {
    nothrow: true,
    path: overlay["PATH"] ?? process.env["PATH"] ?? "",
  });
  if (toolchainPath === null) {
    throw new BuildFailure(`Toolchain command not found: ${options.command}`);
  }

  const outputDir = dirname(output) as ResolvedPath;
  await prepareOutput(output);

  const args = renderArgTemplates(options.args, {
    output,
    sourceDir,
    env: overlay,
  });

  logger.info(
    {
      toolchain: toolchainPath,
      args,
      sourceDir,
      overlayKeys: Object.keys(overlay),
    },
    "Running offline build"
  );

  const builder = createCommand(toolchainPath, logger)
    .addArgs(args)
    .envs(overlay)
    .currentDir(sourceDir);

  if (options.sandbox.enabled) {
    builder.withSandbox(
      resolveSandboxConfig({
        config: options.sandbox,
        sourceDir,
        outputDir,
        overlay,
        toolchainPath,
        parentEnv: process.env,
      })
    );
  }

  let result: CommandResult;
  try {
    result = await builder.run();
  } catch (error) {
    throw new BuildFailure(`Build could not be run: ${errorMessage(error)}`);
  }

  if (result.failed) {
    throw new BuildFailure(
      describeBuildFailure(result),
      result.all,
      result.exitCode
    );
  }

  let executable: boolean;
  try {
    executable = await isExecutableFile(output);
  } catch (error) {
    throw new BuildFailure(
      `Cannot inspect artifact ${output}: ${errorMessage(error)}`,
      result.all,
      result.exitCode
    );
  }
  if (!executable) {
    throw new BuildFailure(
      `Build exited 0 but ${output} is not an executable file`,
      result.all,
      result.exitCode
    );
  }

  logger.info({ artifactPath: output }, "Build produced artifact");
  return { artifactPath: output, toolchainPath, toolOutput: result.all };
}
