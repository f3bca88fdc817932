// pattern: Mixed (unavoidable)
// Runs the artifact once; interpreting the result is pure

import { dirname } from "path";

import { createCommand, type CommandResult } from "../../utils/command/index.js";
import { SmokeTestFailure } from "../../utils/errors.js";
import {
  resolveSandboxConfig,
  type SandboxConfig,
} from "../../utils/sandbox/index.js";
import { renderArgTemplates } from "../../utils/string-templating/index.js";
import { isExecutableFile } from "../build/index.js";

import type { ArgStringTemplate } from "../../config/types/index.js";
import type { EnvironmentOverlay, ResolvedPath } from "../types.js";
import type { Logger } from "pino";

export interface SmokeTestOptions {
  artifactPath: ResolvedPath;
  sourceDir: ResolvedPath;
  /** Same overlay the build saw */
  overlay: EnvironmentOverlay;
  args: readonly ArgStringTemplate[];
  timeoutMs: number;
  sandbox: SandboxConfig;
  logger: Logger;
}

export interface SmokeTestResult {
  /** Combined output of the artifact */
  output: string;
}

function describeSmokeFailure(result: CommandResult, timeoutMs: number): string {
  if (result.timedOut) {
    return `Artifact did not exit within ${timeoutMs} ms`;
  }
  if (result.exitCode !== undefined) {
    return `Artifact exited with code ${result.exitCode}`;
  }
  if (result.signal !== undefined) {
    return `Artifact was killed by ${result.signal}`;
  }
  return `Artifact could not be started: ${result.failureMessage}`;
}

/**
 * Invokes the artifact with side-effect-free arguments (default --help).
 * Passes only on exit status 0.
 */
export async function runSmokeTest(
  options: SmokeTestOptions
): Promise<SmokeTestResult> {
  const { artifactPath, sourceDir, overlay, timeoutMs, logger } = options;

  let executable: boolean;
  try {
    executable = await isExecutableFile(artifactPath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SmokeTestFailure(
      `Cannot inspect artifact ${artifactPath}: ${reason}`,
      artifactPath
    );
  }
  if (!executable) {
    throw new SmokeTestFailure(
      `Artifact is not an executable file: ${artifactPath}`,
      artifactPath
    );
  }

  const args = renderArgTemplates(options.args, {
    output: artifactPath,
    sourceDir,
    env: overlay,
  });
  const outputDir = dirname(artifactPath) as ResolvedPath;

  logger.info({ artifactPath, args, timeoutMs }, "Running smoke test");

  const command = createCommand(artifactPath, logger)
    .addArgs(args)
    .envs(overlay)
    .currentDir(outputDir)
    .timeout(timeoutMs);

  if (options.sandbox.enabled) {
    command.withSandbox(
      resolveSandboxConfig({
        config: options.sandbox,
        sourceDir,
        outputDir,
        overlay,
        parentEnv: process.env,
      })
    );
  }

  let result: CommandResult;
  try {
    result = await command.run();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SmokeTestFailure(
      `Smoke test could not be run: ${reason}`,
      artifactPath
    );
  }

  if (result.failed) {
    throw new SmokeTestFailure(
      describeSmokeFailure(result, timeoutMs),
      artifactPath,
      result.all
    );
  }

  logger.info({ artifactPath }, "Smoke test passed");
  return { output: result.all };
}
