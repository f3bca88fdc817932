// pattern: Imperative Shell
// Drives probe -> environment -> build -> smoke test through the state machine

import { runOfflineBuild } from "../build/index.js";
import { loadEnvironmentFile } from "../env-loader/index.js";
import { assertNetworkIsolated } from "../probe/index.js";
import { runSmokeTest } from "../smoke/index.js";
import { failureKindOf, SealcheckError } from "../../utils/errors.js";
import { PipelineState } from "../types.js";

import { PipelineStateMachine } from "./state-machine.js";

import type { ResolvedHarnessConfig } from "../../config/resolve.js";
import type {
  EnvironmentOverlay,
  PipelineReport,
  PipelineStep,
  ResolvedPath,
} from "../types.js";
import type { Logger } from "pino";

export interface PipelineOptions {
  config: ResolvedHarnessConfig;
  logger: Logger;
  /** Injectable for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

/**
 * A finished run. `error` is set exactly when the report's state is FAILED.
 */
export interface PipelineRun {
  report: PipelineReport;
  error: SealcheckError | null;
}

/**
 * Runs the four verification steps in order, stopping at the first failure.
 * Pipeline failures are returned with the report so that callers can still
 * write it out; any other error propagates.
 */
export async function runHermeticPipeline(
  options: PipelineOptions
): Promise<PipelineRun> {
  const { config, logger } = options;
  const machine = new PipelineStateMachine();
  const report: PipelineReport = {
    state: PipelineState.IDLE,
    history: [],
    timings: [],
  };

  const timed = async <T>(
    step: PipelineStep,
    body: (stepLogger: Logger) => Promise<T>
  ): Promise<T> => {
    const startedAt = performance.now();
    try {
      return await body(logger.child({ step }));
    } finally {
      report.timings.push({
        step,
        durationMs: Math.round(performance.now() - startedAt),
      });
    }
  };

  const finish = (error: SealcheckError | null): PipelineRun => {
    report.state = machine.getCurrentState();
    report.history = machine.getStateHistory();
    return { report, error };
  };

  if (!config.sandbox.enabled) {
    logger.warn(
      "Sandbox disabled: a toolchain that falls back to the network during the build would go unnoticed by the probe"
    );
  }

  let step: PipelineStep = "probe";
  try {
    report.probe = await timed("probe", stepLogger =>
      assertNetworkIsolated({
        url: config.probe.url,
        timeoutMs: config.probe.timeoutMs,
        logger: stepLogger,
        ...(options.fetchImpl !== undefined && {
          fetchImpl: options.fetchImpl,
        }),
      })
    );
    machine.transition("probe-passed");

    step = "environment";
    const overlay: EnvironmentOverlay = await timed("environment", stepLogger =>
      loadEnvironmentFile({
        filePath: config.environment.file,
        format: config.environment.format,
        logger: stepLogger,
      })
    );
    report.environmentKeys = Object.keys(overlay).sort();
    machine.transition("environment-loaded");

    step = "build";
    const artifactPath: ResolvedPath = await timed("build", async stepLogger => {
      const result = await runOfflineBuild({
        sourceDir: config.sourceDir,
        overlay,
        command: config.build.command,
        args: config.build.args,
        output: config.build.output,
        sandbox: config.sandbox,
        logger: stepLogger,
      });
      return result.artifactPath;
    });
    report.artifactPath = artifactPath;
    machine.transition("build-succeeded");

    step = "smoke-test";
    await timed("smoke-test", stepLogger =>
      runSmokeTest({
        artifactPath,
        sourceDir: config.sourceDir,
        overlay,
        args: config.smokeTest.args,
        timeoutMs: config.smokeTest.timeoutMs,
        sandbox: config.sandbox,
        logger: stepLogger,
      })
    );
    machine.transition("smoke-test-passed");
  } catch (error) {
    const kind = failureKindOf(error);
    if (kind === null || !(error instanceof SealcheckError)) {
      throw error;
    }

    machine.fail(kind);
    report.failure = { kind, step, message: error.message };
    logger.debug({ kind, step }, "Pipeline failed");
    return finish(error);
  }

  logger.info({ artifactPath: report.artifactPath }, "Hermetic build verified");
  return finish(null);
}

