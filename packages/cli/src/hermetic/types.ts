// pattern: Functional Core
import { brandedString } from "@coderspirit/nominal-typebox";
import { type Static } from "@sinclair/typebox";

import type { FailureKind } from "../utils/errors.js";

export const ResolvedPath = brandedString<"ResolvedPath">({
  description: "An absolute filesystem path resolved from configuration.",
});
export type ResolvedPath = Static<typeof ResolvedPath>;

/**
 * Variables injected into the build from the prefetched environment file.
 * Passed explicitly to child processes; never written into process.env.
 */
export type EnvironmentOverlay = Readonly<Record<string, string>>;

/**
 * Why a probe could not reach its target
 */
export type UnreachableReason = "timeout" | "dns" | "connection" | "other";

/**
 * Outcome of the outbound network probe
 */
export type NetworkReachabilityResult =
  | {
      status: "reachable";
      url: string;
      elapsedMs: number;
      /** HTTP status the host answered with */
      httpStatus: number;
    }
  | {
      status: "unreachable";
      url: string;
      elapsedMs: number;
      reason: UnreachableReason;
      /** Message of the underlying network error */
      detail: string;
    };

/**
 * Pipeline states; there are no backward transitions
 */
export enum PipelineState {
  IDLE = "idle",
  PROBE_DONE = "probe_done",
  ENV_LOADED = "env_loaded",
  BUILT = "built",
  SMOKE_TESTED = "smoke_tested",
  FAILED = "failed",
}

export type PipelineStep = "probe" | "environment" | "build" | "smoke-test";

export interface StepTiming {
  step: PipelineStep;
  durationMs: number;
}

/**
 * Summary of one pipeline run, suitable for JSON output
 */
export interface PipelineReport {
  state: PipelineState;
  history: PipelineState[];
  timings: StepTiming[];
  probe?: NetworkReachabilityResult;
  environmentKeys?: string[];
  artifactPath?: string;
  failure?: {
    kind: FailureKind;
    step: PipelineStep;
    message: string;
  };
}
