// pattern: Functional Core

import { PipelineState } from "../types.js";

import type { FailureKind } from "../../utils/errors.js";

/**
 * Events that advance the pipeline
 */
export type PipelineTrigger =
  | "probe-passed"
  | "environment-loaded"
  | "build-succeeded"
  | "smoke-test-passed"
  | "fail";

/**
 * State transition definition
 */
export interface PipelineTransition {
  from: PipelineState;
  to: PipelineState;
  trigger: PipelineTrigger;
}

const FORWARD_TRANSITIONS: PipelineTransition[] = [
  {
    from: PipelineState.IDLE,
    to: PipelineState.PROBE_DONE,
    trigger: "probe-passed",
  },
  {
    from: PipelineState.PROBE_DONE,
    to: PipelineState.ENV_LOADED,
    trigger: "environment-loaded",
  },
  {
    from: PipelineState.ENV_LOADED,
    to: PipelineState.BUILT,
    trigger: "build-succeeded",
  },
  {
    from: PipelineState.BUILT,
    to: PipelineState.SMOKE_TESTED,
    trigger: "smoke-test-passed",
  },
];

const TERMINAL_STATES = new Set([
  PipelineState.SMOKE_TESTED,
  PipelineState.FAILED,
]);

/**
 * The verification pipeline as a state machine.
 * Every non-terminal state can fail; nothing moves backwards.
 */
export class PipelineStateMachine {
  private currentState: PipelineState = PipelineState.IDLE;
  private transitions: Map<string, PipelineState>;
  private stateHistory: PipelineState[] = [PipelineState.IDLE];
  private failure: FailureKind | null = null;

  constructor() {
    this.transitions = new Map();

    for (const transition of FORWARD_TRANSITIONS) {
      this.transitions.set(
        `${transition.from}:${transition.trigger}`,
        transition.to
      );
    }
    for (const state of Object.values(PipelineState)) {
      if (!TERMINAL_STATES.has(state)) {
        this.transitions.set(`${state}:fail`, PipelineState.FAILED);
      }
    }
  }

  /**
   * Attempt a forward transition
   */
  transition(trigger: Exclude<PipelineTrigger, "fail">): PipelineState {
    return this.apply(trigger);
  }

  /**
   * Move to FAILED, recording why
   */
  fail(kind: FailureKind): PipelineState {
    const state = this.apply("fail");
    this.failure = kind;
    return state;
  }

  private apply(trigger: PipelineTrigger): PipelineState {
    const newState = this.transitions.get(`${this.currentState}:${trigger}`);

    if (!newState) {
      throw new Error(`Invalid transition: ${this.currentState} -> ${trigger}`);
    }

    this.currentState = newState;
    this.stateHistory.push(newState);
    return newState;
  }

  getCurrentState(): PipelineState {
    return this.currentState;
  }

  /**
   * The failure kind once the pipeline has failed
   */
  getFailure(): FailureKind | null {
    return this.failure;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.currentState);
  }

  /**
   * Get the full state history
   */
  getStateHistory(): PipelineState[] {
    return [...this.stateHistory];
  }
}
