import { isBlockingFailure } from "../../validators/lib/stage-result.js";

import type { StageName, StageResult } from "./types.js";

// =============================================================================
// STATES
// =============================================================================

export const STAGE_STATES = [
  "INIT",
  "PREFLIGHT",
  "QUALITY",
  "ROW_VOLUME",
  "SCHEMA_REVIEW",
  "GENERATE",
  "VALIDATE",
  "RECONCILE",
  "RECLASSIFY",
] as const;

export type StageState = (typeof STAGE_STATES)[number];
export type PipelineState = StageState | "REPORT" | "DONE";

const STAGE_FOR_STATE: Record<StageState, StageName> = {
  INIT: "init",
  PREFLIGHT: "preflight",
  QUALITY: "quality",
  ROW_VOLUME: "row_volume",
  SCHEMA_REVIEW: "schema_review",
  GENERATE: "generate",
  VALIDATE: "validate",
  RECONCILE: "reconcile",
  RECLASSIFY: "reclassify",
};

export type Transition = {
  next: PipelineState;
  /** True when this transition leaves the stage sequence early. */
  aborted: boolean;
};

// =============================================================================
// TRANSITIONS
// =============================================================================

export function isStageState(state: PipelineState): state is StageState {
  return state !== "REPORT" && state !== "DONE";
}

export function stageForState(state: StageState): StageName {
  return STAGE_FOR_STATE[state];
}

/**
 * Pure transition function. A FAILED result at BLOCKING severity sends any
 * stage state straight to REPORT; every other result advances one stage.
 * `result` is the already policy-resolved result of the stage just run.
 */
export function nextState(current: PipelineState, result?: StageResult): Transition {
  if (current === "DONE") {
    throw new Error("DONE is terminal");
  }
  if (current === "REPORT") {
    return { next: "DONE", aborted: false };
  }
  if (!result) {
    throw new Error(`State ${current} needs the result of its stage to transition`);
  }
  if (result.stage !== stageForState(current)) {
    throw new Error(`State ${current} received a result for stage ${result.stage}`);
  }
  if (isBlockingFailure(result)) {
    return { next: "REPORT", aborted: true };
  }

  const index = STAGE_STATES.indexOf(current);
  const following = STAGE_STATES[index + 1];
  return { next: following ?? "REPORT", aborted: false };
}
