/**
 * Pipeline ports: the adapters the controller calls out to.
 * Tests swap the process runner and reviewer for in-process fakes.
 */

import type { ProcessRunner } from "../../tools/process-runner.js";
import type { SchemaReviewer } from "../../validators/schema-review/reviewer.js";

import type { ReportRenderer } from "./report-emitter.js";
import type { StageName, StageResult } from "./types.js";

export interface PipelineObserver {
  onStageStart?(stage: StageName): void;
  onStageComplete?(result: StageResult): void;
}

export type PipelinePorts = {
  runner: ProcessRunner;
  /** Absent when the external reviewer is disabled. */
  reviewer?: SchemaReviewer;
  renderer?: ReportRenderer;
  observer?: PipelineObserver;
};
