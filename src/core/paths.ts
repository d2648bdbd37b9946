import path from "node:path";

import { GateError } from "./errors.js";
import { slugify } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunPaths = {
  runDir: string;
  eventsLog: string;
  validationOutput: string;
  resultDocument: string;
  failureSidecar: string;
  reportSummary: string;
  generateDir: string;
  lintDir: string;
  validationConfig: string;
  normalizedSummary: string;
  engineOutput: string;
};

// =============================================================================
// PATH HELPERS
// =============================================================================

// Runs never share a directory; isolation is by <dataset>/<runId>.
export function runOutputDir(outputRoot: string, dataset: string, runId: string): string {
  return path.join(path.resolve(outputRoot), dataset, runId);
}

export function createRunPaths(outputRoot: string, dataset: string, runId: string): RunPaths {
  for (const [label, value] of [
    ["dataset id", dataset],
    ["run id", runId],
  ] as const) {
    const problem = runSegmentProblem(value);
    if (problem) throw new GateError(`Invalid ${label} '${value}': ${problem}.`);
  }

  const runDir = runOutputDir(outputRoot, dataset, runId);
  const generateDir = path.join(runDir, "generate");

  return {
    runDir,
    eventsLog: path.join(runDir, "events.jsonl"),
    validationOutput: path.join(runDir, "validation_output.json"),
    resultDocument: path.join(runDir, "result.json"),
    failureSidecar: path.join(runDir, "failure.json"),
    reportSummary: path.join(runDir, "summary.md"),
    generateDir,
    lintDir: path.join(generateDir, "lint"),
    validationConfig: path.join(runDir, "validation_config.json"),
    normalizedSummary: path.join(runDir, "summary_report.normalized.csv"),
    engineOutput: path.join(runDir, "engine_output.json"),
  };
}

/** Dataset and run ids each become one directory level; anything that could leave it is rejected. */
export function runSegmentProblem(value: string): string | undefined {
  if (value.trim().length === 0) return "must not be empty";
  if (value === "." || value === "..") return "must not be a relative directory name";
  if (/[\\/\0]/.test(value)) return "must not contain path separators";
  return undefined;
}

export function summaryArtifactPath(dir: string): string {
  return path.join(dir, "summary_report.csv");
}

export function reportArtifactPath(dir: string): string {
  return path.join(dir, "report.json");
}

export function datasetIdFromTable(tablePath: string): string {
  const stem = path.basename(tablePath, path.extname(tablePath));
  return slugify(stem) || "dataset";
}
