import path from "node:path";

import type { Finding, Locator, Severity } from "../app/pipeline/types.js";
import type { JsonObject, ToolEventType } from "../core/logger.js";
import { pathExists, tail } from "../core/utils.js";
import { createFinding } from "../validators/lib/stage-result.js";

import { formatCommand, type ProcessRunner } from "./process-runner.js";

// =============================================================================
// TYPES
// =============================================================================

/** Events emitted around every external invocation (`tool.start` / `tool.complete`). */
export type ToolEventSink = (type: ToolEventType, payload: JsonObject) => void;

export type ExternalStep = {
  tool: string;
  /** argv prefix: executable followed by its fixed arguments. */
  command: string[];
  args: string[];
  cwd?: string;
  timeoutMs?: number;
  /** Files the step must leave behind for its run to count as complete. */
  artifacts: string[];
};

export type ExternalStepContext = {
  runner: ProcessRunner;
  signal?: AbortSignal;
  onEvent?: ToolEventSink;
};

export type ExternalStepStatus = "ok" | "exit_nonzero" | "timeout" | "unavailable" | "missing_output";

export type ExternalStepResult = {
  tool: string;
  status: ExternalStepStatus;
  exitCode: number | null;
  canceled: boolean;
  stderrTail: string;
  spawnError?: string;
  /** Expected artifacts that exist after the step, whatever its status. */
  present: string[];
  missing: string[];
};

export type StepFailureCodes = {
  failed: string;
  timeout: string;
  unavailable: string;
  missing: string;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const STDERR_TAIL_LINES = 20;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runExternalStep(
  step: ExternalStep,
  context: ExternalStepContext,
): Promise<ExternalStepResult> {
  const [executable, ...prefix] = step.command;
  const args = [...prefix, ...step.args];
  const commandLine = formatCommand(executable, args);

  context.onEvent?.("tool.start", { tool: step.tool, command: commandLine });

  const res = await context.runner.run({
    command: executable,
    args,
    cwd: step.cwd,
    timeoutMs: step.timeoutMs,
    signal: context.signal,
  });

  const present: string[] = [];
  const missing: string[] = [];
  for (const artifact of step.artifacts) {
    if (await pathExists(artifact)) {
      present.push(artifact);
    } else {
      missing.push(artifact);
    }
  }

  const status = classifyStep(res, missing);
  const result: ExternalStepResult = {
    tool: step.tool,
    status,
    exitCode: res.exitCode,
    canceled: res.canceled,
    stderrTail: tail(res.stderr, STDERR_TAIL_LINES),
    present,
    missing,
  };
  if (res.spawnError !== undefined) {
    result.spawnError = res.spawnError;
  }

  context.onEvent?.("tool.complete", {
    tool: step.tool,
    command: commandLine,
    status,
    exit_code: res.exitCode,
    timed_out: res.timedOut,
    canceled: res.canceled,
  });

  return result;
}

/**
 * The one mapping from an external step's outcome to a gate finding.
 * Returns null for a completed step.
 */
export function stepFailureFinding(
  label: string,
  result: ExternalStepResult,
  codes: StepFailureCodes,
  locator: Locator,
  severity: Severity = "BLOCKING",
): Finding | null {
  switch (result.status) {
    case "ok":
      return null;
    case "unavailable":
      return createFinding(
        codes.unavailable,
        `${label} could not be started: ${result.spawnError ?? "spawn failed"}`,
        locator,
        { severity },
      );
    case "timeout":
      return createFinding(
        codes.timeout,
        result.canceled ? `${label} was canceled before it finished.` : `${label} timed out.`,
        locator,
        { severity },
      );
    case "exit_nonzero":
      return createFinding(codes.failed, describeExit(label, result), locator, { severity });
    case "missing_output":
      return createFinding(
        codes.missing,
        `${label} exited 0 but did not write ${result.missing.map((file) => path.basename(file)).join(", ")}.`,
        locator,
        { severity },
      );
  }
}

export function describeExit(label: string, result: ExternalStepResult): string {
  const head = `${label} exited with code ${result.exitCode ?? "unknown"}.`;
  return result.stderrTail ? `${head} stderr:\n${result.stderrTail}` : head;
}

// =============================================================================
// INTERNALS
// =============================================================================

function classifyStep(
  res: { exitCode: number | null; timedOut: boolean; canceled: boolean; spawnError?: string },
  missing: string[],
): ExternalStepStatus {
  if (res.spawnError !== undefined) return "unavailable";
  if (res.timedOut || res.canceled) return "timeout";
  if (res.exitCode !== 0) return "exit_nonzero";
  if (missing.length > 0) return "missing_output";
  return "ok";
}
