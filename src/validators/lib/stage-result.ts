// Shared constructors for StageResult/Finding so every stage shapes results the same way.

import type {
  Finding,
  Locator,
  Severity,
  StageName,
  StageResult,
} from "../../app/pipeline/types.js";

// =============================================================================
// FINDINGS
// =============================================================================

export function createFinding(
  code: string,
  message: string,
  locator: Locator,
  extras: { limit?: number; severity?: Severity } = {},
): Finding {
  const finding: { -readonly [K in keyof Finding]: Finding[K] } = { code, message, locator };
  if (extras.limit !== undefined) finding.limit = extras.limit;
  if (extras.severity !== undefined) finding.severity = extras.severity;
  return finding;
}

export function effectiveSeverity(finding: Finding, stage: StageResult): Severity {
  return finding.severity ?? stage.severity;
}

// =============================================================================
// STAGE RESULTS
// =============================================================================

type ResultExtras = {
  error?: string;
  note?: string;
  ruleId?: string;
};

export function passedResult(
  stage: StageName,
  findings: Finding[] = [],
  extras: ResultExtras = {},
): StageResult {
  return { stage, status: "PASSED", severity: "BLOCKING", findings, ...extras };
}

export function skippedResult(stage: StageName, note: string): StageResult {
  return { stage, status: "SKIPPED", severity: "ADVISORY", findings: [], note };
}

/**
 * A failed stage always carries at least one finding; when the caller has none,
 * one is synthesized from the error text.
 */
export function failedResult(
  stage: StageName,
  findings: Finding[],
  severity: Severity = "BLOCKING",
  extras: ResultExtras = {},
): StageResult {
  const resolved =
    findings.length > 0
      ? findings
      : [
          createFinding(
            `${stage.toUpperCase()}_FAILED`,
            extras.error ?? `Stage ${stage} failed.`,
            { file: "" },
          ),
        ];
  return { stage, status: "FAILED", severity, findings: resolved, ...extras };
}

/**
 * FAILED when any finding is blocking at the given stage severity; a stage whose
 * findings are all advisory still passes and surfaces them.
 */
export function resultFromFindings(
  stage: StageName,
  findings: Finding[],
  extras: ResultExtras = {},
): StageResult {
  const hasBlocking = findings.some((finding) => (finding.severity ?? "BLOCKING") === "BLOCKING");
  return hasBlocking
    ? failedResult(stage, findings, "BLOCKING", extras)
    : passedResult(stage, findings, extras);
}

export function isBlockingFailure(result: StageResult): boolean {
  return result.status === "FAILED" && result.severity === "BLOCKING";
}
