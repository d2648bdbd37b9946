import type { WarnOnlyPolicy } from "../../rules/warn-only.js";
import { isBlockingFailure, passedResult } from "../../validators/lib/stage-result.js";

import type { Finding, RuleOutcome, StageResult } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type Reclassification = {
  stage: StageResult["stage"];
  ruleId: string;
  kind: "outcome" | "stage";
};

export type ReclassifyOutput = {
  results: StageResult[];
  changes: Reclassification[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Applies the dataset's warn-only set to every result. Results and outcomes the
 * set does not name are returned as the same objects.
 */
export function reclassifyResults(
  results: readonly StageResult[],
  dataset: string,
  policy: WarnOnlyPolicy,
): ReclassifyOutput {
  const changes: Reclassification[] = [];
  const reclassified = results.map((result) => {
    const next = reclassifyStageResult(result, dataset, policy);
    if (result.ruleId && isBlockingFailure(result) && !isBlockingFailure(next)) {
      changes.push({ stage: result.stage, ruleId: result.ruleId, kind: "stage" });
    }
    for (const [index, outcome] of (next.outcomes ?? []).entries()) {
      if (outcome !== result.outcomes?.[index]) {
        changes.push({ stage: result.stage, ruleId: outcome.ruleId, kind: "outcome" });
      }
    }
    return next;
  });

  return { results: reclassified, changes };
}

export function reclassifyStageResult(result: StageResult, dataset: string, policy: WarnOnlyPolicy): StageResult {
  const outcomes = result.outcomes?.map((outcome) => reclassifyOutcome(outcome, dataset, policy));
  const outcomesChanged = outcomes?.some((outcome, index) => outcome !== result.outcomes?.[index]) ?? false;
  const stageMatches = result.ruleId !== undefined && isBlockingFailure(result) && policy.isWarnOnly(dataset, result.ruleId);

  if (!stageMatches && !outcomesChanged) {
    return result;
  }

  let next: StageResult = outcomesChanged ? { ...result, outcomes } : result;
  if (stageMatches) {
    next = {
      ...next,
      severity: "ADVISORY",
      findings: next.findings.map(downgradeFinding),
      note: `reclassified from FAILED/BLOCKING by warn-only policy for ${dataset}`,
    };
  }
  return next;
}

export function reclassifyOutcome(outcome: RuleOutcome, dataset: string, policy: WarnOnlyPolicy): RuleOutcome {
  if (outcome.status !== "FAILED" || !policy.isWarnOnly(dataset, outcome.ruleId)) {
    return outcome;
  }
  return { ...outcome, status: "WARNING", reclassifiedFrom: "FAILED" };
}

/** The RECLASSIFY stage's own entry in the result list. */
export function reclassifyStageSummary(dataset: string, policy: WarnOnlyPolicy, changes: Reclassification[]): StageResult {
  if (changes.length === 0 && policy.warnOnlyIds(dataset).size === 0) {
    return passedResult("reclassify", [], { note: `no warn-only entry for ${dataset}` });
  }
  return passedResult("reclassify", [], { note: `${changes.length} result(s) downgraded for ${dataset}` });
}

// =============================================================================
// HELPERS
// =============================================================================

function downgradeFinding(finding: Finding): Finding {
  return finding.severity === "BLOCKING" ? { ...finding, severity: "ADVISORY" } : finding;
}
