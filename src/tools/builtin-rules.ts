import type { RuleOutcome } from "../app/pipeline/types.js";
import { isRuleEnabled, type Rule, type RuleConfig } from "../rules/rule-config.js";

import { levelCounters, type StructuredReport } from "./structured-report.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const STRUCTURAL_LINT_ERROR_COUNT = "STRUCTURAL_LINT_ERROR_COUNT";

/** Validators evaluated in-process. */
export const BUILTIN_VALIDATORS: ReadonlySet<string> = new Set([STRUCTURAL_LINT_ERROR_COUNT]);

/** Validators never sent to the engine: replaced by a built-in or retired. */
export const ENGINE_EXCLUDED_VALIDATORS: ReadonlySet<string> = new Set([
  "LINT_ERROR_COUNT",
  STRUCTURAL_LINT_ERROR_COUNT,
]);

// Resolution diagnostics depend on the remote API and are not structural errors.
const RESOLUTION_COUNTER_PREFIX = "Existence_FailedDcCall_";

// =============================================================================
// PUBLIC API
// =============================================================================

export type RulePartition = {
  engineRules: Rule[];
  builtinRules: Rule[];
};

/** Splits the enabled rules between the engine and the built-in validators. */
export function partitionRules(config: RuleConfig): RulePartition {
  const engineRules: Rule[] = [];
  const builtinRules: Rule[] = [];

  for (const rule of config.rules) {
    if (!isRuleEnabled(rule)) continue;
    if (BUILTIN_VALIDATORS.has(rule.validator)) {
      builtinRules.push(rule);
    } else if (!ENGINE_EXCLUDED_VALIDATORS.has(rule.validator)) {
      engineRules.push(rule);
    }
  }

  return { engineRules, builtinRules };
}

export function structuralLintErrorCount(report: StructuredReport | null): number {
  if (!report) return 0;
  let total = 0;
  for (const [key, value] of levelCounters(report, "LEVEL_ERROR")) {
    if (!key.startsWith(RESOLUTION_COUNTER_PREFIX)) total += value;
  }
  return total;
}

export function evaluateBuiltinRule(rule: Rule, report: StructuredReport | null): RuleOutcome {
  switch (rule.validator) {
    case STRUCTURAL_LINT_ERROR_COUNT:
      return checkStructuralLintErrors(rule, report);
    default:
      return {
        ruleId: rule.rule_id,
        status: "FAILED",
        detail: `No built-in validator named ${rule.validator}.`,
      };
  }
}

// =============================================================================
// VALIDATORS
// =============================================================================

function checkStructuralLintErrors(rule: Rule, report: StructuredReport | null): RuleOutcome {
  const threshold = rule.params.threshold ?? 0;
  if (typeof threshold !== "number") {
    return {
      ruleId: rule.rule_id,
      status: "FAILED",
      detail: "CONFIG_ERROR: 'threshold' must be a number.",
    };
  }

  const count = structuralLintErrorCount(report);
  if (count > threshold) {
    return {
      ruleId: rule.rule_id,
      status: "FAILED",
      detail: `Found ${count} structural schema/MCF lint errors (non-resolution), which exceeds the threshold of ${threshold}.`,
    };
  }

  return {
    ruleId: rule.rule_id,
    status: "PASSED",
    detail: `${count} structural lint error(s), threshold ${threshold}.`,
  };
}
