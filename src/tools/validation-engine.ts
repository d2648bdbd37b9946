import fse from "fs-extra";

import type { Finding, RuleOutcome, StageResult } from "../app/pipeline/types.js";
import { pathExists, readTextFile, writeJsonFile } from "../core/utils.js";
import type { Rule, RuleConfig } from "../rules/rule-config.js";
import { createFinding, failedResult, passedResult } from "../validators/lib/stage-result.js";

import { evaluateBuiltinRule, partitionRules } from "./builtin-rules.js";
import { parseEngineOutput, toRuleOutcomes } from "./engine-output.js";
import {
  describeExit,
  runExternalStep,
  stepFailureFinding,
  type ExternalStepContext,
  type ExternalStepResult,
} from "./external-step.js";
import type { GenerationArtifacts } from "./generation.js";
import { readStructuredReport, type StructuredReport } from "./structured-report.js";
import { writeNormalizedSummary } from "./summary-dates.js";

// =============================================================================
// TYPES
// =============================================================================

export type EngineSettings = {
  command: string[];
  timeoutMs?: number;
  cwd?: string;
};

export type ValidationPaths = {
  validationConfig: string;
  normalizedSummary: string;
  engineOutput: string;
};

export type ValidationInput = {
  rules: RuleConfig;
  artifacts: GenerationArtifacts;
  paths: ValidationPaths;
  emptyDifferPath: string;
  /** Prior-vs-current comparison; absent for first-time imports. */
  differPath?: string;
  engine: EngineSettings;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const ENGINE_FAILURE_CODES = {
  failed: "VALIDATION_ENGINE_FAILED",
  timeout: "VALIDATION_ENGINE_TIMEOUT",
  unavailable: "VALIDATION_ENGINE_FAILED",
  missing: "ENGINE_OUTPUT_INVALID",
} as const;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runValidation(input: ValidationInput, context: ExternalStepContext): Promise<StageResult> {
  const { engineRules, builtinRules } = partitionRules(input.rules);
  const builtinOutcomes = await evaluateBuiltinRules(builtinRules, input.artifacts.reportPath);

  if (engineRules.length === 0) {
    return withOutcomes(passedResult("validate", [], { note: outcomeNote(builtinOutcomes) }), builtinOutcomes);
  }

  await writeJsonFile(input.paths.validationConfig, {
    schema_version: input.rules.schema_version ?? "1.0",
    rules: engineRules,
  });

  const statsSummary = (await pathExists(input.artifacts.summaryPath))
    ? input.paths.normalizedSummary
    : "";
  if (statsSummary) {
    await writeNormalizedSummary(input.artifacts.summaryPath, statsSummary);
  }

  const differ = input.differPath && (await pathExists(input.differPath)) ? input.differPath : input.emptyDifferPath;

  // A stale document from an earlier attempt must not pass for this run's output.
  await fse.remove(input.paths.engineOutput);

  const step = await runExternalStep(
    {
      tool: "engine",
      command: input.engine.command,
      args: [
        `--validation_config=${input.paths.validationConfig}`,
        `--validation_output=${input.paths.engineOutput}`,
        `--stats_summary=${statsSummary}`,
        `--lint_report=${input.artifacts.reportPath ?? ""}`,
        `--differ_output=${differ}`,
      ],
      cwd: input.engine.cwd,
      timeoutMs: input.engine.timeoutMs,
      artifacts: [input.paths.engineOutput],
    },
    context,
  );

  return interpretEngineRun(step, input, builtinOutcomes);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function interpretEngineRun(
  step: ExternalStepResult,
  input: ValidationInput,
  builtinOutcomes: RuleOutcome[],
): Promise<StageResult> {
  const locator = { file: input.paths.engineOutput };
  const documentWritten = step.present.includes(input.paths.engineOutput);

  // Only a written document after a normal exit (zero or not) is worth reading.
  if (!documentWritten || (step.status !== "ok" && step.status !== "exit_nonzero")) {
    const failure =
      stepFailureFinding("Validation engine", step, ENGINE_FAILURE_CODES, locator) ??
      createFinding(ENGINE_FAILURE_CODES.missing, "Validation engine did not write a result document.", locator);
    return failedResult("validate", [failure]);
  }

  let engineOutcomes: RuleOutcome[];
  try {
    const { engineRules } = partitionRules(input.rules);
    engineOutcomes = toRuleOutcomes(
      parseEngineOutput(await readTextFile(input.paths.engineOutput), input.paths.engineOutput),
      engineRules,
    );
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return failedResult("validate", [createFinding(ENGINE_FAILURE_CODES.missing, detail, locator)]);
  }

  const outcomes = [...engineOutcomes, ...builtinOutcomes];
  const findings: Finding[] = [];

  if (step.status === "exit_nonzero") {
    // A non-zero exit is explained by failed outcomes; without any it is an engine fault.
    const explained = outcomes.some((outcome) => outcome.status === "FAILED");
    const exitFinding = createFinding("VALIDATION_ENGINE_EXIT", describeExit("Validation engine", step), locator, {
      severity: explained ? "ADVISORY" : "BLOCKING",
    });
    if (!explained) {
      return withOutcomes(failedResult("validate", [exitFinding]), outcomes);
    }
    findings.push(exitFinding);
  }

  return withOutcomes(passedResult("validate", findings, { note: outcomeNote(outcomes) }), outcomes);
}

async function evaluateBuiltinRules(rules: Rule[], reportPath: string | null): Promise<RuleOutcome[]> {
  if (rules.length === 0) return [];

  let report: StructuredReport | null = null;
  if (reportPath) {
    try {
      report = await readStructuredReport(reportPath);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return rules.map((rule): RuleOutcome => ({ ruleId: rule.rule_id, status: "FAILED", detail }));
    }
  }

  return rules.map((rule) => evaluateBuiltinRule(rule, report));
}

function withOutcomes(result: StageResult, outcomes: RuleOutcome[]): StageResult {
  return { ...result, outcomes };
}

function outcomeNote(outcomes: RuleOutcome[]): string {
  const failed = outcomes.filter((outcome) => outcome.status === "FAILED").length;
  return `${outcomes.length} rule outcome(s), ${failed} failed`;
}
