/**
 * Pipeline controller: drives one gate run through the stage state machine.
 * Purpose: own the PipelineContext, run each stage in order, and stop at the
 * first FAILED/BLOCKING result.
 * Assumptions: stages return StageResults; anything they throw is converted
 * here and never escapes the run.
 * Usage: runPipeline(settings, ports, { signal }) from the CLI or tests.
 */

import { createDeadline, type Deadline } from "../../core/deadline.js";
import { RuleConfigError, RuleSelectionError, type RuleSelectionErrorKind } from "../../core/errors.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { RunEventLog } from "../../core/logger.js";
import type { RunPaths } from "../../core/paths.js";
import { ensureDir } from "../../core/utils.js";
import { loadRuleConfig, type RuleConfig } from "../../rules/rule-config.js";
import { selectRules } from "../../rules/rule-selector.js";
import { EMPTY_WARN_ONLY_POLICY, WarnOnlyConfigError, loadWarnOnlyPolicy } from "../../rules/warn-only.js";
import type { ExternalStepContext } from "../../tools/external-step.js";
import { runGeneration, type GenerationArtifacts } from "../../tools/generation.js";
import { runValidation } from "../../tools/validation-engine.js";
import { runCountersCheck } from "../../validators/counters.js";
import { runDataQualityCheck } from "../../validators/data-quality.js";
import { createFinding, failedResult, passedResult } from "../../validators/lib/stage-result.js";
import { runPreflight } from "../../validators/preflight.js";
import { runRowVolumeCheck } from "../../validators/row-volume.js";
import { runSchemaReview } from "../../validators/schema-review/index.js";

import { aggregateResults } from "./aggregate.js";
import type { PipelinePorts } from "./ports.js";
import {
  reclassifyResults,
  reclassifyStageResult,
  reclassifyStageSummary,
  type Reclassification,
} from "./reclassify.js";
import { emitReport, failureFromResult, seedResultArtifacts } from "./report-emitter.js";
import { createPipelineContext, type PipelineContext, type PipelineSettings } from "./run-context.js";
import { isStageState, nextState, stageForState, type PipelineState, type StageState } from "./state-machine.js";
import type { FailureSidecar, ResultDocument, StageName, StageResult, Verdict } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunPipelineOptions = {
  signal?: AbortSignal;
  debug?: boolean;
};

export type PipelineRunResult = {
  verdict: Verdict;
  exitCode: number;
  document: ResultDocument;
  paths: RunPaths;
  failure?: FailureSidecar;
  renderError?: string;
};

type StageRuntime = {
  context: PipelineContext;
  ports: PipelinePorts;
  deadline: Deadline;
  log: RunEventLog;
  /** Row-volume downgrades applied before the RECLASSIFY stage runs. */
  earlyChanges: Reclassification[];
};

// =============================================================================
// CONSTANTS
// =============================================================================

const SELECTION_FAILURE_CODES: Record<RuleSelectionErrorKind, string> = {
  usage: "RULE_SELECTION_CONFLICT",
  unknown_ids: "UNKNOWN_RULE_ID",
  empty: "NO_RULES_SELECTED",
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPipeline(
  settings: PipelineSettings,
  ports: PipelinePorts,
  options: RunPipelineOptions = {},
): Promise<PipelineRunResult> {
  const context = createPipelineContext(settings);
  await ensureDir(context.paths.runDir);

  const log = new RunEventLog(
    context.paths.eventsLog,
    { runId: settings.runId, dataset: settings.dataset },
    { debug: options.debug },
  );
  const deadline = createDeadline({ signal: options.signal, timeoutMs: settings.timeoutMs });
  const runtime: StageRuntime = { context, ports, deadline, log, earlyChanges: [] };

  try {
    await seedResultArtifacts(context.paths);
    log.emit("run.start", {
      payload: {
        mapping: settings.inputs.mappingPath,
        table: settings.inputs.tablePath,
        metadata: settings.inputs.metadataPaths,
      },
    });

    let state: PipelineState = "INIT";
    let failure: FailureSidecar | undefined;

    while (isStageState(state)) {
      const stage = stageForState(state);
      ports.observer?.onStageStart?.(stage);
      log.emit("stage.start", { stage });

      const result = await executeStage(state, runtime);
      context.results.push(result);
      log.emit("stage.complete", {
        stage,
        payload: { status: result.status, severity: result.severity, findings: result.findings.length },
      });
      ports.observer?.onStageComplete?.(result);

      const transition = nextState(state, result);
      if (transition.aborted) {
        context.abortedStage = stage;
        failure = failureFromResult(result);
        log.emit("run.abort", { stage, payload: { code: failure.code, message: failure.message } });
      }
      state = transition.next;
    }

    const document = aggregateResults({
      dataset: settings.dataset,
      runId: settings.runId,
      results: context.results,
      abortedStage: context.abortedStage,
    });
    const emitted = await emitReport(document, context.paths, { failure, renderer: ports.renderer });
    if (emitted.renderError !== undefined) {
      log.emit("report.render_failed", { payload: { message: emitted.renderError } });
    }
    state = nextState(state).next;

    log.emit("run.complete", {
      payload: { verdict: document.verdict, aborted_stage: document.aborted_stage, ...document.counts },
    });

    const run: PipelineRunResult = {
      verdict: document.verdict,
      exitCode: verdictExitCode(document.verdict),
      document,
      paths: context.paths,
    };
    if (failure) run.failure = failure;
    if (emitted.renderError !== undefined) run.renderError = emitted.renderError;
    return run;
  } finally {
    deadline.dispose();
    log.close();
  }
}

export function verdictExitCode(verdict: Verdict): number {
  return verdict === "PASS" ? 0 : 1;
}

// =============================================================================
// STAGE DISPATCH
// =============================================================================

async function executeStage(state: StageState, runtime: StageRuntime): Promise<StageResult> {
  const stage = stageForState(state);
  if (runtime.deadline.signal.aborted) {
    return interruptedResult(stage, runtime);
  }

  try {
    return await runStage(state, runtime);
  } catch (err) {
    return failedResult(
      stage,
      [
        createFinding("INTERNAL_ERROR", `Stage ${stage} raised an unexpected error: ${formatErrorMessage(err)}`, {
          file: "",
        }),
      ],
      "BLOCKING",
      { error: formatErrorMessage(err) },
    );
  }
}

async function runStage(state: StageState, runtime: StageRuntime): Promise<StageResult> {
  const { context, ports, deadline } = runtime;
  const { settings, paths } = context;
  const inputs = settings.inputs;

  switch (state) {
    case "INIT":
      return runInit(context);
    case "PREFLIGHT":
      return runPreflight({
        mappingPath: inputs.mappingPath,
        tablePath: inputs.tablePath,
        metadataPaths: inputs.metadataPaths,
      });
    case "QUALITY":
      return runDataQualityCheck({
        tablePath: inputs.tablePath,
        valueColumn: settings.quality.valueColumn,
        emptyColumns: settings.quality.emptyColumns,
      });
    case "ROW_VOLUME":
      return applyRowVolumePolicy(
        await runRowVolumeCheck({
          tablePath: inputs.tablePath,
          threshold: settings.rowVolume.threshold,
          ruleId: settings.rowVolume.ruleId,
        }),
        runtime,
      );
    case "SCHEMA_REVIEW":
      return runSchemaReview({
        mappingPath: inputs.mappingPath,
        tablePath: inputs.tablePath,
        metadataPaths: inputs.metadataPaths,
        reviewer: ports.reviewer,
        advisory: settings.reviewer.advisory,
        timeoutMs: settings.reviewer.timeoutMs,
        signal: deadline.signal,
      });
    case "GENERATE": {
      const { result, artifacts } = await runGeneration(
        {
          mappingPath: inputs.mappingPath,
          tablePath: inputs.tablePath,
          metadataPaths: inputs.metadataPaths,
          generateDir: paths.generateDir,
          lintDir: paths.lintDir,
          generator: settings.generator,
        },
        stepContext(runtime, "generate"),
      );
      context.artifacts = artifacts;
      return result;
    }
    case "VALIDATE":
      return runValidation(
        {
          rules: requireRules(context),
          artifacts: requireArtifacts(context),
          paths: {
            validationConfig: paths.validationConfig,
            normalizedSummary: paths.normalizedSummary,
            engineOutput: paths.engineOutput,
          },
          emptyDifferPath: settings.engine.emptyDifferPath,
          differPath: inputs.differPath,
          engine: settings.engine,
        },
        stepContext(runtime, "validate"),
      );
    case "RECONCILE":
      return runCountersCheck(requireArtifacts(context));
    case "RECLASSIFY":
      return runReclassify(runtime);
  }
}

// =============================================================================
// STAGES OWNED BY THE CONTROLLER
// =============================================================================

async function runInit(context: PipelineContext): Promise<StageResult> {
  const { settings } = context;
  const rulesLocator = { file: settings.rulesConfigPath };

  let loaded: RuleConfig;
  try {
    loaded = await loadRuleConfig(settings.rulesConfigPath);
  } catch (err) {
    if (!(err instanceof RuleConfigError)) throw err;
    return initFailure("RULE_CONFIG_INVALID", err.message, rulesLocator.file);
  }

  try {
    context.rules = selectRules(loaded, settings.ruleSelection);
  } catch (err) {
    if (!(err instanceof RuleSelectionError)) throw err;
    return initFailure(SELECTION_FAILURE_CODES[err.kind], err.message, rulesLocator.file);
  }

  const rowVolumePath = settings.rowVolume.warnOnlyPath;
  try {
    context.warnOnly = await loadWarnOnlyPolicy(settings.warnOnlyPath);
    context.rowVolumePolicy =
      rowVolumePath === undefined ? context.warnOnly : await loadWarnOnlyPolicy(rowVolumePath);
  } catch (err) {
    if (!(err instanceof WarnOnlyConfigError)) throw err;
    return initFailure("WARN_ONLY_INVALID", err.message, rowVolumePath ?? settings.warnOnlyPath);
  }

  const total = loaded.rules.length;
  const selected = context.rules.rules.length;
  return passedResult("init", [], { note: `${selected} of ${total} rule(s) selected` });
}

/** Row volume is the one stage whose severity the warn-only policy decides before the abort check. */
function applyRowVolumePolicy(result: StageResult, runtime: StageRuntime): StageResult {
  const { settings } = runtime.context;
  const policy = runtime.context.rowVolumePolicy ?? EMPTY_WARN_ONLY_POLICY;
  const resolved = reclassifyStageResult(result, settings.dataset, policy);
  if (resolved !== result && result.ruleId !== undefined) {
    runtime.earlyChanges.push({ stage: result.stage, ruleId: result.ruleId, kind: "stage" });
    runtime.log.emit("stage.reclassified", { stage: result.stage, payload: { rule_id: result.ruleId, kind: "stage" } });
  }
  return resolved;
}

function runReclassify(runtime: StageRuntime): StageResult {
  const { context, log } = runtime;
  const dataset = context.settings.dataset;
  const policy = context.warnOnly ?? EMPTY_WARN_ONLY_POLICY;

  const { results, changes } = reclassifyResults(context.results, dataset, policy);
  context.results.splice(0, context.results.length, ...results);
  for (const change of changes) {
    log.emit("stage.reclassified", { stage: change.stage, payload: { rule_id: change.ruleId, kind: change.kind } });
  }

  return reclassifyStageSummary(dataset, policy, [...runtime.earlyChanges, ...changes]);
}

// =============================================================================
// HELPERS
// =============================================================================

function stepContext(runtime: StageRuntime, stage: StageName): ExternalStepContext {
  return {
    runner: runtime.ports.runner,
    signal: runtime.deadline.signal,
    onEvent: (type, payload) => runtime.log.emit(type, { stage, payload }),
  };
}

function interruptedResult(stage: StageName, runtime: StageRuntime): StageResult {
  const timedOut = runtime.deadline.timedOut;
  const code = timedOut ? "RUN_TIMEOUT" : "RUN_CANCELED";
  const message = timedOut
    ? `Run timed out before stage ${stage} started.`
    : `Run was canceled before stage ${stage} started.`;
  return failedResult(stage, [createFinding(code, message, { file: "" })]);
}

function initFailure(code: string, message: string, file: string): StageResult {
  return failedResult("init", [createFinding(code, message, { file })]);
}

function requireRules(context: PipelineContext): RuleConfig {
  if (!context.rules) {
    throw new Error("Rule configuration was not loaded before validation");
  }
  return context.rules;
}

function requireArtifacts(context: PipelineContext): GenerationArtifacts {
  if (!context.artifacts) {
    throw new Error("Generation artifacts are not available");
  }
  return context.artifacts;
}
