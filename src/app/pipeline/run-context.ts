/**
 * Run-scoped state for one gate run.
 * Purpose: replace ambient environment and working-directory lookups with one
 * context object built at the start of a run.
 * Usage: buildPipelineSettings(config, overrides) then runPipeline(settings, ports).
 */

import type { GateConfig } from "../../core/config.js";
import { createRunPaths, type RunPaths } from "../../core/paths.js";
import { packagedTemplatePath } from "../../core/templates.js";
import type { RuleConfig } from "../../rules/rule-config.js";
import type { RuleSelection } from "../../rules/rule-selector.js";
import type { WarnOnlyPolicy } from "../../rules/warn-only.js";
import type { GenerationArtifacts, GeneratorSettings } from "../../tools/generation.js";
import type { EngineSettings } from "../../tools/validation-engine.js";
import type { EmptyColumnMode } from "../../validators/data-quality.js";
import { secondsToMs } from "../../validators/lib/client.js";

import type { StageName, StageResult } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunInputs = {
  mappingPath: string;
  tablePath: string;
  metadataPaths: string[];
  differPath?: string;
};

export type PipelineSettings = {
  runId: string;
  dataset: string;
  inputs: RunInputs;
  outputRoot: string;
  rulesConfigPath: string;
  ruleSelection: RuleSelection;
  warnOnlyPath: string;
  rowVolume: {
    threshold: number;
    ruleId: string;
    /** Separate override table for the row check; the shared one when absent. */
    warnOnlyPath?: string;
  };
  quality: {
    valueColumn: string;
    emptyColumns: EmptyColumnMode;
  };
  reviewer: {
    advisory: boolean;
    timeoutMs?: number;
  };
  generator: GeneratorSettings;
  engine: EngineSettings & { emptyDifferPath: string };
  /** Caller wall-clock limit for the whole run; caps every external invocation. */
  timeoutMs?: number;
};

export type SettingsOverrides = {
  runId: string;
  dataset: string;
  inputs: RunInputs;
  ruleSelection?: RuleSelection;
  outputRoot?: string;
  advisory?: boolean;
  timeoutMs?: number;
};

/** Owned by the controller; stages only ever see the slices they are handed. */
export type PipelineContext = {
  readonly settings: PipelineSettings;
  readonly paths: RunPaths;
  rules: RuleConfig | null;
  warnOnly: WarnOnlyPolicy | null;
  rowVolumePolicy: WarnOnlyPolicy | null;
  artifacts: GenerationArtifacts | null;
  readonly results: StageResult[];
  abortedStage: StageName | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildPipelineSettings(config: GateConfig, overrides: SettingsOverrides): PipelineSettings {
  const reviewer = config.schema_review.reviewer;
  return {
    runId: overrides.runId,
    dataset: overrides.dataset,
    inputs: overrides.inputs,
    outputRoot: overrides.outputRoot ?? config.output_dir,
    rulesConfigPath: config.rules_config,
    ruleSelection: overrides.ruleSelection ?? {},
    warnOnlyPath: config.warn_only,
    rowVolume: {
      threshold: config.row_volume.threshold,
      ruleId: config.row_volume.rule_id,
      warnOnlyPath: config.row_volume.warn_only,
    },
    quality: {
      valueColumn: config.quality.value_column,
      emptyColumns: config.quality.empty_columns,
    },
    reviewer: {
      advisory: overrides.advisory ?? reviewer.advisory,
      timeoutMs: secondsToMs(reviewer.timeout_seconds),
    },
    generator: {
      command: config.generator.command,
      resolution: config.generator.resolution,
      existenceChecks: config.generator.existence_checks,
      timeoutMs: secondsToMs(config.generator.timeout_seconds),
      cwd: config.generator.cwd,
    },
    engine: {
      command: config.validator.command,
      timeoutMs: secondsToMs(config.validator.timeout_seconds),
      cwd: config.validator.cwd,
      emptyDifferPath: config.validator.empty_differ ?? packagedTemplatePath("empty-differ.csv"),
    },
    timeoutMs: overrides.timeoutMs,
  };
}

export function createPipelineContext(settings: PipelineSettings): PipelineContext {
  return {
    settings,
    paths: createRunPaths(settings.outputRoot, settings.dataset, settings.runId),
    rules: null,
    warnOnly: null,
    rowVolumePolicy: null,
    artifacts: null,
    results: [],
    abortedStage: null,
  };
}
