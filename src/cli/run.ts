import path from "node:path";

import { z } from "zod";

import { runPipeline, type PipelineRunResult } from "../app/pipeline/controller.js";
import type { PipelineObserver, PipelinePorts } from "../app/pipeline/ports.js";
import { MarkdownReportRenderer } from "../app/pipeline/report-emitter.js";
import { buildReviewSummary, formatReviewSummary } from "../app/pipeline/review-summary.js";
import { buildPipelineSettings } from "../app/pipeline/run-context.js";
import type { StageResult } from "../app/pipeline/types.js";
import { loadGateConfig } from "../core/config-loader.js";
import type { GateConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { datasetIdFromTable, runSegmentProblem } from "../core/paths.js";
import { defaultRunId } from "../core/utils.js";
import { parseRuleIdList } from "../rules/rule-selector.js";
import { ExecaProcessRunner, type ProcessRunner } from "../tools/process-runner.js";
import { createReviewerClientFactory, secondsToMs } from "../validators/lib/client.js";
import { LlmSchemaReviewer, type SchemaReviewer } from "../validators/schema-review/reviewer.js";

import { createStopSignalHandler } from "./signal-handlers.js";

// =============================================================================
// TYPES
// =============================================================================

export const RunFlagsSchema = z.object({
  mapping: z.string().min(1),
  table: z.string().min(1),
  metadata: z.array(z.string().min(1)).default([]),
  differ: z.string().min(1).optional(),
  dataset: z.string().min(1).optional(),
  runId: z.string().min(1).optional(),
  rules: z.string().optional(),
  skipRules: z.string().optional(),
  reviewer: z.boolean().optional(),
  advisory: z.boolean().optional(),
  timeout: z.number().positive().optional(),
  config: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  debug: z.boolean().default(false),
});

export type RunFlags = z.infer<typeof RunFlagsSchema>;

export type RunCommandDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  runner?: ProcessRunner;
  reviewer?: SchemaReviewer;
  signal?: AbortSignal;
};

// =============================================================================
// COMMAND
// =============================================================================

/** Runs one gate and returns the process exit code (0 only for PASS). */
export async function runGateCommand(flags: RunFlags, deps: RunCommandDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  // Warn-only documents key on the dataset id exactly as given.
  const dataset = flags.dataset === undefined ? undefined : requireRunSegment(flags.dataset, "--dataset");
  const runId = flags.runId === undefined ? defaultRunId() : requireRunSegment(flags.runId, "--run-id");
  const { config } = loadGateConfig({ configPath: flags.config, cwd, env: deps.env });

  const tablePath = path.resolve(cwd, flags.table);
  const settings = buildPipelineSettings(config, {
    runId,
    dataset: dataset ?? datasetIdFromTable(tablePath),
    inputs: {
      mappingPath: path.resolve(cwd, flags.mapping),
      tablePath,
      metadataPaths: flags.metadata.map((p) => path.resolve(cwd, p)),
      differPath: flags.differ ? path.resolve(cwd, flags.differ) : undefined,
    },
    ruleSelection: {
      include: parseRuleIdList(flags.rules),
      exclude: parseRuleIdList(flags.skipRules),
    },
    outputRoot: flags.outputDir ? path.resolve(cwd, flags.outputDir) : undefined,
    advisory: flags.advisory,
    timeoutMs: flags.timeout === undefined ? undefined : secondsToMs(flags.timeout),
  });

  const ports: PipelinePorts = {
    runner: deps.runner ?? new ExecaProcessRunner(),
    reviewer: resolveReviewer(config, flags, deps),
    renderer: new MarkdownReportRenderer(),
    observer: progressPrinter(),
  };

  console.log(`Gate run ${settings.runId} for dataset ${settings.dataset}`);

  const stopHandler = createStopSignalHandler({
    onSignal: (signal) => console.log(`Received ${signal}. Canceling run ${settings.runId}.`),
  });
  let run: PipelineRunResult;
  try {
    run = await runPipeline(settings, ports, { signal: deps.signal ?? stopHandler.signal, debug: flags.debug });
  } finally {
    stopHandler.cleanup();
  }

  console.log("");
  console.log(formatReviewSummary(buildReviewSummary(run.document)));
  if (run.document.aborted_stage) {
    console.log(`\nAborted at stage ${run.document.aborted_stage}.`);
  }
  if (run.renderError) {
    console.warn(`Warning: report rendering failed: ${run.renderError}`);
  }
  console.log(`\nResults: ${run.paths.resultDocument}`);

  return run.exitCode;
}

// =============================================================================
// HELPERS
// =============================================================================

function resolveReviewer(config: GateConfig, flags: RunFlags, deps: RunCommandDeps): SchemaReviewer | undefined {
  const reviewerConfig = config.schema_review.reviewer;
  if (!(flags.reviewer ?? reviewerConfig.enabled)) {
    return undefined;
  }
  if (deps.reviewer) {
    return deps.reviewer;
  }
  // The client is built on first use, so a missing key fails the schema_review stage, not the command.
  return new LlmSchemaReviewer(createReviewerClientFactory(reviewerConfig, deps.env ?? process.env), {
    temperature: reviewerConfig.temperature,
    timeoutMs: secondsToMs(reviewerConfig.timeout_seconds),
  });
}

function requireRunSegment(value: string, flag: string): string {
  const problem = runSegmentProblem(value);
  if (!problem) return value;
  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: `Invalid ${flag}.`,
    message: `${flag} '${value}' ${problem}.`,
    hint: "Dataset and run ids name a single directory under the output root.",
  });
}

function progressPrinter(): PipelineObserver {
  return {
    onStageComplete(result: StageResult) {
      console.log(formatProgressLine(result));
    },
  };
}

export function formatProgressLine(result: StageResult): string {
  const label = result.status === "FAILED" ? `FAILED/${result.severity}` : result.status;
  const note = result.note ?? result.error;
  return `  ${result.stage.padEnd(14)}${label}${note ? ` (${note})` : ""}`;
}
