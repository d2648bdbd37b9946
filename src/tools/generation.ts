import type { Finding, StageResult } from "../app/pipeline/types.js";
import { reportArtifactPath, summaryArtifactPath } from "../core/paths.js";
import { ensureDir, pathExists } from "../core/utils.js";
import { failedResult, passedResult } from "../validators/lib/stage-result.js";

import { runExternalStep, stepFailureFinding, type ExternalStepContext } from "./external-step.js";

// =============================================================================
// TYPES
// =============================================================================

export type GeneratorSettings = {
  command: string[];
  resolution: string;
  existenceChecks: boolean;
  timeoutMs?: number;
  cwd?: string;
};

export type GenerationInput = {
  mappingPath: string;
  tablePath: string;
  metadataPaths: string[];
  generateDir: string;
  lintDir: string;
  generator: GeneratorSettings;
};

export type ReportSource = "lint" | "generate";

export type GenerationArtifacts = {
  summaryPath: string;
  generationReportPath: string | null;
  lintReportPath: string | null;
  lintSummaryPath: string | null;
  /** Report read downstream: the lint report when lint produced one, else the generation report. */
  reportPath: string | null;
  reportSource: ReportSource | null;
};

export type GenerationOutcome = {
  result: StageResult;
  artifacts: GenerationArtifacts;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runGeneration(
  input: GenerationInput,
  context: ExternalStepContext,
): Promise<GenerationOutcome> {
  const findings: Finding[] = [];
  const inputs = [input.mappingPath, input.tablePath, ...input.metadataPaths];
  let lintReportPath: string | null = null;
  let lintSummaryPath: string | null = null;

  // Lint runs first and only with metadata; it is best effort.
  if (input.metadataPaths.length > 0) {
    await ensureDir(input.lintDir);
    const lintReport = reportArtifactPath(input.lintDir);
    const lint = await runExternalStep(
      {
        tool: "lint",
        command: input.generator.command,
        args: toolArgs("lint", inputs, input.lintDir, input.generator),
        cwd: input.generator.cwd,
        timeoutMs: input.generator.timeoutMs,
        artifacts: [lintReport],
      },
      context,
    );

    const lintFailure = stepFailureFinding(
      "Lint",
      lint,
      { failed: "LINT_FAILED", timeout: "LINT_FAILED", unavailable: "LINT_FAILED", missing: "LINT_FAILED" },
      { file: input.mappingPath },
      "ADVISORY",
    );
    if (lintFailure) {
      findings.push(lintFailure);
    } else {
      lintReportPath = lintReport;
      const lintSummary = summaryArtifactPath(input.lintDir);
      lintSummaryPath = (await pathExists(lintSummary)) ? lintSummary : null;
    }
  }

  await ensureDir(input.generateDir);
  const summaryPath = summaryArtifactPath(input.generateDir);
  const generationReport = reportArtifactPath(input.generateDir);
  const generation = await runExternalStep(
    {
      tool: "generator",
      command: input.generator.command,
      args: toolArgs("genmcf", inputs, input.generateDir, input.generator),
      cwd: input.generator.cwd,
      timeoutMs: input.generator.timeoutMs,
      artifacts: [summaryPath],
    },
    context,
  );

  const generationReportPath = (await pathExists(generationReport)) ? generationReport : null;
  const artifacts: GenerationArtifacts = {
    summaryPath,
    generationReportPath,
    lintReportPath,
    lintSummaryPath,
    reportPath: lintReportPath ?? generationReportPath,
    reportSource: lintReportPath ? "lint" : generationReportPath ? "generate" : null,
  };

  const failure = stepFailureFinding(
    "Generation tool",
    generation,
    {
      failed: "GENERATION_FAILED",
      timeout: "GENERATION_TIMEOUT",
      unavailable: "GENERATOR_UNAVAILABLE",
      missing: "SUMMARY_MISSING",
    },
    { file: input.mappingPath },
  );
  if (failure) {
    return { result: failedResult("generate", [...findings, failure]), artifacts };
  }

  const note = artifacts.reportSource ? `report from ${artifacts.reportSource}` : "no structured report";
  return { result: passedResult("generate", findings, { note }), artifacts };
}

export function toolArgs(
  mode: "lint" | "genmcf",
  inputs: string[],
  outputDir: string,
  settings: Pick<GeneratorSettings, "resolution" | "existenceChecks">,
): string[] {
  return [
    mode,
    ...inputs,
    `-o=${outputDir}`,
    `--resolution=${settings.resolution}`,
    `--existence-checks=${settings.existenceChecks}`,
  ];
}
