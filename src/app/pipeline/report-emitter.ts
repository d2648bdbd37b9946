import fse from "fs-extra";

import type { RunPaths } from "../../core/paths.js";
import { renderReportTemplate } from "../../core/templates.js";
import { writeJsonFile, writeTextFile } from "../../core/utils.js";
import { effectiveSeverity } from "../../validators/lib/stage-result.js";

import { serializeResultDocument } from "./aggregate.js";
import { buildReviewSummary } from "./review-summary.js";
import type { FailureSidecar, ResultDocument, StageResult } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

/** Rendering boundary; the result documents are already on disk when it runs. */
export interface ReportRenderer {
  render(document: ResultDocument, paths: RunPaths): Promise<void>;
}

export type EmitReportOptions = {
  failure?: FailureSidecar;
  renderer?: ReportRenderer;
};

export type EmitReportResult = {
  rendered: boolean;
  renderError?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** Writes `[]` so the record file exists before any stage runs. */
export async function seedResultArtifacts(paths: RunPaths): Promise<void> {
  await writeJsonFile(paths.validationOutput, []);
}

export async function emitReport(
  document: ResultDocument,
  paths: RunPaths,
  options: EmitReportOptions = {},
): Promise<EmitReportResult> {
  await writeJsonFile(paths.validationOutput, document.records);
  await writeTextFile(paths.resultDocument, serializeResultDocument(document));

  if (options.failure) {
    await writeJsonFile(paths.failureSidecar, options.failure);
  } else {
    await fse.remove(paths.failureSidecar);
  }

  if (!options.renderer) {
    return { rendered: false };
  }

  try {
    await options.renderer.render(document, paths);
    return { rendered: true };
  } catch (err) {
    return { rendered: false, renderError: err instanceof Error ? err.message : String(err) };
  }
}

/** Sidecar describing the first blocking finding of the stage that aborted the run. */
export function failureFromResult(result: StageResult): FailureSidecar {
  const blocking = result.findings.find((finding) => effectiveSeverity(finding, result) === "BLOCKING");
  const finding = blocking ?? result.findings[0];
  const sidecar: FailureSidecar = {
    stage: result.stage,
    code: finding?.code ?? `${result.stage.toUpperCase()}_FAILED`,
    message: finding?.message ?? result.error ?? `Stage ${result.stage} failed.`,
  };
  if (finding?.limit !== undefined) sidecar.limit = finding.limit;
  return sidecar;
}

// =============================================================================
// MARKDOWN RENDERER
// =============================================================================

export class MarkdownReportRenderer implements ReportRenderer {
  async render(document: ResultDocument, paths: RunPaths): Promise<void> {
    await writeTextFile(paths.reportSummary, await renderMarkdownReport(document));
  }
}

export async function renderMarkdownReport(document: ResultDocument): Promise<string> {
  return renderReportTemplate("summary", reportContext(document));
}

// The template compiles in strict mode, so every field it reads is present (null when absent).
export function reportContext(document: ResultDocument): object {
  const summary = buildReviewSummary(document);
  return {
    dataset: document.dataset,
    run_id: document.run_id,
    overall: summary.overall,
    aborted_stage: document.aborted_stage,
    counts: document.counts,
    stages: document.stages.map((stage) => ({
      stage: stage.stage,
      status: stage.status,
      severity: stage.severity,
      note: stage.note ?? stage.error ?? null,
    })),
    blockers: summary.blockers,
    warnings: summary.warnings,
    passed: summary.passed,
  };
}
