import type { StageResult } from "../app/pipeline/types.js";
import { columnIndex, readDataTable } from "../core/table.js";
import type { GenerationArtifacts } from "../tools/generation.js";
import { hasCounter, levelCounters, readStructuredReport } from "../tools/structured-report.js";

import { createFinding, failedResult, passedResult, skippedResult } from "./lib/stage-result.js";

const OBSERVATION_COLUMN = "NumObservations";
const SUCCESS_COUNTER = "NumNodeSuccesses";

/**
 * Sum of summary observations against the report's node successes. Both sides
 * come from the same tool invocation; a lint report is never compared with a
 * generation summary.
 */
export async function runCountersCheck(artifacts: GenerationArtifacts): Promise<StageResult> {
  const pair = sameSourcePair(artifacts);
  if ("skip" in pair) {
    return skippedResult("reconcile", pair.skip);
  }

  let observations: number;
  try {
    const table = await readDataTable(pair.summaryPath);
    const index = columnIndex(table, OBSERVATION_COLUMN);
    if (index < 0) {
      return skippedResult("reconcile", `summary has no ${OBSERVATION_COLUMN} column`);
    }
    observations = table.rows.reduce((sum, row) => {
      const cell = row[index]?.trim() ?? "";
      const value = Number(cell);
      return cell && Number.isFinite(value) ? sum + value : sum;
    }, 0);
  } catch (err) {
    return skippedResult("reconcile", `summary unreadable: ${describe(err)}`);
  }

  let expected: number | undefined;
  try {
    const report = await readStructuredReport(pair.reportPath);
    if (!hasCounter(report, "LEVEL_INFO", SUCCESS_COUNTER)) {
      return skippedResult("reconcile", `${SUCCESS_COUNTER} not in report`);
    }
    expected = levelCounters(report, "LEVEL_INFO").get(SUCCESS_COUNTER);
  } catch (err) {
    return skippedResult("reconcile", `report unreadable: ${describe(err)}`);
  }

  if (expected === undefined) {
    return skippedResult("reconcile", `${SUCCESS_COUNTER} is not an integer`);
  }

  if (observations === expected) {
    return passedResult("reconcile", [], { note: `Match: ${observations} observations (${pair.source})` });
  }

  return failedResult(
    "reconcile",
    [
      createFinding(
        "OBSERVATION_COUNT_MISMATCH",
        `${OBSERVATION_COLUMN} sum (${observations}) != ${SUCCESS_COUNTER} (${expected})`,
        { file: pair.reportPath },
      ),
    ],
    "ADVISORY",
    { note: `compared ${pair.source} summary and report` },
  );
}

// =============================================================================
// HELPERS
// =============================================================================

type CounterSources =
  | { source: "lint" | "generate"; summaryPath: string; reportPath: string }
  | { skip: string };

function sameSourcePair(artifacts: GenerationArtifacts): CounterSources {
  if (artifacts.reportSource === "lint" && artifacts.lintReportPath) {
    return artifacts.lintSummaryPath
      ? { source: "lint", summaryPath: artifacts.lintSummaryPath, reportPath: artifacts.lintReportPath }
      : { skip: "lint report has no summary from the same run" };
  }
  if (artifacts.reportSource === "generate" && artifacts.generationReportPath) {
    return { source: "generate", summaryPath: artifacts.summaryPath, reportPath: artifacts.generationReportPath };
  }
  return { skip: "no structured report" };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
