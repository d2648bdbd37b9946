import { isBlockingRecord } from "./aggregate.js";
import type { ResultDocument, ResultRecord, Verdict } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type SummaryEntry = {
  code: string;
  stage: string;
  message: string;
  location: string | null;
  reclassified_from: string | null;
};

export type PassedEntry = {
  code: string;
  message: string;
};

export type ReviewSummary = {
  verdict: Verdict;
  overall: string;
  blockers: SummaryEntry[];
  warnings: SummaryEntry[];
  passed: PassedEntry[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildReviewSummary(document: ResultDocument): ReviewSummary {
  const blockers = document.records.filter(isBlockingRecord).map(toEntry);
  const warnings = document.records
    .filter((record) => !isBlockingRecord(record) && record.status !== "PASSED")
    .map(toEntry);
  const passed = document.records
    .filter((record) => record.kind === "outcome" && record.status === "PASSED")
    .map((record) => ({ code: record.code, message: record.message }));

  return {
    verdict: document.verdict,
    overall: overallLabel(document.verdict, blockers.length, warnings.length),
    blockers,
    warnings,
    passed,
  };
}

export function overallLabel(verdict: Verdict, blockers: number, warnings: number): string {
  if (verdict === "FAIL") return `FAIL (${blockers} blockers)`;
  if (warnings > 0) return `PASS (with ${warnings} warnings)`;
  return "PASS";
}

export function formatLocation(record: Pick<ResultRecord, "file" | "line" | "column">): string | null {
  if (!record.file) return null;
  let location = record.file;
  if (record.line !== undefined) location += `:${record.line}`;
  if (record.column !== undefined) location += `:${record.column}`;
  return location;
}

/** Plain-text rendering for the terminal. */
export function formatReviewSummary(summary: ReviewSummary): string {
  const lines = [`Overall: ${summary.overall}`];
  for (const [title, entries] of [
    ["Blocking", summary.blockers],
    ["Advisory", summary.warnings],
  ] as const) {
    if (entries.length === 0) continue;
    lines.push("", `${title}:`);
    for (const entry of entries) {
      const where = entry.location ? ` [${entry.location}]` : "";
      const was = entry.reclassified_from ? ` (was ${entry.reclassified_from})` : "";
      lines.push(`  - ${entry.code} (${entry.stage}) ${entry.message}${where}${was}`);
    }
  }
  if (summary.passed.length > 0) {
    lines.push("", `Passed rules: ${summary.passed.map((entry) => entry.code).join(", ")}`);
  }
  return lines.join("\n");
}

// =============================================================================
// HELPERS
// =============================================================================

function toEntry(record: ResultRecord): SummaryEntry {
  return {
    code: record.code,
    stage: record.stage,
    message: record.message,
    location: formatLocation(record),
    reclassified_from: record.reclassified_from ?? null,
  };
}
