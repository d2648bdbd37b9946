import { serializeJson } from "../../core/utils.js";

import type {
  Finding,
  ResultCounts,
  ResultDocument,
  ResultRecord,
  RuleOutcome,
  Severity,
  StageName,
  StageResult,
  StageSummary,
  Verdict,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type AggregateInput = {
  dataset: string;
  runId: string;
  results: readonly StageResult[];
  abortedStage: StageName | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Records follow stage execution order, findings before outcomes within a
 * stage. Nothing is sorted, so equal inputs give byte-identical documents.
 */
export function aggregateResults(input: AggregateInput): ResultDocument {
  const records = toRecords(input.results);
  return {
    dataset: input.dataset,
    run_id: input.runId,
    verdict: computeVerdict(records, input.abortedStage),
    aborted_stage: input.abortedStage,
    counts: countRecords(records),
    stages: input.results.map(toStageSummary),
    records,
  };
}

export function toRecords(results: readonly StageResult[]): ResultRecord[] {
  return results.flatMap((result) => [
    ...result.findings.map((finding) => findingRecord(result, finding)),
    ...(result.outcomes ?? []).map((outcome) => outcomeRecord(result, outcome)),
  ]);
}

export function computeVerdict(records: readonly ResultRecord[], abortedStage: StageName | null): Verdict {
  if (abortedStage !== null) return "FAIL";
  return records.some(isBlockingRecord) ? "FAIL" : "PASS";
}

export function isBlockingRecord(record: ResultRecord): boolean {
  return record.status === "FAILED" && record.severity === "BLOCKING";
}

export function serializeResultDocument(document: ResultDocument): string {
  return serializeJson(document);
}

// =============================================================================
// RECORDS
// =============================================================================

// A finding in a stage that did not fail never blocks, whatever the stage default.
function findingSeverity(result: StageResult, finding: Finding): Severity {
  if (finding.severity) return finding.severity;
  return result.status === "FAILED" ? result.severity : "ADVISORY";
}

function findingRecord(result: StageResult, finding: Finding): ResultRecord {
  const record: ResultRecord = {
    kind: "finding",
    stage: result.stage,
    code: finding.code,
    status: "FAILED",
    severity: findingSeverity(result, finding),
    message: finding.message,
  };
  if (finding.locator.file) record.file = finding.locator.file;
  if (finding.locator.line !== undefined) record.line = finding.locator.line;
  if (finding.locator.column !== undefined) record.column = finding.locator.column;
  if (finding.limit !== undefined) record.limit = finding.limit;
  if (result.ruleId !== undefined) record.rule_id = result.ruleId;
  return record;
}

function outcomeRecord(result: StageResult, outcome: RuleOutcome): ResultRecord {
  const record: ResultRecord = {
    kind: "outcome",
    stage: result.stage,
    code: outcome.ruleId,
    status: outcome.status,
    severity: outcome.status === "FAILED" ? "BLOCKING" : "ADVISORY",
    message: outcome.detail || `${outcome.ruleId}: ${outcome.status}`,
    rule_id: outcome.ruleId,
  };
  if (outcome.reclassifiedFrom !== undefined) record.reclassified_from = outcome.reclassifiedFrom;
  return record;
}

function toStageSummary(result: StageResult): StageSummary {
  const summary: StageSummary = { stage: result.stage, status: result.status, severity: result.severity };
  if (result.note !== undefined) summary.note = result.note;
  if (result.error !== undefined) summary.error = result.error;
  return summary;
}

function countRecords(records: readonly ResultRecord[]): ResultCounts {
  const counts: ResultCounts = { blocking: 0, advisory: 0, passed: 0 };
  for (const record of records) {
    if (record.status === "PASSED") {
      counts.passed += 1;
    } else if (isBlockingRecord(record)) {
      counts.blocking += 1;
    } else {
      counts.advisory += 1;
    }
  }
  return counts;
}
