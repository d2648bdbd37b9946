// =============================================================================
// STAGES
// =============================================================================

export const STAGE_NAMES = [
  "init",
  "preflight",
  "quality",
  "row_volume",
  "schema_review",
  "generate",
  "validate",
  "reconcile",
  "reclassify",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export type StageStatus = "PASSED" | "FAILED" | "SKIPPED";
export type Severity = "BLOCKING" | "ADVISORY";
export type OutcomeStatus = "PASSED" | "FAILED" | "WARNING";
export type Verdict = "PASS" | "FAIL";

// =============================================================================
// FINDINGS AND OUTCOMES
// =============================================================================

export type Locator = {
  file: string;
  line?: number;
  column?: number;
};

export type Finding = Readonly<{
  code: string;
  message: string;
  locator: Locator;
  limit?: number;
  /** Overrides the owning stage's severity for this finding only. */
  severity?: Severity;
}>;

export type RuleOutcome = Readonly<{
  ruleId: string;
  status: OutcomeStatus;
  detail: string;
  reclassifiedFrom?: OutcomeStatus;
}>;

export type StageResult = Readonly<{
  stage: StageName;
  status: StageStatus;
  severity: Severity;
  findings: readonly Finding[];
  outcomes?: readonly RuleOutcome[];
  /** Policy id consulted by the warn-only override, when the stage has one. */
  ruleId?: string;
  error?: string;
  note?: string;
}>;

// =============================================================================
// RESULT DOCUMENT
// =============================================================================

export type ResultRecord = {
  kind: "finding" | "outcome";
  stage: StageName;
  code: string;
  status: StageStatus | OutcomeStatus;
  severity: Severity;
  message: string;
  file?: string;
  line?: number;
  column?: number;
  limit?: number;
  rule_id?: string;
  reclassified_from?: string;
};

export type StageSummary = {
  stage: StageName;
  status: StageStatus;
  severity: Severity;
  note?: string;
  error?: string;
};

export type ResultCounts = {
  blocking: number;
  advisory: number;
  passed: number;
};

export type ResultDocument = {
  dataset: string;
  run_id: string;
  verdict: Verdict;
  aborted_stage: StageName | null;
  counts: ResultCounts;
  stages: StageSummary[];
  records: ResultRecord[];
};

export type FailureSidecar = {
  stage: StageName;
  code: string;
  message: string;
  limit?: number;
};
