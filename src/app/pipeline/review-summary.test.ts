import { describe, expect, it } from "vitest";

import { buildReviewSummary, formatReviewSummary, overallLabel } from "./review-summary.js";
import type { ResultDocument } from "./types.js";

const document: ResultDocument = {
  dataset: "prices",
  run_id: "r1",
  verdict: "FAIL",
  aborted_stage: null,
  counts: { blocking: 1, advisory: 1, passed: 1 },
  stages: [],
  records: [
    {
      kind: "finding",
      stage: "schema_review",
      code: "MISSING_PREFIX",
      status: "FAILED",
      severity: "BLOCKING",
      message: "Value 'Count_Person' needs a dcs: prefix.",
      file: "prices.tmcf",
      line: 3,
      column: 19,
    },
    {
      kind: "outcome",
      stage: "validate",
      code: "check_min_value",
      status: "WARNING",
      severity: "ADVISORY",
      message: "1 value below 0",
      rule_id: "check_min_value",
      reclassified_from: "FAILED",
    },
    {
      kind: "outcome",
      stage: "validate",
      code: "check_units",
      status: "PASSED",
      severity: "ADVISORY",
      message: "check_units: PASSED",
      rule_id: "check_units",
    },
  ],
};

describe("buildReviewSummary", () => {
  it("splits records into blockers, warnings and passed rules", () => {
    const summary = buildReviewSummary(document);

    expect(summary.overall).toBe("FAIL (1 blockers)");
    expect(summary.blockers).toEqual([
      {
        code: "MISSING_PREFIX",
        stage: "schema_review",
        message: "Value 'Count_Person' needs a dcs: prefix.",
        location: "prices.tmcf:3:19",
        reclassified_from: null,
      },
    ]);
    expect(summary.warnings).toEqual([
      {
        code: "check_min_value",
        stage: "validate",
        message: "1 value below 0",
        location: null,
        reclassified_from: "FAILED",
      },
    ]);
    expect(summary.passed).toEqual([{ code: "check_units", message: "check_units: PASSED" }]);
  });

  it("labels passing runs with and without warnings", () => {
    expect(overallLabel("PASS", 0, 0)).toBe("PASS");
    expect(overallLabel("PASS", 0, 2)).toBe("PASS (with 2 warnings)");
  });
});

describe("formatReviewSummary", () => {
  it("renders one line per entry", () => {
    expect(formatReviewSummary(buildReviewSummary(document))).toBe(
      [
        "Overall: FAIL (1 blockers)",
        "",
        "Blocking:",
        "  - MISSING_PREFIX (schema_review) Value 'Count_Person' needs a dcs: prefix. [prices.tmcf:3:19]",
        "",
        "Advisory:",
        "  - check_min_value (validate) 1 value below 0 (was FAILED)",
        "",
        "Passed rules: check_units",
      ].join("\n"),
    );
  });
});
