import { describe, expect, it } from "vitest";

import { createFinding, failedResult, passedResult, skippedResult } from "../../validators/lib/stage-result.js";

import { aggregateResults, serializeResultDocument } from "./aggregate.js";
import type { StageResult } from "./types.js";

const results: StageResult[] = [
  passedResult("init"),
  passedResult("quality", [
    createFinding("EMPTY_COLUMN", "Column 'units' is empty.", { file: "t.csv", line: 1 }, { severity: "ADVISORY" }),
  ]),
  {
    ...passedResult("validate", [
      createFinding("VALIDATION_ENGINE_EXIT", "`Validation engine` exited with code 1.", { file: "" }, {
        severity: "ADVISORY",
      }),
    ]),
    outcomes: [
      { ruleId: "check_min_value", status: "FAILED", detail: "1 value below 0" },
      { ruleId: "check_units", status: "PASSED", detail: "" },
      { ruleId: "check_max_date", status: "WARNING", detail: "late date", reclassifiedFrom: "FAILED" },
    ],
  },
  skippedResult("reconcile", "no structured report"),
];

describe("aggregateResults", () => {
  it("builds records in stage order with findings before outcomes", () => {
    const doc = aggregateResults({ dataset: "prices", runId: "r1", results, abortedStage: null });

    expect(doc.records).toEqual([
      {
        kind: "finding",
        stage: "quality",
        code: "EMPTY_COLUMN",
        status: "FAILED",
        severity: "ADVISORY",
        message: "Column 'units' is empty.",
        file: "t.csv",
        line: 1,
      },
      {
        kind: "finding",
        stage: "validate",
        code: "VALIDATION_ENGINE_EXIT",
        status: "FAILED",
        severity: "ADVISORY",
        message: "`Validation engine` exited with code 1.",
      },
      {
        kind: "outcome",
        stage: "validate",
        code: "check_min_value",
        status: "FAILED",
        severity: "BLOCKING",
        message: "1 value below 0",
        rule_id: "check_min_value",
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
      {
        kind: "outcome",
        stage: "validate",
        code: "check_max_date",
        status: "WARNING",
        severity: "ADVISORY",
        message: "late date",
        rule_id: "check_max_date",
        reclassified_from: "FAILED",
      },
    ]);
    expect(doc.verdict).toBe("FAIL");
    expect(doc.counts).toEqual({ blocking: 1, advisory: 3, passed: 1 });
    expect(doc.stages.at(-1)).toEqual({
      stage: "reconcile",
      status: "SKIPPED",
      severity: "ADVISORY",
      note: "no structured report",
    });
  });

  it("fails an aborted run even without blocking records", () => {
    const doc = aggregateResults({
      dataset: "prices",
      runId: "r1",
      results: [passedResult("init")],
      abortedStage: "init",
    });

    expect(doc.records).toEqual([]);
    expect(doc.verdict).toBe("FAIL");
  });

  it("passes when nothing blocks", () => {
    const doc = aggregateResults({
      dataset: "prices",
      runId: "r1",
      results: [passedResult("init"), failedResult("reconcile", [createFinding("X", "x", { file: "r.json" })], "ADVISORY")],
      abortedStage: null,
    });

    expect(doc.verdict).toBe("PASS");
    expect(doc.records[0]?.severity).toBe("ADVISORY");
  });

  it("produces byte-identical output when run twice on the same results", () => {
    const input = { dataset: "prices", runId: "r1", results, abortedStage: null };

    const first = serializeResultDocument(aggregateResults(input));
    const second = serializeResultDocument(aggregateResults(input));

    expect(second).toBe(first);
  });
});
