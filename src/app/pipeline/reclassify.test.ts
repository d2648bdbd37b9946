import { describe, expect, it } from "vitest";

import { createWarnOnlyPolicy } from "../../rules/warn-only.js";
import { createFinding, failedResult, passedResult } from "../../validators/lib/stage-result.js";

import { reclassifyResults, reclassifyStageSummary } from "./reclassify.js";
import type { StageResult } from "./types.js";

const validate: StageResult = {
  ...passedResult("validate"),
  outcomes: [
    { ruleId: "check_min_value", status: "FAILED", detail: "1 value below 0" },
    { ruleId: "check_units", status: "FAILED", detail: "mixed units" },
    { ruleId: "check_max_date", status: "PASSED", detail: "" },
  ],
};

const rowVolume = failedResult(
  "row_volume",
  [createFinding("ROW_COUNT_EXCEEDED", "too many rows", { file: "t.csv" }, { limit: 1000 })],
  "BLOCKING",
  { ruleId: "check_csv_row_count" },
);

describe("reclassifyResults", () => {
  it("is the identity for a dataset without a warn-only entry", () => {
    const policy = createWarnOnlyPolicy({ other: ["check_min_value", "check_csv_row_count"] });
    const results = [rowVolume, validate];

    const output = reclassifyResults(results, "prices", policy);

    expect(output.changes).toEqual([]);
    expect(output.results[0]).toBe(rowVolume);
    expect(output.results[1]).toBe(validate);
  });

  it("turns only the listed rule's FAILED outcome into WARNING", () => {
    const policy = createWarnOnlyPolicy({ prices: [" Check_Min_Value "] });

    const output = reclassifyResults([validate], "prices", policy);

    expect(output.results[0]?.outcomes).toEqual([
      { ruleId: "check_min_value", status: "WARNING", detail: "1 value below 0", reclassifiedFrom: "FAILED" },
      validate.outcomes?.[1],
      validate.outcomes?.[2],
    ]);
    expect(output.results[0]?.outcomes?.[1]).toBe(validate.outcomes?.[1]);
    expect(output.changes).toEqual([{ stage: "validate", ruleId: "check_min_value", kind: "outcome" }]);
  });

  it("downgrades a blocking stage result that carries a warn-only rule id", () => {
    const policy = createWarnOnlyPolicy({ prices: ["check_csv_row_count"] });

    const output = reclassifyResults([rowVolume], "prices", policy);

    expect(output.results[0]).toMatchObject({
      status: "FAILED",
      severity: "ADVISORY",
      note: "reclassified from FAILED/BLOCKING by warn-only policy for prices",
    });
    expect(output.changes).toEqual([{ stage: "row_volume", ruleId: "check_csv_row_count", kind: "stage" }]);
  });
});

describe("reclassifyStageSummary", () => {
  it("notes a missing entry or the number of downgrades", () => {
    const policy = createWarnOnlyPolicy({ prices: ["check_min_value"] });

    expect(reclassifyStageSummary("births", policy, []).note).toBe("no warn-only entry for births");
    expect(
      reclassifyStageSummary("prices", policy, [{ stage: "validate", ruleId: "check_min_value", kind: "outcome" }])
        .note,
    ).toBe("1 result(s) downgraded for prices");
  });
});
