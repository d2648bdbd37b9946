import { describe, expect, it } from "vitest";

import { parseEngineOutput, toRuleOutcomes } from "./engine-output.js";

describe("parseEngineOutput", () => {
  it("rejects documents that are not an array of results", () => {
    expect(() => parseEngineOutput('{"results": []}', "out.json")).toThrow(/^Engine output at out.json is malformed/);
    expect(() => parseEngineOutput("", "out.json")).toThrow(/^Engine output at out.json is not valid JSON/);
  });
});

describe("toRuleOutcomes", () => {
  it("maps engine error statuses to failures and keeps the raw status", () => {
    const entries = parseEngineOutput(
      JSON.stringify([
        { validation_name: "check_min_value", status: "CONFIG_ERROR", message: "'minimum' key not specified." },
        { validation_name: "check_units", status: "data_error", message: null, details: {} },
        { validation_name: "check_scaling", status: "SKIPPED" },
        { validation_name: "check_range", status: "WARNING", message: " Near the limit. " },
      ]),
      "out.json",
    );

    expect(toRuleOutcomes(entries, [])).toEqual([
      { ruleId: "check_min_value", status: "FAILED", detail: "CONFIG_ERROR: 'minimum' key not specified." },
      { ruleId: "check_units", status: "FAILED", detail: "DATA_ERROR" },
      { ruleId: "check_scaling", status: "FAILED", detail: "Unrecognized status SKIPPED" },
      { ruleId: "check_range", status: "WARNING", detail: "Near the limit." },
    ]);
  });
});
