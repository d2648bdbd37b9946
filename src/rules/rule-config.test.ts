import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { RuleConfigError } from "../core/errors.js";

import { isRuleEnabled, loadRuleConfig, validateRuleConfig } from "./rule-config.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function rule(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    rule_id: "check_min_value",
    description: "Minimum value is non-negative",
    validator: "MIN_VALUE_CHECK",
    scope: { data_source: "stats" },
    params: { minimum: 0 },
    ...overrides,
  };
}

describe("validateRuleConfig", () => {
  it("accepts a well-formed document", () => {
    const result = validateRuleConfig({
      rules: [
        rule(),
        rule({ rule_id: "check_lint", enabled: false, scope: { data_source: "lint" } }),
      ],
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.config.rules.map(isRuleEnabled)).toEqual([true, false]);
    }
  });

  it("reports duplicate ids, bad data sources, and unknown keys", () => {
    const result = validateRuleConfig({
      rules: [
        rule(),
        rule({ scope: { data_source: "warehouse" } }),
        rule({ rule_id: "check_other", extra: true }),
      ],
      owner: "nobody",
    });

    expect(result).toEqual({
      ok: false,
      issues: [
        'rules.1.scope.data_source: Expected one of "stats", "lint", "differ", received "warehouse"',
        "rules.2: Unrecognized keys: extra",
        "<root>: Unrecognized keys: owner",
      ],
    });
  });

  it("rejects ids that are not snake_case", () => {
    const result = validateRuleConfig({ rules: [rule({ rule_id: "CheckMin" })] });

    expect(result).toEqual({
      ok: false,
      issues: ["rules.0.rule_id: rule_id must be snake_case (lowercase letters, digits, underscores)"],
    });
  });

  it("flags duplicate rule ids", () => {
    const result = validateRuleConfig({ rules: [rule(), rule()] });

    expect(result).toEqual({
      ok: false,
      issues: ['rules.1.rule_id: Duplicate rule_id "check_min_value"'],
    });
  });
});

describe("loadRuleConfig", () => {
  it("wraps invalid JSON in a RuleConfigError", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rule-config-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, "rules.json");
    fs.writeFileSync(filePath, "{ not json", "utf8");

    await expect(loadRuleConfig(filePath)).rejects.toBeInstanceOf(RuleConfigError);
  });
});
