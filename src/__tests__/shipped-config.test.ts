import path from "node:path";
import { fileURLToPath } from "node:url";

import { describe, expect, it } from "vitest";

import { loadGateConfig } from "../core/config-loader.js";
import { loadRuleConfig } from "../rules/rule-config.js";
import { loadWarnOnlyPolicy } from "../rules/warn-only.js";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");

describe("shipped configuration", () => {
  it("loads the example gate config and the documents it points at", async () => {
    const { config } = loadGateConfig({ configPath: path.join(repoRoot, "import-gate.example.yaml") });

    expect(config.rules_config).toBe(path.join(repoRoot, "config", "rules.json"));
    expect(config.row_volume.threshold).toBe(1000);

    const rules = await loadRuleConfig(config.rules_config);
    expect(rules.rules.map((rule) => rule.rule_id)).toContain("check_min_value");

    const warnOnly = await loadWarnOnlyPolicy(config.warn_only);
    expect(warnOnly.isWarnOnly("example-dataset", "CHECK_MAX_DATE_LATEST")).toBe(true);
  });
});
