import { RuleSelectionError } from "../core/errors.js";

import type { Rule, RuleConfig } from "./rule-config.js";

// =============================================================================
// TYPES
// =============================================================================

export type RuleSelection = {
  include?: readonly string[];
  exclude?: readonly string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseRuleIdList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const ids = value
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  return ids.length > 0 ? ids : undefined;
}

/**
 * Returns a new config holding only the selected rules, in their original order.
 * Empty sets count as "not supplied".
 */
export function selectRules(config: RuleConfig, selection: RuleSelection): RuleConfig {
  const include = normalizeIds(selection.include);
  const exclude = normalizeIds(selection.exclude);

  if (include && exclude) {
    throw new RuleSelectionError(
      "Rule inclusion and exclusion sets are mutually exclusive; pass only one of them.",
      "usage",
    );
  }

  const requested = include ?? exclude;
  if (!requested) {
    return { ...config, rules: [...config.rules] };
  }

  const known = new Map<string, Rule>(config.rules.map((rule) => [rule.rule_id, rule]));
  const unknown = [...requested].filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new RuleSelectionError(
      `Unknown rule id(s): ${unknown.join(", ")}`,
      "unknown_ids",
      unknown,
    );
  }

  const rules = include
    ? config.rules.filter((rule) => include.has(rule.rule_id))
    : config.rules.filter((rule) => !requested.has(rule.rule_id));

  if (rules.length === 0) {
    throw new RuleSelectionError("No rules left after filtering.", "empty");
  }

  return { ...config, rules };
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeIds(ids: readonly string[] | undefined): Set<string> | undefined {
  if (!ids) return undefined;
  const normalized = new Set(ids.map((id) => id.trim()).filter((id) => id.length > 0));
  return normalized.size > 0 ? normalized : undefined;
}
