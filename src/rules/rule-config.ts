import { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { RuleConfigError } from "../core/errors.js";
import { readTextFile } from "../core/utils.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const DATA_SOURCES = ["stats", "lint", "differ"] as const;

const RULE_ID_PATTERN = /^[a-z][a-z0-9_]*$/;

export const RuleIdSchema = z
  .string()
  .regex(RULE_ID_PATTERN, "rule_id must be snake_case (lowercase letters, digits, underscores)")
  .brand<"RuleId">();

export type RuleId = z.infer<typeof RuleIdSchema>;

export const RuleSchema = z
  .object({
    rule_id: RuleIdSchema,
    description: z.string().trim().min(1),
    validator: z.string().trim().min(1),
    scope: z.object({ data_source: z.enum(DATA_SOURCES) }).strict(),
    params: z.record(z.unknown()),
    enabled: z.boolean().optional(),
  })
  .strict();

export const RuleConfigSchema = z
  .object({
    schema_version: z.string().min(1).optional(),
    rules: z.array(RuleSchema),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.rules.forEach((rule, index) => {
      if (seen.has(rule.rule_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rules", index, "rule_id"],
          message: `Duplicate rule_id "${rule.rule_id}"`,
        });
      }
      seen.add(rule.rule_id);
    });
  });

export type Rule = z.infer<typeof RuleSchema>;
export type RuleConfig = z.infer<typeof RuleConfigSchema>;

export type RuleConfigValidation =
  | { ok: true; config: RuleConfig }
  | { ok: false; issues: string[] };

// =============================================================================
// PUBLIC API
// =============================================================================

export function validateRuleConfig(doc: unknown): RuleConfigValidation {
  const parsed = RuleConfigSchema.safeParse(doc);
  if (parsed.success) {
    return { ok: true, config: parsed.data };
  }
  return { ok: false, issues: formatIssues(parsed.error.issues).split("\n") };
}

export function parseRuleConfig(raw: string, label: string): RuleConfig {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new RuleConfigError(`Rule config at ${label} is not valid JSON: ${detail}`, [detail], err);
  }

  const validation = validateRuleConfig(doc);
  if (!validation.ok) {
    throw new RuleConfigError(
      `Rule config at ${label} is invalid:\n${validation.issues.join("\n")}`,
      validation.issues,
    );
  }
  return validation.config;
}

export async function loadRuleConfig(filePath: string): Promise<RuleConfig> {
  let raw: string;
  try {
    raw = await readTextFile(filePath);
  } catch (err) {
    throw new RuleConfigError(`Rule config not readable at ${filePath}`, [], err);
  }
  return parseRuleConfig(raw, filePath);
}

export function isRuleEnabled(rule: Rule): boolean {
  return rule.enabled !== false;
}
