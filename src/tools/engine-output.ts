import { z } from "zod";

import type { OutcomeStatus, RuleOutcome } from "../app/pipeline/types.js";
import { formatIssues } from "../core/config-loader.js";
import { ExternalToolError } from "../core/errors.js";
import type { Rule } from "../rules/rule-config.js";

// =============================================================================
// SCHEMA
// =============================================================================

const EngineEntrySchema = z
  .object({
    validation_name: z.string().min(1),
    status: z.string().min(1),
    message: z.string().nullable().optional(),
    details: z.unknown().optional(),
  })
  .passthrough();

export const EngineOutputSchema = z.array(EngineEntrySchema);

export type EngineEntry = z.infer<typeof EngineEntrySchema>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseEngineOutput(raw: string, label: string): EngineEntry[] {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ExternalToolError(`Engine output at ${label} is not valid JSON: ${detail}`, err);
  }

  const parsed = EngineOutputSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ExternalToolError(`Engine output at ${label} is malformed:\n${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

/**
 * One outcome per reported entry, in engine order, followed by a FAILED
 * outcome for every submitted rule the engine left out.
 */
export function toRuleOutcomes(entries: EngineEntry[], submitted: readonly Rule[]): RuleOutcome[] {
  const outcomes: RuleOutcome[] = entries.map((entry) => {
    const { status, detail } = mapEngineStatus(entry.status.trim().toUpperCase(), entry.message?.trim() ?? "");
    return { ruleId: entry.validation_name, status, detail };
  });

  const reported = new Set(outcomes.map((outcome) => outcome.ruleId));
  for (const rule of submitted) {
    if (!reported.has(rule.rule_id)) {
      outcomes.push({ ruleId: rule.rule_id, status: "FAILED", detail: "no result reported" });
    }
  }

  return outcomes;
}

// =============================================================================
// HELPERS
// =============================================================================

function mapEngineStatus(raw: string, message: string): { status: OutcomeStatus; detail: string } {
  switch (raw) {
    case "PASSED":
    case "FAILED":
    case "WARNING":
      return { status: raw, detail: message };
    case "CONFIG_ERROR":
    case "DATA_ERROR":
      return { status: "FAILED", detail: message ? `${raw}: ${message}` : raw };
    default:
      return { status: "FAILED", detail: `Unrecognized status ${raw}${message ? `: ${message}` : ""}` };
  }
}
