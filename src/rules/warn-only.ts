import { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { ConfigError } from "../core/errors.js";
import { pathExists, readTextFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export const WarnOnlyDocumentSchema = z.record(z.string().min(1), z.array(z.string()));

export type WarnOnlyDocument = z.infer<typeof WarnOnlyDocumentSchema>;

/** Dataset-scoped set of rule ids whose failures do not block. */
export interface WarnOnlyPolicy {
  warnOnlyIds(dataset: string): ReadonlySet<string>;
  isWarnOnly(dataset: string, ruleId: string): boolean;
}

export class WarnOnlyConfigError extends ConfigError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "WarnOnlyConfigError";
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function normalizeRuleId(id: string): string {
  return id.trim().toLowerCase();
}

export function createWarnOnlyPolicy(doc: WarnOnlyDocument = {}): WarnOnlyPolicy {
  const table = new Map<string, ReadonlySet<string>>();
  for (const [dataset, ids] of Object.entries(doc)) {
    const normalized = new Set(ids.map(normalizeRuleId).filter((id) => id.length > 0));
    table.set(dataset, normalized);
  }

  const empty: ReadonlySet<string> = new Set();
  return {
    warnOnlyIds: (dataset) => table.get(dataset) ?? empty,
    isWarnOnly: (dataset, ruleId) => (table.get(dataset) ?? empty).has(normalizeRuleId(ruleId)),
  };
}

export const EMPTY_WARN_ONLY_POLICY: WarnOnlyPolicy = createWarnOnlyPolicy();

/** A missing document means "no overrides"; a malformed one is an input error. */
export async function loadWarnOnlyPolicy(filePath: string): Promise<WarnOnlyPolicy> {
  if (!(await pathExists(filePath))) {
    return EMPTY_WARN_ONLY_POLICY;
  }

  let doc: unknown;
  try {
    doc = JSON.parse(await readTextFile(filePath));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new WarnOnlyConfigError(`Warn-only document at ${filePath} is not valid JSON: ${detail}`, err);
  }

  const parsed = WarnOnlyDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new WarnOnlyConfigError(
      `Warn-only document at ${filePath} is invalid:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  return createWarnOnlyPolicy(parsed.data);
}
