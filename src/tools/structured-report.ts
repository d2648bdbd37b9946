import { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { ExternalToolError } from "../core/errors.js";
import { readJsonFile } from "../core/utils.js";

// Generator/lint report.json: issue list plus per-level counters. Only the counters are read here.

// =============================================================================
// SCHEMA
// =============================================================================

const CounterValueSchema = z.union([z.number(), z.string()]);

const LevelSchema = z
  .object({
    counters: z.record(CounterValueSchema).optional(),
  })
  .passthrough();

export const StructuredReportSchema = z
  .object({
    levelSummary: z.record(LevelSchema).optional(),
  })
  .passthrough();

export type StructuredReport = z.infer<typeof StructuredReportSchema>;

export type ReportLevel = "LEVEL_INFO" | "LEVEL_WARNING" | "LEVEL_ERROR";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function readStructuredReport(filePath: string): Promise<StructuredReport> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ExternalToolError(`Report at ${filePath} could not be read: ${detail}`, err);
  }

  const parsed = StructuredReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExternalToolError(`Report at ${filePath} is malformed:\n${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

/** Counters of one level; values that are not integers are dropped. */
export function levelCounters(report: StructuredReport, level: ReportLevel): Map<string, number> {
  const counters = report.levelSummary?.[level]?.counters ?? {};
  const result = new Map<string, number>();
  for (const [key, value] of Object.entries(counters)) {
    const count = toCount(value);
    if (count !== undefined) result.set(key, count);
  }
  return result;
}

export function hasCounter(report: StructuredReport, level: ReportLevel, name: string): boolean {
  const counters = report.levelSummary?.[level]?.counters;
  return counters !== undefined && name in counters;
}

// =============================================================================
// HELPERS
// =============================================================================

function toCount(value: number | string): number | undefined {
  const count = typeof value === "number" ? value : Number(value.trim());
  return Number.isInteger(count) ? count : undefined;
}
