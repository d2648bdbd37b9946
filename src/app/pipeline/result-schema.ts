import { z } from "zod";

import { formatIssues } from "../../core/config-loader.js";
import { GateError } from "../../core/errors.js";
import { readJsonFile } from "../../core/utils.js";

import { STAGE_NAMES, type ResultDocument } from "./types.js";

// Reader for result.json files written by earlier runs.

const StageNameSchema = z.enum(STAGE_NAMES);
const SeveritySchema = z.enum(["BLOCKING", "ADVISORY"]);
const StageStatusSchema = z.enum(["PASSED", "FAILED", "SKIPPED"]);

const ResultRecordSchema = z.object({
  kind: z.enum(["finding", "outcome"]),
  stage: StageNameSchema,
  code: z.string(),
  status: z.enum(["PASSED", "FAILED", "SKIPPED", "WARNING"]),
  severity: SeveritySchema,
  message: z.string(),
  file: z.string().optional(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  limit: z.number().optional(),
  rule_id: z.string().optional(),
  reclassified_from: z.string().optional(),
});

export const ResultDocumentSchema = z.object({
  dataset: z.string(),
  run_id: z.string(),
  verdict: z.enum(["PASS", "FAIL"]),
  aborted_stage: StageNameSchema.nullable(),
  counts: z.object({
    blocking: z.number().int(),
    advisory: z.number().int(),
    passed: z.number().int(),
  }),
  stages: z.array(
    z.object({
      stage: StageNameSchema,
      status: StageStatusSchema,
      severity: SeveritySchema,
      note: z.string().optional(),
      error: z.string().optional(),
    }),
  ),
  records: z.array(ResultRecordSchema),
});

export async function readResultDocument(filePath: string): Promise<ResultDocument> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    throw new GateError(`Result document not readable at ${filePath}`, err);
  }

  const parsed = ResultDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GateError(`Result document at ${filePath} is malformed:\n${formatIssues(parsed.error.issues)}`);
  }
  const document: ResultDocument = parsed.data;
  return document;
}
