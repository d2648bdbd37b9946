import path from "node:path";

import { z } from "zod";

import type { Finding, Severity } from "../../app/pipeline/types.js";
import { renderPromptTemplate } from "../../core/templates.js";
import { LlmError, type LlmClient, type LlmCompletionResult } from "../../llm/client.js";
import { createFinding } from "../lib/stage-result.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReviewerInput = {
  mappingPath: string;
  mappingText: string;
  header?: string[];
  metadata: Array<{ path: string; text: string }>;
};

export type ReviewerCallOptions = {
  signal?: AbortSignal;
};

/** Port for the external reviewer; a thrown error means the reviewer failed. */
export interface SchemaReviewer {
  review(input: ReviewerInput, options?: ReviewerCallOptions): Promise<ReviewerFinding[]>;
}

export type ReviewerFinding = z.infer<typeof ReviewerFindingSchema>;

/** A ready client, or a factory run on the first review. */
export type LlmClientSource = LlmClient | (() => LlmClient);

export type LlmSchemaReviewerOptions = {
  temperature?: number;
  timeoutMs?: number;
};

// =============================================================================
// SCHEMAS
// =============================================================================

const ReviewerFindingSchema = z.object({
  line: z.number().int().nullable().optional(),
  type: z.string().min(1),
  message: z.string().min(1),
  suggestion: z.string().nullable().optional(),
  severity: z.string().nullable().optional(),
  file: z.string().nullable().optional(),
});

const ReviewerOutputSchema = z.union([
  z.object({ findings: z.array(ReviewerFindingSchema) }),
  z.array(ReviewerFindingSchema),
]);

export const REVIEWER_JSON_SCHEMA = {
  type: "object",
  properties: {
    findings: {
      type: "array",
      items: {
        type: "object",
        properties: {
          line: { type: ["integer", "null"] },
          type: { type: "string" },
          message: { type: "string" },
          suggestion: { type: "string" },
          severity: { type: "string", enum: ["blocker", "warning"] },
        },
        required: ["line", "type", "message", "suggestion", "severity"],
        additionalProperties: false,
      },
    },
  },
  required: ["findings"],
  additionalProperties: false,
};

// =============================================================================
// CONSTANTS
// =============================================================================

const ALWAYS_BLOCKING_TYPES = new Set(["typo", "schema", "unknown_statvar", "duplicate", "required", "namespace"]);
const SOFT_TYPES = new Set(["naming", "unused_column", "format"]);

export const MAX_REVIEWER_FINDINGS = 25;

const METADATA_EXCERPT_LIMIT = 12_000;

// =============================================================================
// LLM REVIEWER
// =============================================================================

export class LlmSchemaReviewer implements SchemaReviewer {
  private client?: LlmClient;

  constructor(
    private readonly source: LlmClientSource,
    private readonly options: LlmSchemaReviewerOptions = {},
  ) {}

  async review(input: ReviewerInput, options: ReviewerCallOptions = {}): Promise<ReviewerFinding[]> {
    // Construction errors (a missing API key) reject here and fail the stage.
    const client = this.resolveClient();
    const prompt = await renderPromptTemplate("schema-reviewer", {
      mapping_name: path.basename(input.mappingPath),
      mapping_content: input.mappingText,
      header_section: formatHeaderSection(input.header),
      metadata_section: formatMetadataSection(input.metadata),
    });

    const completion = await client.complete(prompt, {
      schema: REVIEWER_JSON_SCHEMA,
      temperature: this.options.temperature,
      timeoutMs: this.options.timeoutMs,
      signal: options.signal,
    });

    return parseReviewerOutput(completion);
  }

  private resolveClient(): LlmClient {
    if (!this.client) {
      this.client = typeof this.source === "function" ? this.source() : this.source;
    }
    return this.client;
  }
}

// =============================================================================
// OUTPUT NORMALIZATION
// =============================================================================

export function parseReviewerOutput(completion: LlmCompletionResult): ReviewerFinding[] {
  const raw = completion.parsed ?? parseJson(stripMarkdownFences(completion.text));
  const parsed = ReviewerOutputSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.errors
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new LlmError(`Schema reviewer output failed schema validation: ${detail}`);
  }

  return Array.isArray(parsed.data) ? parsed.data : parsed.data.findings;
}

export function stripMarkdownFences(text: string): string {
  const lines = text.trim().split("\n");
  if (lines.length > 0 && lines[0].startsWith("```")) {
    lines.shift();
    if (lines.length > 0 && lines[lines.length - 1].trim() === "```") {
      lines.pop();
    }
  }
  return lines.join("\n").trim();
}

/**
 * Maps reviewer findings to gate findings: severity by type, at most
 * {@link MAX_REVIEWER_FINDINGS}, de-duplicated by type, message and file.
 * Advisory mode downgrades every finding.
 */
export function toGateFindings(
  findings: ReviewerFinding[],
  options: { mappingPath: string; advisory: boolean },
): Finding[] {
  const seen = new Set<string>();
  const result: Finding[] = [];

  for (const finding of findings) {
    if (result.length >= MAX_REVIEWER_FINDINGS) break;

    const type = finding.type.trim().toLowerCase();
    const file = finding.file?.trim() || options.mappingPath;
    const key = [type, normalizeMessage(finding.message), file].join("\u0000");
    if (seen.has(key)) continue;
    seen.add(key);

    const severity: Severity = options.advisory ? "ADVISORY" : classifySeverity(type, finding.severity);
    const suggestion = finding.suggestion?.trim();
    const message = suggestion ? `${finding.message.trim()} Suggestion: ${suggestion}` : finding.message.trim();
    const locator = typeof finding.line === "number" && finding.line > 0 ? { file, line: finding.line } : { file };

    result.push(createFinding(reviewCode(type), message, locator, { severity }));
  }

  return result;
}

export function classifySeverity(type: string, reported: string | null | undefined): Severity {
  if (ALWAYS_BLOCKING_TYPES.has(type)) return "BLOCKING";
  const said = reported?.trim().toLowerCase();
  if (SOFT_TYPES.has(type)) return said === "blocker" ? "BLOCKING" : "ADVISORY";
  return said === "warning" ? "ADVISORY" : "BLOCKING";
}

export function reviewCode(type: string): string {
  const slug = type.toUpperCase().replace(/[^A-Z0-9]+/g, "_").replace(/^_+|_+$/g, "");
  return `REVIEW_${slug || "ISSUE"}`;
}

// =============================================================================
// HELPERS
// =============================================================================

function normalizeMessage(message: string): string {
  return message.split(/\s+/).filter(Boolean).join(" ");
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new LlmError("Schema reviewer returned invalid JSON.", err);
  }
}

function formatHeaderSection(header: string[] | undefined): string {
  if (!header || header.length === 0) return "";
  const columns = header.map((column) => `- ${column}`).join("\n");
  return [
    "",
    "## Data table header",
    "",
    "Column references and unused columns are checked separately against this list. Do not report them.",
    "",
    columns,
    "",
  ].join("\n");
}

function formatMetadataSection(metadata: ReviewerInput["metadata"]): string {
  if (metadata.length === 0) return "";
  const excerpts = metadata.map((file) => {
    const text = file.text.length > METADATA_EXCERPT_LIMIT ? file.text.slice(0, METADATA_EXCERPT_LIMIT) : file.text;
    return `### ${path.basename(file.path)}\n\n\`\`\`\n${text}\n\`\`\``;
  });
  return ["", "## Metadata excerpt", "", ...excerpts, ""].join("\n");
}
