import { describe, expect, it, vi } from "vitest";

import { LlmError, type LlmClient, type LlmCompletionOptions, type LlmCompletionResult } from "../../llm/client.js";

import {
  classifySeverity,
  LlmSchemaReviewer,
  parseReviewerOutput,
  reviewCode,
  stripMarkdownFences,
  toGateFindings,
  type ReviewerFinding,
} from "./reviewer.js";

class FakeLlmClient implements LlmClient {
  prompts: string[] = [];
  lastOptions?: LlmCompletionOptions;

  constructor(private readonly result: LlmCompletionResult) {}

  async complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult> {
    this.prompts.push(prompt);
    this.lastOptions = options;
    return this.result;
  }
}

describe("parseReviewerOutput", () => {
  it("reads structured findings", () => {
    const findings = parseReviewerOutput({
      text: "",
      parsed: { findings: [{ line: 3, type: "typo", message: "Bad name", suggestion: "Fix", severity: "blocker" }] },
      finishReason: "stop",
    });

    expect(findings).toEqual([{ line: 3, type: "typo", message: "Bad name", suggestion: "Fix", severity: "blocker" }]);
  });

  it("accepts a bare array wrapped in a markdown fence", () => {
    const text = '```json\n[{"line": null, "type": "format", "message": "Odd date"}]\n```';

    const findings = parseReviewerOutput({ text, finishReason: "stop" });

    expect(findings).toEqual([{ line: null, type: "format", message: "Odd date" }]);
  });

  it("rejects output that does not match the schema", () => {
    expect(() => parseReviewerOutput({ text: "", parsed: { issues: [] }, finishReason: "stop" })).toThrow(
      /Schema reviewer output failed schema validation/,
    );
    expect(() => parseReviewerOutput({ text: "nope", finishReason: "stop" })).toThrow(
      "Schema reviewer returned invalid JSON.",
    );
  });
});

describe("stripMarkdownFences", () => {
  it("leaves unfenced text alone", () => {
    expect(stripMarkdownFences('  {"findings": []} ')).toBe('{"findings": []}');
  });
});

describe("classifySeverity", () => {
  it("keeps hard types blocking whatever the reviewer said", () => {
    expect(classifySeverity("namespace", "warning")).toBe("BLOCKING");
  });

  it("treats soft types as advisory unless the reviewer escalates", () => {
    expect(classifySeverity("naming", undefined)).toBe("ADVISORY");
    expect(classifySeverity("format", "blocker")).toBe("BLOCKING");
  });

  it("blocks unknown types unless marked as a warning", () => {
    expect(classifySeverity("suspicious_combination", null)).toBe("BLOCKING");
    expect(classifySeverity("suspicious_combination", "Warning")).toBe("ADVISORY");
  });
});

describe("toGateFindings", () => {
  const finding = (overrides: Partial<ReviewerFinding>): ReviewerFinding => ({
    line: null,
    type: "typo",
    message: "Misspelled property.",
    ...overrides,
  });

  it("maps codes, suggestions and line locators", () => {
    const result = toGateFindings(
      [finding({ line: 4, suggestion: "Use variableMeasured." }), finding({ type: "naming", message: "Odd key." })],
      { mappingPath: "prices.tmcf", advisory: false },
    );

    expect(result).toEqual([
      {
        code: "REVIEW_TYPO",
        message: "Misspelled property. Suggestion: Use variableMeasured.",
        locator: { file: "prices.tmcf", line: 4 },
        severity: "BLOCKING",
      },
      {
        code: "REVIEW_NAMING",
        message: "Odd key.",
        locator: { file: "prices.tmcf" },
        severity: "ADVISORY",
      },
    ]);
  });

  it("drops duplicates that differ only in whitespace", () => {
    const result = toGateFindings(
      [finding({ message: "Bad  key." }), finding({ message: " Bad key. " }), finding({ type: "schema", message: "Bad key." })],
      { mappingPath: "prices.tmcf", advisory: false },
    );

    expect(result.map((entry) => entry.code)).toEqual(["REVIEW_TYPO", "REVIEW_SCHEMA"]);
  });

  it("keeps at most 25 findings", () => {
    const many = Array.from({ length: 30 }, (_, index) => finding({ message: `Issue ${index}` }));

    expect(toGateFindings(many, { mappingPath: "m.tmcf", advisory: false })).toHaveLength(25);
  });

  it("downgrades everything in advisory mode", () => {
    const result = toGateFindings([finding({ type: "required" })], { mappingPath: "m.tmcf", advisory: true });

    expect(result[0].severity).toBe("ADVISORY");
  });

  it("builds codes from free-form types", () => {
    expect(reviewCode("unknown statvar")).toBe("REVIEW_UNKNOWN_STATVAR");
    expect(reviewCode("--")).toBe("REVIEW_ISSUE");
  });
});

describe("LlmSchemaReviewer", () => {
  it("renders the prompt with the header and asks for structured output", async () => {
    const client = new FakeLlmClient({ text: "", parsed: { findings: [] }, finishReason: "stop" });
    const reviewer = new LlmSchemaReviewer(client, { temperature: 0, timeoutMs: 5_000 });

    const findings = await reviewer.review({
      mappingPath: "/data/prices.tmcf",
      mappingText: "Node: E:prices->E0",
      header: ["geo", "value"],
      metadata: [],
    });

    expect(findings).toEqual([]);
    expect(client.prompts[0]).toContain("## Mapping file `prices.tmcf`");
    expect(client.prompts[0]).toContain("Node: E:prices->E0");
    expect(client.prompts[0]).toContain("- geo\n- value");
    expect(client.prompts[0]).not.toContain("## Metadata excerpt");
    expect(client.lastOptions?.schema).toMatchObject({ required: ["findings"] });
    expect(client.lastOptions?.timeoutMs).toBe(5_000);
  });

  it("builds the client from a factory once, on the first review", async () => {
    const client = new FakeLlmClient({ text: "", parsed: { findings: [] }, finishReason: "stop" });
    const factory = vi.fn(() => client);
    const reviewer = new LlmSchemaReviewer(factory);
    const input = { mappingPath: "/data/prices.tmcf", mappingText: "Node: E:prices->E0", metadata: [] };

    expect(factory).not.toHaveBeenCalled();
    await reviewer.review(input);
    await reviewer.review(input);

    expect(factory).toHaveBeenCalledTimes(1);
    expect(client.prompts).toHaveLength(2);
  });

  it("rejects the review when the client cannot be built", async () => {
    const reviewer = new LlmSchemaReviewer(() => {
      throw new LlmError("OpenAI API key is missing or invalid.");
    });

    await expect(
      reviewer.review({ mappingPath: "/data/prices.tmcf", mappingText: "Node: E:prices->E0", metadata: [] }),
    ).rejects.toThrow("OpenAI API key is missing or invalid.");
  });
});
