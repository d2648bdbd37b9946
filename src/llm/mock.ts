import fs from "node:fs/promises";
import path from "node:path";

import {
  LlmError,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
} from "./client.js";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

export function isMockLlmEnabled(env: NodeJS.ProcessEnv): boolean {
  const flag = env.MOCK_LLM;
  if (!flag) return false;

  return TRUE_VALUES.has(flag.trim().toLowerCase());
}

export type MockLlmOptions = {
  /** Canned reply; wins over the fixture sources below. */
  response?: unknown;
  /** JSON file holding the reply. */
  outputPath?: string;
  /** Inline JSON reply. */
  output?: string;
};

/**
 * Replays a canned reply: `response`, then the file at `outputPath`, then
 * `output`, then an empty findings list.
 */
export class MockLlmClient implements LlmClient {
  constructor(private readonly options: MockLlmOptions = {}) {}

  async complete(_prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    if (options.signal?.aborted) {
      throw new LlmError("Mock LLM request was aborted.");
    }

    const payload = await this.loadPayload();
    const text = typeof payload === "string" ? payload : JSON.stringify(payload);
    const parsed = options.schema ? parseStructured(payload) : undefined;

    return { text, parsed, finishReason: "mock" };
  }

  private async loadPayload(): Promise<unknown> {
    const { response, outputPath, output } = this.options;
    if (response !== undefined) {
      return response;
    }
    if (outputPath) {
      return parseInlineJson(await fs.readFile(path.resolve(outputPath), "utf8"));
    }
    if (output) {
      return parseInlineJson(output);
    }
    return { findings: [] };
  }
}

function parseStructured(payload: unknown): unknown {
  const value = typeof payload === "string" ? parseInlineJson(payload) : payload;
  if (value !== null && typeof value === "object") {
    return value;
  }

  throw new LlmError("Mock LLM requires an object payload when a schema is provided.");
}

function parseInlineJson(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return {};

  try {
    return JSON.parse(trimmed);
  } catch {
    return trimmed;
  }
}
