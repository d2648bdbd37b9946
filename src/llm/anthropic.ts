import Anthropic, { APIError, AnthropicError } from "@anthropic-ai/sdk";
import type {
  ContentBlock,
  Message,
  MessageCreateParamsNonStreaming,
  Tool,
  ToolChoice,
  ToolUseBlock,
} from "@anthropic-ai/sdk/resources/messages/messages";

import {
  createMissingApiKeyError,
  describeApiErrorDetail,
  ensureJsonObject,
  isTimeoutLikeError,
  LlmError,
  RETRIABLE_STATUS_CODES,
  runWithRetries,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
} from "./client.js";

// =============================================================================
// TYPES
// =============================================================================

export type AnthropicResponse = Pick<Message, "content" | "stop_reason">;

export type AnthropicRequestOptions = {
  timeout?: number;
  signal?: AbortSignal;
};

export type AnthropicTransport = {
  create: (
    body: MessageCreateParamsNonStreaming,
    options?: AnthropicRequestOptions,
  ) => Promise<AnthropicResponse>;
};

export type AnthropicClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  maxRetries?: number;
  transport?: AnthropicTransport;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;
const STRUCTURED_TOOL_NAME = "structured_output";

// =============================================================================
// CLIENT
// =============================================================================

export class AnthropicClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly maxRetries: number;
  private readonly transport: AnthropicTransport;

  constructor(options: AnthropicClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);

    if (options.transport) {
      this.transport = options.transport;
      return;
    }

    const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw createMissingApiKeyError("anthropic");
    }
    this.transport = createTransport({ apiKey, baseURL: options.baseURL });
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    if (options.schema !== undefined) {
      ensureJsonObject(options.schema);
    }

    const body = this.buildRequestBody(prompt, options);
    const requestOptions: AnthropicRequestOptions = {
      timeout: options.timeoutMs ?? this.defaultTimeoutMs,
      signal: options.signal,
    };

    const response = await runWithRetries(() => this.transport.create(body, requestOptions), {
      maxRetries: this.maxRetries,
      isRetryable,
      wrapError,
      signal: options.signal,
    });
    const finishReason = response.stop_reason ?? null;

    if (options.schema) {
      const parsed = extractStructured(response.content);
      return { text: JSON.stringify(parsed), parsed, finishReason };
    }

    const text = extractText(response.content);
    if (!text) {
      throw new LlmError("Anthropic response did not include assistant content.");
    }

    return { text, finishReason };
  }

  private buildRequestBody(
    prompt: string,
    options: LlmCompletionOptions,
  ): MessageCreateParamsNonStreaming {
    const body: MessageCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: this.defaultMaxTokens,
      temperature: options.temperature ?? this.defaultTemperature ?? 0,
      stream: false,
    };

    if (options.schema) {
      body.tools = [buildStructuredOutputTool(options.schema)];
      body.tool_choice = { type: "tool", name: STRUCTURED_TOOL_NAME } satisfies ToolChoice;
    }

    return body;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function createTransport(args: { apiKey: string; baseURL?: string }): AnthropicTransport {
  const client = new Anthropic({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // Retries are handled by runWithRetries.
  });

  return {
    create: (body, options) => client.messages.create({ ...body, stream: false }, options),
  };
}

function buildStructuredOutputTool(schema: Record<string, unknown>): Tool {
  return {
    name: STRUCTURED_TOOL_NAME,
    description: "Return JSON that matches the provided schema.",
    input_schema: { ...schema, type: "object" },
  };
}

function extractStructured(content: ContentBlock[]): Record<string, unknown> {
  const block = content.find((part): part is ToolUseBlock => part.type === "tool_use");
  if (!block) {
    throw new LlmError("Anthropic response did not include a tool_use block for structured output.");
  }

  const input: unknown = block.input;
  ensureJsonObject(input);
  return input;
}

function extractText(content: ContentBlock[]): string {
  return content
    .map((block) => (block.type === "text" ? block.text : ""))
    .join("")
    .trim();
}

function isRetryable(error: unknown): boolean {
  if (error instanceof APIError) {
    return error.status !== undefined && RETRIABLE_STATUS_CODES.has(error.status);
  }
  if (error instanceof AnthropicError) {
    return false;
  }
  return isTimeoutLikeError(error);
}

function wrapError(error: unknown): LlmError {
  if (error instanceof APIError) {
    const status = error.status ?? "unknown";
    const hint =
      status === 401 || status === 403
        ? " Check ANTHROPIC_API_KEY and permissions."
        : status === 429
          ? " Rate limited by Anthropic."
          : "";
    return new LlmError(
      `Anthropic request failed (status ${status}): ${describeApiErrorDetail(error)}${hint}`,
      error,
    );
  }
  if (error instanceof AnthropicError) {
    return new LlmError(`Anthropic request failed: ${error.message}`, error);
  }
  if (error instanceof Error) {
    return new LlmError(error.message, error);
  }
  return new LlmError("Anthropic request failed due to an unknown error.", error);
}
