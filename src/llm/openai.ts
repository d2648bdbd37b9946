import OpenAI from "openai";
import { APIError, OpenAIError } from "openai/error";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
} from "openai/resources/chat/completions";

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

export type OpenAiResponse = Pick<ChatCompletion, "choices">;

export type OpenAiTransport = {
  create: (
    body: ChatCompletionCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ) => Promise<OpenAiResponse>;
};

export type OpenAiClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  maxRetries?: number;
  transport?: OpenAiTransport;
};

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;

// =============================================================================
// CLIENT
// =============================================================================

export class OpenAiClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly transport: OpenAiTransport;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);

    if (options.transport) {
      this.transport = options.transport;
      return;
    }

    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw createMissingApiKeyError("openai");
    }
    this.transport = createTransport({ apiKey, baseURL: options.baseURL });
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    if (options.schema !== undefined) {
      ensureJsonObject(options.schema);
    }

    const body = this.buildRequestBody(prompt, options);
    const requestOptions: OpenAI.RequestOptions = {
      timeout: options.timeoutMs ?? this.defaultTimeoutMs,
      signal: options.signal,
    };

    const response = await runWithRetries(() => this.transport.create(body, requestOptions), {
      maxRetries: this.maxRetries,
      isRetryable,
      wrapError,
      signal: options.signal,
    });

    const choice = response.choices[0];
    const text = extractText(choice?.message);
    if (!text) {
      throw new LlmError("OpenAI response did not include assistant content.");
    }

    return {
      text,
      parsed: options.schema ? parseJson(text) : undefined,
      finishReason: choice?.finish_reason ?? null,
    };
  }

  private buildRequestBody(
    prompt: string,
    options: LlmCompletionOptions,
  ): ChatCompletionCreateParamsNonStreaming {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: options.temperature ?? this.defaultTemperature ?? 0,
    };

    if (options.schema !== undefined) {
      body.response_format = {
        type: "json_schema",
        json_schema: { name: "structured_output", schema: options.schema, strict: true },
      };
    }

    return body;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function createTransport(args: { apiKey: string; baseURL?: string }): OpenAiTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // Retries are handled by runWithRetries.
  });

  return {
    create: (body, options) => client.chat.completions.create(body, options),
  };
}

function isRetryable(error: unknown): boolean {
  if (error instanceof APIError) {
    return error.status !== undefined && RETRIABLE_STATUS_CODES.has(error.status);
  }
  if (error instanceof OpenAIError) {
    return false;
  }
  return isTimeoutLikeError(error);
}

function wrapError(error: unknown): LlmError {
  if (error instanceof APIError) {
    const status = error.status ?? "unknown";
    const hint =
      status === 401 || status === 403
        ? " Check OPENAI_API_KEY and permissions."
        : status === 429
          ? " Rate limited by OpenAI."
          : "";
    return new LlmError(
      `OpenAI request failed (status ${status}): ${describeApiErrorDetail(error)}${hint}`,
      error,
    );
  }
  if (error instanceof OpenAIError) {
    return new LlmError(`OpenAI request failed: ${error.message}`, error);
  }
  if (error instanceof Error) {
    return new LlmError(error.message, error);
  }
  return new LlmError("OpenAI request failed due to an unknown error.", error);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text.trim());
  } catch (err) {
    throw new LlmError("OpenAI returned invalid JSON for structured output.", err);
  }
}

function extractText(message: ChatCompletionMessage | undefined): string {
  return message?.content ?? "";
}
