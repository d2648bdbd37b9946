import { GateError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type LlmProvider = "openai" | "anthropic" | "mock";

export type LlmCompletionOptions = {
  schema?: Record<string, unknown>;
  temperature?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type LlmCompletionResult<TParsed = unknown> = {
  text: string;
  parsed?: TParsed;
  finishReason: string | null;
};

export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

// =============================================================================
// ERRORS
// =============================================================================

export class LlmError extends GateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LlmError";
  }
}

type ProviderApiKeyInfo = {
  label: string;
  envVar: string;
  clientName: string;
};

const PROVIDER_API_KEYS: Record<Exclude<LlmProvider, "mock">, ProviderApiKeyInfo> = {
  openai: { label: "OpenAI", envVar: "OPENAI_API_KEY", clientName: "OpenAiClient" },
  anthropic: { label: "Anthropic", envVar: "ANTHROPIC_API_KEY", clientName: "AnthropicClient" },
};

export function createMissingApiKeyError(
  provider: Exclude<LlmProvider, "mock">,
  cause?: unknown,
): UserFacingError {
  const info = PROVIDER_API_KEYS[provider];
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `${info.label} API key missing.`,
    message: `${info.label} API key is missing or invalid.`,
    hint: `Set ${info.envVar} or pass apiKey to ${info.clientName}.`,
    next: "Or disable the reviewer with --no-reviewer.",
    cause,
  });
}

// =============================================================================
// RETRIES
// =============================================================================

export const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export type RetryPolicy = {
  maxRetries: number;
  isRetryable: (error: unknown) => boolean;
  wrapError: (error: unknown) => Error;
  signal?: AbortSignal;
};

export async function runWithRetries<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxRetries);
  let lastError: unknown = new Error("LLM request was not attempted");

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (policy.signal?.aborted || !policy.isRetryable(err) || attempt === maxAttempts) {
        break;
      }
      await delay(retryDelayMs(attempt));
    }
  }

  throw policy.wrapError(lastError);
}

export function retryDelayMs(attempt: number): number {
  const capped = Math.min(attempt, 5);
  return 250 * 2 ** (capped - 1);
}

export function isTimeoutLikeError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.message.toLowerCase().includes("timeout") || error.message.includes("ETIMEDOUT");
}

// =============================================================================
// HELPERS
// =============================================================================

export function ensureJsonObject(
  value: unknown,
  errorFactory: () => Error = () =>
    new LlmError("Structured output schema must be a plain JSON object."),
): asserts value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw errorFactory();
  }
}

export function describeApiErrorDetail(error: { error?: unknown; message: string }): string {
  const body = error.error;
  if (body !== null && typeof body === "object" && "message" in body) {
    return String(body.message);
  }
  return error.message;
}

function delay(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}
