// Provider selection for the schema reviewer.

import type { ReviewerConfig } from "../../core/config.js";
import { AnthropicClient } from "../../llm/anthropic.js";
import { createMissingApiKeyError, type LlmClient } from "../../llm/client.js";
import { MockLlmClient, isMockLlmEnabled } from "../../llm/mock.js";
import { OpenAiClient } from "../../llm/openai.js";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Reads credentials and mock switches from `env` now and returns a factory
 * that builds the client on first use. A missing API key surfaces when the
 * factory runs, inside the schema_review stage.
 */
export function createReviewerClientFactory(cfg: ReviewerConfig, env: NodeJS.ProcessEnv): () => LlmClient {
  if (isMockLlmEnabled(env) || cfg.provider === "mock") {
    const mock = { outputPath: env.MOCK_LLM_OUTPUT_PATH, output: env.MOCK_LLM_OUTPUT };
    return () => new MockLlmClient(mock);
  }

  const options = {
    model: cfg.model,
    defaultTemperature: cfg.temperature,
    defaultTimeoutMs: secondsToMs(cfg.timeout_seconds),
  };

  switch (cfg.provider) {
    case "openai": {
      const apiKey = env.OPENAI_API_KEY;
      return () => {
        if (!apiKey) throw createMissingApiKeyError("openai");
        return new OpenAiClient({ ...options, apiKey });
      };
    }
    case "anthropic": {
      const apiKey = env.ANTHROPIC_API_KEY;
      return () => {
        if (!apiKey) throw createMissingApiKeyError("anthropic");
        return new AnthropicClient({ ...options, apiKey });
      };
    }
  }
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}
