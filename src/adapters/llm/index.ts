/**
 * LLM adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import { ConfigError } from "../../errors";
import type { ILLM } from "./types";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, Message, ChatOptions, ChatResponse } from "./types";
export { StubLLM } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";

/**
 * Completion endpoint for remote mode. Returns null in local mode.
 * Throws ConfigError when the selected provider has no credential.
 */
export function createLLM(config: AppConfig): ILLM | null {
  const { openaiApiKey, openaiModel, anthropicApiKey, anthropicModel } = config.llm;
  switch (config.assistant.mode) {
    case "openai":
      if (!openaiApiKey) throw new ConfigError("OpenAI API key not found in environment variables");
      return new OpenAILLM({ apiKey: openaiApiKey, model: openaiModel });
    case "anthropic":
      if (!anthropicApiKey) throw new ConfigError("Anthropic API key not found in environment variables");
      return new AnthropicLLM({ apiKey: anthropicApiKey, model: anthropicModel });
    default:
      return null;
  }
}
