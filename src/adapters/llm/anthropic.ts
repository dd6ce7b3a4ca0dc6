/**
 * Anthropic Claude LLM adapter.
 * Has no JSON response mode; callers asking for JSON get a system-prompt instruction instead.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

const JSON_INSTRUCTION = "Respond with a single JSON object and nothing else.";

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const maxTokens = options?.maxTokens ?? 256;
    const systemParts = messages.filter((m) => m.role === "system").map((m) => m.content);
    if (options?.responseFormat === "json") systemParts.push(JSON_INSTRUCTION);
    const msgs = messages.flatMap((m) =>
      m.role === "system" ? [] : [{ role: m.role, content: m.content }]
    );
    const response = await this.client.messages.create(
      {
        model: this.cfg.model,
        max_tokens: maxTokens,
        temperature: options?.temperature,
        system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined,
        messages: msgs,
      },
      { signal: options?.signal }
    );
    const textBlock = response.content.find((b) => b.type === "text");
    const text = textBlock && textBlock.type === "text" ? textBlock.text : "";
    return { text };
  }
}
