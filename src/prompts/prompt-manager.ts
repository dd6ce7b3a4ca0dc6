import type { Message } from "../adapters/llm";
import type { Turn } from "../memory/types";

export const INTENT_CATEGORIES = ["greeting", "question", "request", "goodbye", "casual_chat", "command"] as const;

export interface PromptManagerConfig {
  /** System prompt used when the history carries none. */
  systemPrompt?: string;
}

/**
 * PromptManager
 *
 * Centralizes how we build messages for the completion endpoint so the responder
 * stays free of prompt wording.
 */
export class PromptManager {
  private readonly systemPrompt: string | undefined;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt?.trim() || undefined;
  }

  /**
   * Reply prompt: the ordered history (system turn first), with known user context
   * added as a second system message. The context note is never stored in history.
   */
  buildReplyMessages(history: readonly Turn[], context: ReadonlyMap<string, string>): Message[] {
    const leadingSystem = history.length > 0 && history[0].role === "system";
    const system = leadingSystem ? history[0].content : this.systemPrompt;
    const turns = leadingSystem ? history.slice(1) : history;
    const messages: Message[] = [];
    if (system) messages.push({ role: "system", content: system });
    const note = contextNote(context);
    if (note) messages.push({ role: "system", content: note });
    for (const turn of turns) messages.push({ role: turn.role, content: turn.content });
    return messages;
  }

  buildIntentMessages(utterance: string): Message[] {
    const prompt = [
      "Analyze the following user input and determine the intent.",
      "Respond with JSON in this format:",
      '{"intent": "category", "confidence": 0.8, "entities": ["entity1", "entity2"], "requires_action": false}',
      "",
      `Intent categories: ${INTENT_CATEGORIES.join(", ")}`,
      "",
      `User input: ${JSON.stringify(utterance)}`,
    ].join("\n");
    return [{ role: "user", content: prompt }];
  }
}

function contextNote(context: ReadonlyMap<string, string>): string | undefined {
  if (context.size === 0) return undefined;
  const lines = [...context].map(([key, value]) => `- ${key}: ${value}`);
  return ["What you know about the user:", ...lines].join("\n");
}
