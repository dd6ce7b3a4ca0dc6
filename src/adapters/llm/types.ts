/**
 * LLM adapter types.
 * Implementations can be swapped via config (OpenAI, Anthropic, stub).
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  /** Max tokens to generate. */
  maxTokens?: number;
  /** Sampling temperature. Provider default when omitted. */
  temperature?: number;
  /** Ask for a JSON object where the provider supports it. */
  responseFormat?: "text" | "json";
  /** Abort the request (e.g. on timeout). */
  signal?: AbortSignal;
}

export interface ChatResponse {
  /** Full text of the assistant reply. */
  text: string;
}

/**
 * LLM adapter interface: messages in, assistant reply out.
 */
export interface ILLM {
  /**
   * Get assistant reply for the given messages.
   * @param messages - Conversation history (system + user + assistant turns).
   */
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
