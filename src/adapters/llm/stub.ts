/**
 * Stub LLM adapter for tests and dry runs.
 * Returns a fixed reply (empty by default).
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  constructor(private readonly reply: string = "") {}

  async chat(_messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    return { text: this.reply };
  }
}
