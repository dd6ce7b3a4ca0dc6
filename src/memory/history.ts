/**
 * In-memory conversation history with a budget of remembered exchanges.
 * Eviction drops the oldest user/assistant turns as whole pairs; the system turn is never evicted.
 */

import type { IConversationHistory, Turn } from "./types";
import { logger } from "../logging";

export interface ConversationHistoryConfig {
  /** System prompt recorded once as turn 0. Omit for a history without a system turn. */
  systemPrompt?: string;
  /** Max remembered exchanges (N). User + assistant turns never exceed 2N. */
  maxExchanges: number;
  /** Clock override for tests. */
  now?: () => number;
}

export class ConversationHistory implements IConversationHistory {
  private system: Turn | undefined;
  private exchangeTurns: Turn[] = [];
  private readonly maxExchanges: number;
  private readonly now: () => number;

  constructor(config: ConversationHistoryConfig) {
    if (!Number.isInteger(config.maxExchanges) || config.maxExchanges < 0) {
      throw new RangeError(`maxExchanges must be a non-negative integer (got ${config.maxExchanges})`);
    }
    this.maxExchanges = config.maxExchanges;
    this.now = config.now ?? Date.now;
    const prompt = config.systemPrompt?.trim();
    if (prompt) {
      this.system = { role: "system", content: prompt, timestamp: this.now() };
    }
  }

  get length(): number {
    return this.exchangeTurns.length + (this.system ? 1 : 0);
  }

  get hasSystemTurn(): boolean {
    return this.system !== undefined;
  }

  turns(): Turn[] {
    const copy = this.exchangeTurns.map((t) => ({ ...t }));
    return this.system ? [{ ...this.system }, ...copy] : copy;
  }

  appendExchange(user: string, assistant: string): void {
    const timestamp = this.now();
    this.exchangeTurns.push(
      { role: "user", content: user.trim(), timestamp },
      { role: "assistant", content: assistant.trim(), timestamp: this.now() }
    );
    this.evict();
  }

  reset(): void {
    this.exchangeTurns = [];
  }

  private evict(): void {
    const limit = this.maxExchanges * 2;
    let dropped = 0;
    while (this.exchangeTurns.length > limit) {
      this.exchangeTurns.shift();
      dropped++;
      // Never leave an assistant turn whose user turn was evicted.
      while (this.exchangeTurns.length > 0 && this.exchangeTurns[0].role !== "user") {
        this.exchangeTurns.shift();
        dropped++;
      }
    }
    if (dropped > 0) {
      logger.debug({ event: "HISTORY_TRIMMED", dropped, length: this.length }, "Trimmed conversation history");
    }
  }
}
