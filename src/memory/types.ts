/**
 * Conversation history types.
 * The system turn (if any) sits at index 0; user/assistant turns follow in chronological order.
 */

export type Role = "system" | "user" | "assistant";

export interface Turn {
  role: Role;
  content: string;
  /** ms since epoch */
  timestamp: number;
}

export interface IConversationHistory {
  /** Ordered copy of all turns, system turn first. */
  turns(): Turn[];

  /** Record a completed exchange, then evict to budget. */
  appendExchange(user: string, assistant: string): void;

  /** Drop everything except the system turn. */
  reset(): void;

  /** Total number of turns, including the system turn. */
  readonly length: number;
}
