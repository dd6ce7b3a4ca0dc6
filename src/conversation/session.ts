/**
 * Conversation session: owns the bounded history and user context, and turns an utterance
 * into a reply through the configured responder. Never rejects from `process`.
 */

import type { Turn } from "../memory/types";
import { ConversationHistory } from "../memory/history";
import type { IntentResult, Responder, ResponderMode } from "../responders/types";
import { unknownIntent } from "../responders/intent";
import { pick } from "../responders/keywords";
import { Mutex } from "./mutex";
import { logger } from "../logging";
import { toError } from "../errors";

export const REPEAT_PROMPT = "I didn't catch that. Could you please repeat?";

export const FALLBACK_REPLIES: readonly string[] = [
  "I'm sorry, I'm having trouble understanding right now. Could you try again?",
  "I seem to be experiencing some technical difficulties. Please give me a moment.",
  "I'm not quite sure how to respond to that. Could you rephrase your question?",
];

export interface SessionSummary {
  totalExchanges: number;
  historyLength: number;
  aiName: string;
  modelLabel: string;
  mode: ResponderMode;
}

export interface ConversationSessionConfig {
  aiName: string;
  /** Recorded as the system turn; omit for a history without one. */
  systemPrompt?: string;
  maxExchanges: number;
  /** Picks the fallback apology. Defaults to Math.random. */
  random?: () => number;
  now?: () => number;
}

export class ConversationSession {
  private readonly history: ConversationHistory;
  private readonly context = new Map<string, string>();
  private readonly mutex = new Mutex();
  private readonly random: () => number;
  /** Bumped by reset(); an exchange started in an older epoch is not recorded. */
  private epoch = 0;

  constructor(
    private readonly responder: Responder,
    private readonly config: ConversationSessionConfig
  ) {
    this.history = new ConversationHistory({
      systemPrompt: config.systemPrompt,
      maxExchanges: config.maxExchanges,
      now: config.now,
    });
    this.random = config.random ?? Math.random;
  }

  get mode(): ResponderMode {
    return this.responder.mode;
  }

  /**
   * Reply to one utterance. Blank input gets the repeat prompt; a failed generation gets an
   * apology and leaves history as it was.
   */
  process(utterance: string): Promise<string> {
    return this.mutex.run(() => this.processLocked(utterance));
  }

  private async processLocked(utterance: string): Promise<string> {
    const text = utterance.trim();
    if (!text) return REPEAT_PROMPT;

    const epoch = this.epoch;
    const now = this.config.now ?? Date.now;
    const pending: Turn = { role: "user", content: text, timestamp: now() };
    let reply: string;
    try {
      reply = (
        await this.responder.generate({
          utterance: text,
          history: [...this.history.turns(), pending],
          context: new Map(this.context),
        })
      ).trim();
      if (!reply) throw new Error("Responder returned an empty reply");
    } catch (err) {
      logger.warn(
        { event: "RESPONDER_FAILED", mode: this.responder.mode, err: toError(err).message },
        "Error generating response; replying with fallback"
      );
      return pick(FALLBACK_REPLIES, this.random);
    }

    if (epoch === this.epoch) {
      this.history.appendExchange(text, reply);
    } else {
      logger.debug({ event: "EXCHANGE_DISCARDED" }, "Session was reset during generation; exchange not recorded");
    }
    logger.debug({ event: "SESSION_REPLY", historyLength: this.history.length }, "Session reply ready");
    return reply;
  }

  /** Back to just the system turn. User context is kept. */
  reset(): void {
    this.epoch++;
    this.history.reset();
    logger.info({ event: "SESSION_RESET" }, "Resetting conversation history");
  }

  setContext(key: string, value: string): void {
    this.context.set(key, value);
    logger.debug({ event: "CONTEXT_SET", key }, "Set user context");
  }

  getContext(key: string): string | undefined {
    return this.context.get(key);
  }

  /** Does not touch history. Resolves to the unknown intent on failure. */
  analyzeIntent(utterance: string): Promise<IntentResult> {
    return this.mutex.run(async () => {
      try {
        return await this.responder.analyzeIntent(utterance);
      } catch (err) {
        logger.warn({ event: "INTENT_FAILED", err: toError(err).message }, "Error analyzing intent");
        return unknownIntent();
      }
    });
  }

  summary(): SessionSummary {
    const historyLength = this.history.length;
    const exchangeTurns = this.history.hasSystemTurn ? historyLength - 1 : historyLength;
    return {
      totalExchanges: Math.floor(exchangeTurns / 2),
      historyLength,
      aiName: this.config.aiName,
      modelLabel: this.responder.label,
      mode: this.responder.mode,
    };
  }

  getHistory(): readonly Turn[] {
    return this.history.turns();
  }
}
