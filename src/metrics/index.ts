/**
 * Per-turn latencies and outcome counters. Logged, and kept in memory for the summary at shutdown.
 */

import { logger } from "../logging";

/** Last turn timing (ms). */
export interface TurnMetrics {
  asrLatencyMs?: number;
  intentLatencyMs?: number;
  responseLatencyMs?: number;
  /** End of user speech (or transcript arrival in text mode) to reply queued. */
  endOfUserSpeechToReplyQueuedMs?: number;
  replyLength?: number;
}

export type TurnOutcomeKind = "ignored" | "activation" | "reply" | "no-speech" | "asr-failed";

export type TurnCounters = Record<TurnOutcomeKind, number>;

function emptyCounters(): TurnCounters {
  return { ignored: 0, activation: 0, reply: 0, "no-speech": 0, "asr-failed": 0 };
}

let lastTurnMetrics: TurnMetrics = {};
let counters: TurnCounters = emptyCounters();

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      asr_latency_ms: metrics.asrLatencyMs,
      intent_latency_ms: metrics.intentLatencyMs,
      response_latency_ms: metrics.responseLatencyMs,
      end_of_user_speech_to_reply_queued_ms: metrics.endOfUserSpeechToReplyQueuedMs,
      reply_length: metrics.replyLength,
    },
    "Turn latency"
  );
}

export function countTurnOutcome(kind: TurnOutcomeKind): void {
  counters[kind]++;
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}

export function getTurnCounters(): TurnCounters {
  return { ...counters };
}

export function resetMetrics(): void {
  lastTurnMetrics = {};
  counters = emptyCounters();
}
