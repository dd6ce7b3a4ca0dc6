/**
 * Intent classification: a keyword heuristic for local mode, and validation of the JSON
 * the completion endpoint returns in remote mode.
 */

import type { IntentResult } from "./types";
import { matchesAny } from "./keywords";

export function unknownIntent(): IntentResult {
  return { intent: "unknown", confidence: 0, entities: [], requiresAction: false };
}

const ACTION_INTENTS = new Set(["calculation", "time_query", "date_query"]);

const HEURISTICS: ReadonlyArray<{ intent: string; confidence: number; keywords: readonly string[] }> = [
  { intent: "greeting", confidence: 0.9, keywords: ["hello", "hi", "hey"] },
  { intent: "goodbye", confidence: 0.9, keywords: ["goodbye", "bye"] },
  { intent: "time_query", confidence: 0.8, keywords: ["time", "clock"] },
  { intent: "date_query", confidence: 0.8, keywords: ["date", "today"] },
  { intent: "calculation", confidence: 0.7, keywords: ["calculate", "math", "+", "-", "*", "/"] },
  { intent: "weather_query", confidence: 0.8, keywords: ["weather"] },
];

/** Numbers mentioned in the utterance, in order. */
export function extractNumberEntities(utterance: string): string[] {
  return utterance.match(/\d+(?:\.\d+)?/g) ?? [];
}

export function classifyIntent(utterance: string): IntentResult {
  const text = utterance.toLowerCase();
  const rule = HEURISTICS.find((h) => matchesAny(text, h.keywords));
  let intent: string;
  let confidence: number;
  if (rule) {
    intent = rule.intent;
    confidence = rule.confidence;
  } else if (utterance.includes("?")) {
    intent = "question";
    confidence = 0.6;
  } else {
    intent = "casual_chat";
    confidence = 0.5;
  }
  return {
    intent,
    confidence,
    entities: extractNumberEntities(utterance),
    requiresAction: ACTION_INTENTS.has(intent),
  };
}

function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n));
}

/**
 * Validate a JSON intent payload ({"intent","confidence","entities","requires_action"}).
 * Throws on anything that is not an object with a non-empty string intent.
 */
export function parseIntentJson(text: string): IntentResult {
  const data: unknown = JSON.parse(text);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new SyntaxError("intent payload is not an object");
  }
  const intent = "intent" in data && typeof data.intent === "string" ? data.intent.trim() : "";
  if (!intent) throw new SyntaxError("intent payload has no intent");
  const confidence =
    "confidence" in data && typeof data.confidence === "number" && Number.isFinite(data.confidence)
      ? clamp01(data.confidence)
      : 0;
  const entities =
    "entities" in data && Array.isArray(data.entities)
      ? data.entities.filter((e): e is string => typeof e === "string")
      : [];
  const requiresAction =
    ("requires_action" in data && data.requires_action === true) ||
    ("requiresAction" in data && data.requiresAction === true);
  return { intent, confidence, entities, requiresAction };
}
