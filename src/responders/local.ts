/**
 * Local responder: offline, rule-based replies from the knowledge tables in knowledge.json.
 * Rules are tried in a fixed priority order and the first match wins.
 */

import knowledgeData from "./knowledge.json";
import type { IntentResult, Responder, ResponderRequest } from "./types";
import { classifyIntent } from "./intent";
import { containsKeyword, fillTemplate, matchesAny, pick } from "./keywords";
import { hasOperatorBetweenNumbers, solveSpokenMath } from "./math";
import { logger, logResponderCall } from "../logging";

export type KnowledgeBase = typeof knowledgeData;

export type LocalCategory =
  | "greeting"
  | "goodbye"
  | "thanks"
  | "time"
  | "date"
  | "weather"
  | "math"
  | "robot"
  | "capabilities"
  | "identity"
  | "unknown";

export function localSystemPrompt(aiName: string): string {
  return `You are ${aiName}, a helpful AI assistant running locally.`;
}

/** Priority order of the rule categories. */
export const CATEGORY_ORDER: readonly Exclude<LocalCategory, "unknown">[] = [
  "greeting",
  "goodbye",
  "thanks",
  "time",
  "date",
  "weather",
  "math",
  "robot",
  "capabilities",
  "identity",
];

export interface LocalResponderConfig {
  aiName: string;
  /** Defaults to Math.random. */
  random?: () => number;
  /** Defaults to the wall clock. */
  now?: () => Date;
  knowledge?: KnowledgeBase;
}

const DAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

const pad2 = (n: number): string => String(n).padStart(2, "0");

export function formatClockTime(d: Date): string {
  const h = d.getHours();
  const h12 = h % 12 === 0 ? 12 : h % 12;
  return `${h12}:${pad2(d.getMinutes())} ${h < 12 ? "AM" : "PM"}`;
}

export function formatLongDate(d: Date): string {
  return `${DAY_NAMES[d.getDay()]}, ${MONTH_NAMES[d.getMonth()]} ${pad2(d.getDate())}, ${d.getFullYear()}`;
}

export function formatShortDate(d: Date): string {
  return `${pad2(d.getMonth() + 1)}/${pad2(d.getDate())}/${d.getFullYear()}`;
}

export class LocalResponder implements Responder {
  readonly mode = "local" as const;
  readonly label = "Local Knowledge Base";
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly kb: KnowledgeBase;
  private readonly custom = new Map<string, string>();

  constructor(private readonly config: LocalResponderConfig) {
    this.random = config.random ?? Math.random;
    this.now = config.now ?? (() => new Date());
    this.kb = config.knowledge ?? knowledgeData;
  }

  async generate(request: ResponderRequest): Promise<string> {
    const started = Date.now();
    const reply = this.respond(request.utterance, request.context);
    logResponderCall(logger, "local", request.history.length, reply.length, Date.now() - started);
    return reply;
  }

  async analyzeIntent(utterance: string): Promise<IntentResult> {
    return classifyIntent(utterance);
  }

  /** First rule category the utterance falls into. */
  categorize(utterance: string): LocalCategory {
    const text = utterance.toLowerCase().trim();
    const keywords = this.kb.keywords;
    return (
      CATEGORY_ORDER.find(
        (category) =>
          matchesAny(text, keywords[category]) || (category === "math" && hasOperatorBetweenNumbers(text))
      ) ?? "unknown"
    );
  }

  respond(utterance: string, context: ReadonlyMap<string, string> = new Map()): string {
    const category = this.categorize(utterance);
    const pools = this.kb.pools;
    const name = context.get("name")?.trim();
    switch (category) {
      case "greeting":
        return name ? fillTemplate(pick(pools.greetingNamed, this.random), { name }) : pick(pools.greeting, this.random);
      case "goodbye":
        return name ? fillTemplate(pick(pools.goodbyeNamed, this.random), { name }) : pick(pools.goodbye, this.random);
      case "thanks":
        return pick(pools.thanks, this.random);
      case "time":
      case "date":
        return fillTemplate(pick(pools[category], this.random), this.clockValues());
      case "weather":
        return pick(pools.weather, this.random);
      case "math":
        return this.handleMath(utterance);
      case "robot":
        return pick(pools.robot, this.random);
      case "capabilities":
        return pick(pools.capabilities, this.random);
      case "identity":
        return fillTemplate(this.kb.identity, { name: this.config.aiName, purpose: this.kb.purpose });
      default:
        return this.findCustomKnowledge(utterance) ?? pick(pools.unknown, this.random);
    }
  }

  private clockValues(): Record<string, string> {
    const now = this.now();
    return { time: formatClockTime(now), longDate: formatLongDate(now), shortDate: formatShortDate(now) };
  }

  private handleMath(utterance: string): string {
    const result = solveSpokenMath(utterance);
    if (result === null) {
      logger.debug({ event: "MATH_UNSOLVED" }, "No evaluable expression; replying with help");
      return this.kb.math.help;
    }
    return fillTemplate(this.kb.math.answer, { result: String(result) });
  }

  private findCustomKnowledge(utterance: string): string | undefined {
    const text = utterance.toLowerCase();
    for (const [topic, information] of this.custom) {
      if (containsKeyword(text, topic)) return information;
    }
    return undefined;
  }

  /** Teach a topic; later utterances mentioning it get this answer instead of the unknown pool. */
  addKnowledge(topic: string, information: string): void {
    const key = topic.trim().toLowerCase();
    if (!key || !information.trim()) return;
    this.custom.set(key, information.trim());
    logger.info({ event: "KNOWLEDGE_ADDED", topic: key }, "Added knowledge for topic");
  }

  /** Custom knowledge first, then a topic pool, then built-in facts. */
  getKnowledge(topic: string): string | undefined {
    const key = topic.trim().toLowerCase();
    const custom = this.custom.get(key);
    if (custom !== undefined) return custom;
    const pools: Record<string, readonly string[]> = this.kb.pools;
    const pool = pools[key];
    if (pool && pool.length > 0) return fillTemplate(pick(pool, this.random), this.clockValues());
    const facts: Record<string, string> = this.kb.facts;
    return facts[key];
  }
}
