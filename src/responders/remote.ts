/**
 * Remote responder: generation and intent analysis through a chat-completion endpoint.
 * Every request is bounded by a timeout; failures reject and the session falls back.
 */

import type { ChatOptions, ChatResponse, ILLM, Message } from "../adapters/llm";
import type { IntentResult, Responder, ResponderRequest } from "./types";
import { PromptManager } from "../prompts/prompt-manager";
import { parseIntentJson, unknownIntent } from "./intent";
import { withTimeout } from "../pipeline/timeouts";
import { logger, logResponderCall } from "../logging";
import { toError } from "../errors";

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 150;
const DEFAULT_TIMEOUT_MS = 25_000;
const INTENT_MAX_TOKENS = 100;
const PROBE_MAX_TOKENS = 10;

export interface RemoteResponderConfig {
  /** Model name, shown in summaries. */
  label: string;
  temperature?: number;
  /** Replies are spoken, so keep this small. */
  maxTokens?: number;
  timeoutMs?: number;
  promptManager?: PromptManager;
}

export class RemoteResponder implements Responder {
  readonly mode = "remote" as const;
  readonly label: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly prompts: PromptManager;

  constructor(
    private readonly llm: ILLM,
    config: RemoteResponderConfig
  ) {
    this.label = config.label;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.prompts = config.promptManager ?? new PromptManager();
  }

  async generate(request: ResponderRequest): Promise<string> {
    const messages = this.prompts.buildReplyMessages(request.history, request.context);
    const started = Date.now();
    const response = await this.call(messages, { maxTokens: this.maxTokens, temperature: this.temperature }, "LLM");
    const text = response.text.trim();
    if (!text) throw new Error("Completion returned no text");
    logResponderCall(logger, "remote", messages.length, text.length, Date.now() - started);
    return text;
  }

  async analyzeIntent(utterance: string): Promise<IntentResult> {
    try {
      const response = await this.call(
        this.prompts.buildIntentMessages(utterance),
        { maxTokens: INTENT_MAX_TOKENS, responseFormat: "json" },
        "LLM(intent)"
      );
      const result = parseIntentJson(response.text);
      logger.debug({ event: "INTENT_ANALYZED", intent: result.intent, confidence: result.confidence }, "Intent analysis");
      return result;
    } catch (err) {
      logger.warn({ event: "INTENT_FAILED", err: toError(err).message }, "Error analyzing intent");
      return unknownIntent();
    }
  }

  /** Startup probe: one tiny request. Rejects when the endpoint is unreachable or refuses the key. */
  async verify(): Promise<void> {
    await this.call([{ role: "user", content: "Hello" }], { maxTokens: PROBE_MAX_TOKENS }, "LLM(probe)");
    logger.info({ event: "LLM_PROBE_OK", model: this.label }, "Completion endpoint connection test successful");
  }

  private async call(messages: Message[], options: ChatOptions, label: string): Promise<ChatResponse> {
    const controller = new AbortController();
    try {
      return await withTimeout(this.llm.chat(messages, { ...options, signal: controller.signal }), this.timeoutMs, label);
    } catch (err) {
      controller.abort();
      throw err;
    }
  }
}
