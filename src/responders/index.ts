import type { AppConfig } from "../config";
import { modelLabel } from "../config";
import type { ILLM } from "../adapters/llm";
import type { Responder } from "./types";
import { LocalResponder, localSystemPrompt } from "./local";
import { RemoteResponder } from "./remote";

export type { Responder, ResponderMode, ResponderRequest, IntentResult } from "./types";
export { LocalResponder, localSystemPrompt } from "./local";
export { RemoteResponder } from "./remote";

/**
 * Responder for the configured mode. Remote mode needs the completion adapter from createLLM;
 * with none the local knowledge base answers.
 */
export function createResponder(config: AppConfig, llm: ILLM | null): Responder {
  if (config.assistant.mode === "local" || llm === null) {
    return new LocalResponder({ aiName: config.assistant.name });
  }
  return new RemoteResponder(llm, {
    label: modelLabel(config),
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    timeoutMs: config.llm.timeoutMs,
  });
}

/** System turn for the session: the configured personality in remote mode, a fixed line locally. */
export function systemPromptFor(config: AppConfig, responder: Responder): string {
  return responder.mode === "remote" ? config.assistant.personality : localSystemPrompt(config.assistant.name);
}
