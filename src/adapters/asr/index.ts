/**
 * ASR adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import { ConfigError } from "../../errors";
import type { IASR } from "./types";
import { StubASR } from "./stub";
import { OpenAIWhisperASR } from "./openai-whisper";

export type { IASR, TranscriptResult } from "./types";
export { StubASR } from "./stub";
export { OpenAIWhisperASR } from "./openai-whisper";

/** Throws ConfigError when the OpenAI provider is selected without a key. */
export function createASR(config: AppConfig): IASR {
  const { provider, openaiApiKey } = config.asr;
  if (provider === "openai") {
    if (!openaiApiKey) throw new ConfigError("Missing required env: OPENAI_API_KEY (ASR_PROVIDER=openai)");
    return new OpenAIWhisperASR({ apiKey: openaiApiKey });
  }
  return new StubASR();
}
