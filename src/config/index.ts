/**
 * Env-based configuration for the voice companion.
 * Load from .env.local (or process.env). Do not commit secrets.
 * Read once at startup; components receive their slice and never mutate it.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { ConfigError } from "../errors";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type AssistantMode = "local" | "openai" | "anthropic";
export type AsrProvider = "openai" | "stub";
export type TtsProvider = "google" | "azure" | "stub";
export type AudioOutput = "aplay" | "none";
export type VadDetector = "auto" | "energy";

export const DEFAULT_PERSONALITY = [
  "You are {name}, a helpful and friendly AI assistant. You are:",
  "- Conversational and engaging",
  "- Supportive and encouraging",
  "- Curious about the user's day and interests",
  "- Able to help with various tasks and questions",
  "- Designed to be a loyal companion",
  "Keep responses concise but warm, as they will be spoken aloud.",
].join("\n");

export interface AppConfig {
  /** Identity and responder selection. */
  assistant: {
    name: string;
    /** local = offline rule-based responder; openai/anthropic = remote completion endpoint. */
    mode: AssistantMode;
    /** System prompt; `{name}` is replaced with the assistant name. */
    personality: string;
  };

  /** Completion endpoint (remote mode only). */
  llm: {
    openaiApiKey?: string;
    openaiModel: string;
    anthropicApiKey?: string;
    anthropicModel: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };

  conversation: {
    /** Max remembered exchanges (user + assistant pairs). */
    maxExchanges: number;
    wakeWords: string[];
    /** Run intent analysis before each reply (one extra round trip in remote mode). */
    intentAnalysis: boolean;
  };

  /** Speech-to-text. */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
    timeoutMs: number;
  };

  /** Text-to-speech and playback. */
  tts: {
    provider: TtsProvider;
    googleApiKey?: string;
    azureKey?: string;
    azureRegion?: string;
    /** Selectable voice names; voiceIndex picks one, provider default when out of range. */
    voices: string[];
    voiceIndex: number;
    /** Words per minute. */
    rate: number;
    /** 0.0 to 1.0 */
    volume: number;
    output: AudioOutput;
    /** Deadline for one synthesis request. */
    timeoutMs: number;
  };

  /** Microphone capture and phrase segmentation. */
  capture: {
    /** ALSA device for arecord (e.g. plughw:1,0); default device when unset. */
    microphoneDevice?: string;
    vadSilenceMs: number;
    vadEnergyThreshold: number;
    /** webrtcvad aggressiveness 0-3. */
    vadAggressiveness: number;
    /** "energy" skips webrtcvad even when it is installed. */
    vadDetector: VadDetector;
    /** Hard limit on a single phrase. */
    phraseLimitMs: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getInt(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function getFloat(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) ? defaultValue : n;
}

function getList(key: string, defaultValue: string[]): string[] {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function getFlag(key: string): boolean {
  const v = getEnv(key);
  return v === "true" || v === "1";
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const v = value?.toLowerCase();
  return allowed.find((a) => a === v) ?? fallback;
}

/**
 * Build config from environment variables.
 * ASSISTANT_MODE, ASR_PROVIDER, TTS_PROVIDER select adapters (local/openai/anthropic, openai/stub, google/azure/stub).
 */
export function loadConfig(): AppConfig {
  const name = getEnv("ASSISTANT_NAME") || "Haro";
  return {
    assistant: {
      name,
      mode: oneOf(getEnv("ASSISTANT_MODE"), ["local", "openai", "anthropic"] as const, "local"),
      personality: (getEnv("ASSISTANT_PERSONALITY") || DEFAULT_PERSONALITY).split("{name}").join(name),
    },
    llm: {
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      temperature: getFloat("LLM_TEMPERATURE", 0.7),
      maxTokens: getInt("LLM_MAX_TOKENS", 150),
      timeoutMs: getInt("LLM_TIMEOUT_MS", 25_000),
    },
    conversation: {
      maxExchanges: getInt("MAX_CONVERSATION_HISTORY", 10),
      wakeWords: getList("WAKE_WORDS", ["hey haro", "haro", "ai"]).map((w) => w.toLowerCase()),
      intentAnalysis: getFlag("INTENT_ANALYSIS"),
    },
    asr: {
      provider: oneOf(getEnv("ASR_PROVIDER"), ["openai", "stub"] as const, "openai"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      timeoutMs: getInt("ASR_TIMEOUT_MS", 20_000),
    },
    tts: {
      provider: oneOf(getEnv("TTS_PROVIDER"), ["google", "azure", "stub"] as const, "google"),
      googleApiKey: getEnv("GOOGLE_CLOUD_TTS_API_KEY"),
      azureKey: getEnv("AZURE_TTS_KEY"),
      azureRegion: getEnv("AZURE_TTS_REGION"),
      voices: getList("TTS_VOICES", []),
      voiceIndex: getInt("TTS_VOICE_INDEX", 0),
      rate: getInt("TTS_RATE", 150),
      volume: getFloat("TTS_VOLUME", 0.9),
      output: oneOf(getEnv("AUDIO_OUTPUT"), ["aplay", "none"] as const, "aplay"),
      timeoutMs: getInt("TTS_TIMEOUT_MS", 15_000),
    },
    capture: {
      microphoneDevice: getEnv("MICROPHONE_DEVICE"),
      vadSilenceMs: getInt("VAD_SILENCE_MS", 500),
      vadEnergyThreshold: getInt("VAD_ENERGY_THRESHOLD", 500),
      vadAggressiveness: getInt("VAD_AGGRESSIVENESS", 1),
      vadDetector: oneOf(getEnv("VAD_DETECTOR"), ["auto", "energy"] as const, "auto"),
      phraseLimitMs: getInt("PHRASE_LIMIT_MS", 5000),
    },
  };
}

/**
 * Reject settings the assistant cannot start with.
 * Remote mode without its credential is fatal: the system does not fall back to local mode silently.
 */
export function validateConfig(config: AppConfig): void {
  const { mode } = config.assistant;
  if (mode === "openai" && !config.llm.openaiApiKey) {
    throw new ConfigError("Missing required env: OPENAI_API_KEY (ASSISTANT_MODE=openai)");
  }
  if (mode === "anthropic" && !config.llm.anthropicApiKey) {
    throw new ConfigError("Missing required env: ANTHROPIC_API_KEY (ASSISTANT_MODE=anthropic)");
  }
  if (config.conversation.maxExchanges < 0) {
    throw new ConfigError(`MAX_CONVERSATION_HISTORY must be >= 0 (got ${config.conversation.maxExchanges})`);
  }
  if (config.conversation.wakeWords.length === 0) {
    throw new ConfigError("WAKE_WORDS must name at least one wake phrase");
  }
  if (config.tts.volume < 0 || config.tts.volume > 1) {
    throw new ConfigError(`TTS_VOLUME must be between 0.0 and 1.0 (got ${config.tts.volume})`);
  }
  if (config.tts.rate <= 0) {
    throw new ConfigError(`TTS_RATE must be positive (got ${config.tts.rate})`);
  }
  const { vadAggressiveness } = config.capture;
  if (!Number.isInteger(vadAggressiveness) || vadAggressiveness < 0 || vadAggressiveness > 3) {
    throw new ConfigError(`VAD_AGGRESSIVENESS must be 0, 1, 2 or 3 (got ${vadAggressiveness})`);
  }
  if (config.llm.temperature < 0 || config.llm.temperature > 2) {
    throw new ConfigError(`LLM_TEMPERATURE must be between 0 and 2 (got ${config.llm.temperature})`);
  }
}

/** Label of the generation backend, shown in summaries and --config. */
export function modelLabel(config: AppConfig): string {
  switch (config.assistant.mode) {
    case "openai":
      return config.llm.openaiModel;
    case "anthropic":
      return config.llm.anthropicModel;
    default:
      return "Local Knowledge Base";
  }
}

function mask(secret: string | undefined): string {
  if (!secret) return "(not set)";
  return secret.length <= 4 ? "****" : `****${secret.slice(-4)}`;
}

/** Human-readable config dump (secrets masked). */
export function describeConfig(config: AppConfig): string[] {
  const lines = [
    `AI Name: ${config.assistant.name}`,
    `Mode: ${config.assistant.mode}`,
    `Model: ${modelLabel(config)}`,
    `Max History: ${config.conversation.maxExchanges}`,
    `Wake Words: ${config.conversation.wakeWords.join(", ")}`,
    `Intent Analysis: ${config.conversation.intentAnalysis ? "on" : "off"}`,
    `ASR Provider: ${config.asr.provider}`,
    `TTS Provider: ${config.tts.provider}`,
    `TTS Rate: ${config.tts.rate} WPM`,
    `TTS Volume: ${config.tts.volume}`,
    `TTS Voice Index: ${config.tts.voiceIndex}`,
    `Audio Output: ${config.tts.output}`,
    `Microphone: ${config.capture.microphoneDevice ?? "default"}`,
    `VAD Detector: ${config.capture.vadDetector}`,
    `VAD Energy Threshold: ${config.capture.vadEnergyThreshold}`,
  ];
  if (config.assistant.mode === "openai") lines.push(`OpenAI Key: ${mask(config.llm.openaiApiKey)}`);
  if (config.assistant.mode === "anthropic") lines.push(`Anthropic Key: ${mask(config.llm.anthropicApiKey)}`);
  return lines;
}
