/**
 * Speech engine: text in, audible output out. The output queue is its only caller.
 */

import type { AppConfig } from "../config";
import { createTTS, ttsToStream, type ITTS, type VoiceOptions } from "../adapters/tts";
import { AplayPlayer, SilentPlayer, type IAudioPlayer } from "../audio/player";
import { scalePcm16 } from "../pipeline/audio-utils";
import { untilAborted, withTimeout } from "../pipeline/timeouts";
import { logger } from "../logging";

export interface SpeechEngine {
  /** Render one segment. Resolves when playback ends or is halted by stop(). */
  speak(text: string): Promise<void>;
  /** Halt the segment in flight, if any. */
  stop(): void;
  /** Release the engine. No speak() after this. */
  close(): Promise<void>;
}

/** Words per minute that map to a provider speaking rate of 1.0. */
export const BASE_RATE_WPM = 150;
const DEFAULT_SAMPLE_RATE_HZ = 24_000;
const DEFAULT_SYNTHESIS_TIMEOUT_MS = 15_000;

export interface SpeechSynthesisConfig {
  /** Words per minute. */
  rate: number;
  /** 0..1 */
  volume: number;
  voices: readonly string[];
  voiceIndex: number;
  sampleRateHz?: number;
  languageCode?: string;
  /** Deadline for one synthesis request. */
  synthesisTimeoutMs?: number;
}

/** Voice at `index`, or undefined (provider default) when the index is out of range. */
export function selectVoice(voices: readonly string[], index: number): string | undefined {
  if (voices.length === 0) return undefined;
  if (!Number.isInteger(index) || index < 0 || index >= voices.length) {
    logger.warn(
      { event: "TTS_VOICE_OUT_OF_RANGE", voiceIndex: index, available: voices.length },
      "Voice index out of range; using the provider default voice"
    );
    return undefined;
  }
  return voices[index];
}

export class SpeechSynthesisEngine implements SpeechEngine {
  private readonly voice: VoiceOptions;
  private readonly volume: number;
  /** Bumped by stop(); synthesis finishing under an older generation is not played. */
  private generation = 0;
  /** Aborted by stop() to cancel the synthesis request in flight. */
  private inflight: AbortController | null = null;
  private closed = false;
  private readonly synthesisTimeoutMs: number;

  constructor(
    private readonly tts: ITTS,
    private readonly player: IAudioPlayer,
    config: SpeechSynthesisConfig
  ) {
    this.voice = {
      voiceName: selectVoice(config.voices, config.voiceIndex),
      languageCode: config.languageCode ?? "en-US",
      sampleRateHz: config.sampleRateHz ?? DEFAULT_SAMPLE_RATE_HZ,
      speakingRate: config.rate / BASE_RATE_WPM,
    };
    this.volume = Math.max(0, Math.min(1, config.volume));
    this.synthesisTimeoutMs = config.synthesisTimeoutMs ?? DEFAULT_SYNTHESIS_TIMEOUT_MS;
  }

  get voiceOptions(): Readonly<VoiceOptions> {
    return this.voice;
  }

  async speak(text: string): Promise<void> {
    if (this.closed) throw new Error("Speech engine is closed");
    const generation = this.generation;
    const controller = new AbortController();
    this.inflight = controller;
    try {
      const audio = await withTimeout(
        untilAborted(this.synthesize(text, controller.signal), controller.signal),
        this.synthesisTimeoutMs,
        "TTS synthesis"
      );
      if (audio === null || generation !== this.generation) return;
      await this.player.play(scalePcm16(audio, this.volume), this.voice.sampleRateHz ?? DEFAULT_SAMPLE_RATE_HZ);
    } finally {
      controller.abort();
      if (this.inflight === controller) this.inflight = null;
    }
  }

  stop(): void {
    this.generation++;
    this.inflight?.abort();
    this.player.stop();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.stop();
    this.closed = true;
    logger.debug({ event: "SPEECH_ENGINE_CLOSED" }, "Speech engine closed");
  }

  private async synthesize(text: string, signal: AbortSignal): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of ttsToStream(this.tts.synthesize(text, this.voice, signal))) {
      if (signal.aborted) break;
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  /** Reject with ResourceError when the audio player cannot run. */
  probe(): Promise<void> {
    return this.player.probe();
  }
}

export function createSpeechEngine(config: AppConfig): SpeechSynthesisEngine {
  const player: IAudioPlayer = config.tts.output === "aplay" ? new AplayPlayer() : new SilentPlayer();
  return new SpeechSynthesisEngine(createTTS(config), player, {
    rate: config.tts.rate,
    volume: config.tts.volume,
    voices: config.tts.voices,
    voiceIndex: config.tts.voiceIndex,
    synthesisTimeoutMs: config.tts.timeoutMs,
  });
}
