/**
 * OpenAI Whisper API ASR adapter.
 * Empty transcripts become "no-speech"; transport and API errors become "service-unavailable".
 */

import OpenAI, { toFile } from "openai";
import type { IASR, TranscriptResult } from "./types";
import { TranscriptionError, toError } from "../../errors";

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
}

export class OpenAIWhisperASR implements IASR {
  private client: OpenAI;

  constructor(private readonly config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async transcribe(audioBuffer: Buffer, format: string = "wav", signal?: AbortSignal): Promise<TranscriptResult> {
    const ext = format === "webm" ? "webm" : "wav";
    let text: string;
    try {
      const file = await toFile(audioBuffer, `clip-${Date.now()}.${ext}`);
      const transcription = await this.client.audio.transcriptions.create(
        { file, model: this.config.model ?? "whisper-1" },
        { signal }
      );
      text = transcription.text ?? "";
    } catch (err) {
      throw new TranscriptionError("service-unavailable", `Whisper request failed: ${toError(err).message}`);
    }
    const trimmed = text.trim();
    if (!trimmed) throw new TranscriptionError("no-speech", "Could not understand audio");
    return { text: trimmed };
  }
}
