/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (env Google_Cloud_TTS_API_KEY or GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 */

import { TextToSpeechClient } from "@google-cloud/text-to-speech";
import type { ITTS, VoiceOptions } from "./types";

export interface GoogleCloudTTSConfig {
  apiKey: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";
const DEFAULT_VOICE = "en-US-Neural2-D";
const WAV_HEADER_BYTES = 44;

interface SynthesizeRequest {
  input: { text: string };
  voice: { name: string; languageCode: string };
  audioConfig: { audioEncoding: "LINEAR16"; sampleRateHertz: number; speakingRate?: number };
}

export function buildRequest(text: string, options?: VoiceOptions): SynthesizeRequest {
  const request: SynthesizeRequest = {
    input: { text },
    voice: { name: options?.voiceName ?? DEFAULT_VOICE, languageCode: options?.languageCode ?? "en-US" },
    audioConfig: { audioEncoding: "LINEAR16", sampleRateHertz: options?.sampleRateHz ?? 24000 },
  };
  if (options?.speakingRate != null) request.audioConfig.speakingRate = options.speakingRate;
  return request;
}

/** LINEAR16 responses carry a WAV header; the player wants bare PCM. */
export function stripWavHeader(audio: Buffer): Buffer {
  if (audio.length > WAV_HEADER_BYTES && audio.toString("ascii", 0, 4) === "RIFF") {
    return audio.subarray(WAV_HEADER_BYTES);
  }
  return audio;
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions, signal?: AbortSignal): Promise<Buffer> {
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildRequest(text, options)),
      signal,
    });
    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`Google TTS failed: ${response.status} ${errText}`);
    }
    const data: unknown = await response.json();
    const b64 =
      typeof data === "object" && data !== null && "audioContent" in data && typeof data.audioContent === "string"
        ? data.audioContent
        : undefined;
    if (!b64) return Buffer.alloc(0);
    return stripWavHeader(Buffer.from(b64, "base64"));
  }
}

/**
 * TTS using official Node client and Application Default Credentials (OAuth2 / service account).
 * The gRPC call takes no abort signal; the speech engine stops waiting on it when halted.
 */
export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;

  constructor() {
    this.client = new TextToSpeechClient();
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const [response] = await this.client.synthesizeSpeech(buildRequest(text, options));
    const content = response.audioContent;
    if (!content || !(content instanceof Uint8Array)) return Buffer.alloc(0);
    return stripWavHeader(Buffer.from(content));
  }
}
