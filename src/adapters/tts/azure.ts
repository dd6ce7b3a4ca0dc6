/**
 * Azure Cognitive Services Text-to-Speech adapter (optional).
 * Uses REST API with subscription key.
 */

import type { ITTS, VoiceOptions } from "./types";

export interface AzureTTSConfig {
  key: string;
  region: string;
}

const DEFAULT_VOICE = "en-US-JennyNeural";

/** Azure raw PCM output formats by sample rate. */
const OUTPUT_FORMATS: Record<number, string> = {
  16000: "raw-16khz-16bit-mono-pcm",
  24000: "raw-24khz-16bit-mono-pcm",
  48000: "raw-48khz-16bit-mono-pcm",
};

export class AzureTTS implements ITTS {
  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions, signal?: AbortSignal): Promise<Buffer> {
    const voiceName = options?.voiceName ?? DEFAULT_VOICE;
    const languageCode = options?.languageCode ?? "en-US";
    const outputFormat = OUTPUT_FORMATS[options?.sampleRateHz ?? 24000] ?? OUTPUT_FORMATS[24000];
    const ratePercent = Math.round(((options?.speakingRate ?? 1) - 1) * 100);
    const url = `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": outputFormat,
      },
      body:
        `<speak version='1.0' xml:lang='${languageCode}'><voice name='${escapeXml(voiceName)}'>` +
        `<prosody rate='${ratePercent >= 0 ? "+" : ""}${ratePercent}%'>${escapeXml(text)}</prosody></voice></speak>`,
      signal,
    });
    if (!response.ok) throw new Error(`Azure TTS failed: ${response.status} ${response.statusText}`);
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
