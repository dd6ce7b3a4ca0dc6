/**
 * TTS adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { ITTS } from "./types";
import { StubTTS } from "./stub";
import { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
import { AzureTTS } from "./azure";
import { logger } from "../../logging";

export type { ITTS, VoiceOptions } from "./types";
export { ttsToStream } from "./types";
export { StubTTS } from "./stub";
export { GoogleCloudTTS, GoogleCloudTTSADC, buildRequest, stripWavHeader } from "./google-cloud";
export { AzureTTS, escapeXml } from "./azure";

export function createTTS(config: AppConfig): ITTS {
  const { provider, googleApiKey, azureKey, azureRegion } = config.tts;
  if (provider === "google") {
    if (googleApiKey) {
      return new GoogleCloudTTS({ apiKey: googleApiKey });
    }
    return new GoogleCloudTTSADC();
  }
  if (provider === "azure") {
    if (azureKey && azureRegion) {
      return new AzureTTS({ key: azureKey, region: azureRegion });
    }
    logger.warn({ event: "TTS_PROVIDER_INCOMPLETE", provider }, "AZURE_TTS_KEY/AZURE_TTS_REGION not set; speech will be silent");
  }
  return new StubTTS();
}
