/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (Google Cloud, Azure, stub).
 * All adapters return raw 16-bit mono PCM at the requested sample rate.
 */

export interface VoiceOptions {
  /** Voice name or id (provider-specific). Provider default when omitted. */
  voiceName?: string;
  /** Language code (e.g. en-US). */
  languageCode?: string;
  /** Sample rate in Hz of the returned PCM. */
  sampleRateHz?: number;
  /** Speaking rate multiplier, 1.0 = normal. */
  speakingRate?: number;
}

/**
 * TTS adapter interface: text in, PCM buffer(s) out.
 * Adapters that make a request abort it when `signal` fires.
 */
export interface ITTS {
  synthesize(
    text: string,
    options?: VoiceOptions,
    signal?: AbortSignal
  ): Promise<Buffer> | Promise<AsyncIterable<Buffer>> | AsyncIterable<Buffer>;
}

function isAsyncIterable(value: Buffer | AsyncIterable<Buffer>): value is AsyncIterable<Buffer> {
  return Symbol.asyncIterator in Object(value);
}

/**
 * Normalize TTS result to async iterable of buffers for uniform consumption.
 */
export async function* ttsToStream(
  result: Promise<Buffer> | Promise<AsyncIterable<Buffer>> | AsyncIterable<Buffer>
): AsyncIterable<Buffer> {
  const resolved = await Promise.resolve(result);
  if (isAsyncIterable(resolved)) {
    yield* resolved;
  } else {
    yield resolved;
  }
}
