/**
 * ASR (Automatic Speech Recognition) adapter types.
 * Implementations can be swapped via config (OpenAI Whisper, stub).
 */

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Optional language code. */
  language?: string;
}

/**
 * ASR adapter interface: bounded audio clip in, transcript out.
 * Failures are thrown as TranscriptionError ("no-speech" | "service-unavailable").
 */
export interface IASR {
  /**
   * Transcribe audio to text.
   * @param audioBuffer - Audio bytes (WAV unless format says otherwise).
   * @param format - Optional format hint (e.g. "wav", "webm"). Provider-dependent.
   */
  transcribe(audioBuffer: Buffer, format?: string, signal?: AbortSignal): Promise<TranscriptResult>;
}
