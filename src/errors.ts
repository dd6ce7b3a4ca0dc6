/**
 * Error taxonomy for startup and collaborator failures.
 * ConfigError and ResourceError abort startup; TranscriptionError is logged and looped past.
 */

/** Missing credential or invalid setting. Fatal at initialization. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Microphone, audio player or synthesis engine unavailable. Fatal at initialization. */
export class ResourceError extends Error {
  constructor(
    message: string,
    readonly resource: "microphone" | "player" | "synthesizer"
  ) {
    super(message);
    this.name = "ResourceError";
  }
}

export type TranscriptionFailure = "no-speech" | "service-unavailable";

/** Classified speech-to-text failure. */
export class TranscriptionError extends Error {
  constructor(
    readonly kind: TranscriptionFailure,
    message: string
  ) {
    super(message);
    this.name = "TranscriptionError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
