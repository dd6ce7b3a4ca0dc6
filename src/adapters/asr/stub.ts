/**
 * Stub ASR adapter for text mode and tests.
 * Replays scripted transcripts in order, then reports no speech.
 */

import type { IASR, TranscriptResult } from "./types";
import { TranscriptionError } from "../../errors";

export class StubASR implements IASR {
  private readonly script: string[];

  constructor(script: string[] = []) {
    this.script = [...script];
  }

  async transcribe(_audioBuffer: Buffer, _format?: string): Promise<TranscriptResult> {
    const next = this.script.shift();
    if (next === undefined || !next.trim()) {
      throw new TranscriptionError("no-speech", "Could not understand audio");
    }
    return { text: next };
  }
}
