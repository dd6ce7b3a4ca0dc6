/**
 * Voice Activity Detection: detect speech vs silence on 16kHz mono 16-bit frames.
 * Uses webrtcvad (npm 1.0.1) when available; falls back to energy-based VAD if native module fails to load.
 * A phrase ends after silenceMs of silence, or when it reaches maxPhraseMs.
 */

const VAD_FRAME_MS = 20;
const VAD_SAMPLE_RATE = 16000;
const BYTES_PER_SAMPLE = 2;
const SAMPLES_PER_FRAME = (VAD_SAMPLE_RATE * VAD_FRAME_MS) / 1000;
const FRAME_SIZE_BYTES = SAMPLES_PER_FRAME * BYTES_PER_SAMPLE;

/** RMS threshold for energy-based fallback (16-bit PCM): below = silence. */
const ENERGY_THRESHOLD = 500;

export interface VADConfig {
  /** Silence duration (ms) to consider end of phrase. */
  silenceMs: number;
  /** Hard cap on one phrase (ms); the segment is cut even while speech continues. */
  maxPhraseMs?: number;
  /** Energy-based threshold (RMS); lower = more sensitive. */
  energyThreshold?: number;
  /** Aggressiveness 0-3 (webrtcvad only; 0 = least aggressive, 3 = most). */
  aggressiveness?: number;
  /** "energy" skips webrtcvad even when it is installed. */
  detector?: "auto" | "energy";
}

export interface VADResult {
  /** True if speech detected in this frame. */
  isSpeech: boolean;
  /** True when silence has lasted >= silenceMs after speech, or the phrase hit its limit. */
  endOfTurn: boolean;
  /** Accumulated segment (all frames since last segment start) when endOfTurn. */
  segment: Buffer | undefined;
}

interface VadImpl {
  isVoice(frame: Buffer, sampleRate: number): boolean;
}

function isVadImpl(value: unknown): value is VadImpl & { setMode?: (mode: number) => void } {
  return typeof value === "object" && value !== null && "isVoice" in value && typeof value.isVoice === "function";
}

function loadWebRtcVad(aggressiveness: number): VadImpl | null {
  try {
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    const webrtcvad: unknown = require("webrtcvad");
    const vad: unknown = typeof webrtcvad === "function" ? webrtcvad() : webrtcvad;
    if (isVadImpl(vad)) {
      if (typeof vad.setMode === "function") vad.setMode(aggressiveness);
      return vad;
    }
  } catch {
    // Native module failed (e.g. build); use energy fallback.
  }
  return null;
}

/** Simple energy-based VAD: RMS above threshold = speech. */
function isVoiceEnergy(frame: Buffer, threshold: number): boolean {
  if (frame.length < 2) return false;
  let sum = 0;
  for (let i = 0; i < frame.length; i += 2) {
    const s = frame.readInt16LE(i);
    sum += s * s;
  }
  const rms = Math.sqrt(sum / (frame.length / 2));
  return rms > threshold;
}

export class VAD {
  private vad: VadImpl | null = null;
  private readonly silenceFrames: number;
  private readonly maxPhraseFrames: number;
  private readonly energyThreshold: number;
  private buffer: Buffer[] = [];
  private silenceCount = 0;
  private hadSpeech = false;

  constructor(config: VADConfig) {
    this.silenceFrames = Math.ceil(config.silenceMs / VAD_FRAME_MS);
    this.maxPhraseFrames = config.maxPhraseMs ? Math.ceil(config.maxPhraseMs / VAD_FRAME_MS) : Infinity;
    this.energyThreshold = config.energyThreshold ?? ENERGY_THRESHOLD;
    if (config.detector !== "energy") this.vad = loadWebRtcVad(config.aggressiveness ?? 1);
  }

  private isVoice(frame: Buffer): boolean {
    if (this.vad) return this.vad.isVoice(frame.subarray(0, FRAME_SIZE_BYTES), VAD_SAMPLE_RATE);
    return isVoiceEnergy(frame.subarray(0, FRAME_SIZE_BYTES), this.energyThreshold);
  }

  /**
   * Process one frame of audio (16kHz mono 16-bit, 20ms = 640 bytes).
   * Returns VAD result; when endOfTurn, segment contains the accumulated speech.
   */
  processFrame(frame: Buffer): VADResult {
    if (frame.length < FRAME_SIZE_BYTES) {
      return { isSpeech: false, endOfTurn: false, segment: undefined };
    }
    const isSpeech = this.isVoice(frame);
    if (isSpeech) {
      this.buffer.push(frame.subarray(0, FRAME_SIZE_BYTES));
      this.silenceCount = 0;
      this.hadSpeech = true;
      if (this.buffer.length >= this.maxPhraseFrames) {
        return { isSpeech: true, endOfTurn: true, segment: this.takeSegment() };
      }
      return { isSpeech: true, endOfTurn: false, segment: undefined };
    }
    if (this.hadSpeech) {
      this.buffer.push(frame.subarray(0, FRAME_SIZE_BYTES));
      this.silenceCount++;
      if (this.silenceCount >= this.silenceFrames || this.buffer.length >= this.maxPhraseFrames) {
        return { isSpeech: false, endOfTurn: true, segment: this.takeSegment() };
      }
    }
    return { isSpeech: false, endOfTurn: false, segment: undefined };
  }

  /** Drop any partial phrase. */
  reset(): void {
    this.buffer = [];
    this.silenceCount = 0;
    this.hadSpeech = false;
  }

  private takeSegment(): Buffer {
    const segment = Buffer.concat(this.buffer);
    this.reset();
    return segment;
  }

  static getFrameSizeBytes(): number {
    return FRAME_SIZE_BYTES;
  }

  static getSampleRate(): number {
    return VAD_SAMPLE_RATE;
  }
}
