/**
 * Turn orchestrator: captured audio -> VAD segment -> ASR -> wake-word filter -> session -> speech queue.
 * Owns the assistant lifecycle (stopped -> initializing -> listening -> stopped) and the shutdown sequence.
 */

import type { IASR } from "../adapters/asr";
import type { IMicrophone } from "../audio/microphone";
import type { ConversationSession } from "../conversation/session";
import type { SpeechOutputQueue } from "../speech/output-queue";
import type { IntentResult } from "../responders/types";
import type { OrchestratorState, PipelineCallbacks, TurnOutcome } from "./types";
import { VAD } from "./vad";
import { WakeWordFilter } from "./wake-word";
import { pcmToWav } from "./audio-utils";
import { withTimeout } from "./timeouts";
import { countTurnOutcome, recordTurnMetrics } from "../metrics";
import { TranscriptionError, toError } from "../errors";
import { logger, logTurn } from "../logging";

const DEFAULT_ASR_TIMEOUT_MS = 20_000;
const FAREWELL_IDLE_TIMEOUT_MS = 3000;

export const ACTIVATION_PROMPT = "Hello! How can I help you?";
export const FAREWELL = "Goodbye! It was nice talking with you.";

export function greetingFor(aiName: string): string {
  return `Hello! I'm ${aiName}, your AI assistant. How can I help you today?`;
}

export interface OrchestratorConfig {
  aiName: string;
  wakeWords: readonly string[];
  /** Run intent analysis before each reply. */
  intentAnalysis?: boolean;
  vadSilenceMs: number;
  /** Energy-based VAD threshold (when webrtcvad unavailable); lower = more sensitive. */
  vadEnergyThreshold?: number;
  /** WebRTC VAD aggressiveness 0–3 (only when webrtcvad native module is used). */
  vadAggressiveness?: number;
  /** Force the energy detector even when webrtcvad is installed. */
  vadDetector?: "auto" | "energy";
  /** Hard limit on one captured phrase. */
  phraseLimitMs?: number;
  timeouts?: { asrMs?: number };
}

/** Audio collaborators; both optional so the orchestrator also runs on transcripts alone. */
export interface OrchestratorIO {
  asr?: IASR;
  microphone?: IMicrophone;
}

export class Orchestrator {
  private readonly vad: VAD;
  private readonly wake: WakeWordFilter;
  private audioBuffer: Buffer[] = [];
  private _state: OrchestratorState = "stopped";
  private closing = false;
  /** Transcripts are handled in capture order even though they are transcribed concurrently. */
  private turnChain: Promise<void> = Promise.resolve();
  private shutdownPromise: Promise<void> | null = null;
  private readonly asrTimeoutMs: number;

  constructor(
    private readonly session: ConversationSession,
    private readonly speech: SpeechOutputQueue,
    private readonly config: OrchestratorConfig,
    private readonly io: OrchestratorIO = {},
    private readonly callbacks: PipelineCallbacks = {}
  ) {
    this.vad = new VAD({
      silenceMs: config.vadSilenceMs,
      maxPhraseMs: config.phraseLimitMs,
      aggressiveness: config.vadAggressiveness ?? 1,
      energyThreshold: config.vadEnergyThreshold,
      detector: config.vadDetector,
    });
    this.wake = new WakeWordFilter(config.wakeWords);
    this.asrTimeoutMs = config.timeouts?.asrMs ?? DEFAULT_ASR_TIMEOUT_MS;
  }

  get state(): OrchestratorState {
    return this._state;
  }

  /**
   * Greet, then start capture. A microphone failure is fatal: the state returns to stopped
   * and the ResourceError propagates.
   */
  async start(): Promise<void> {
    if (this._state !== "stopped" || this.shutdownPromise) return;
    this.setState("initializing");
    this.speech.enqueue(greetingFor(this.config.aiName));
    if (this.io.microphone) {
      try {
        await this.io.microphone.start((chunk) => this.pushAudio(chunk));
      } catch (err) {
        this.setState("stopped");
        throw err;
      }
    }
    this.setState("listening");
    logger.info({ event: "ORCHESTRATOR_LISTENING", wakeWords: this.wake.wakeWords }, "Listening for wake words");
  }

  /**
   * Push raw audio (16kHz mono 16-bit PCM). Each finished phrase is transcribed off the capture path.
   */
  pushAudio(chunk: Buffer): void {
    if (!this.accepting()) return;
    if (!this.io.asr) {
      logger.warn({ event: "AUDIO_WITHOUT_ASR" }, "Audio pushed but no speech-to-text adapter is attached");
      return;
    }
    this.audioBuffer.push(chunk);
    const combined = Buffer.concat(this.audioBuffer);
    const frameSize = VAD.getFrameSizeBytes();
    let offset = 0;
    while (offset + frameSize <= combined.length) {
      const result = this.vad.processFrame(combined.subarray(offset, offset + frameSize));
      offset += frameSize;
      if (result.endOfTurn && result.segment && result.segment.length > 0) {
        const segmentMs = Math.round((result.segment.length / frameSize) * 20);
        logger.debug({ event: "VAD_END_OF_TURN", segmentBytes: result.segment.length, segmentMs }, "VAD: end of phrase");
        this.enqueueSegment(result.segment, this.io.asr);
      }
    }
    this.audioBuffer = offset < combined.length ? [combined.subarray(offset)] : [];
  }

  /** Resolves once every phrase captured so far has been handled. */
  whenSettled(): Promise<void> {
    return this.turnChain;
  }

  /**
   * One recognized utterance through the wake-word filter and the session.
   * The reply (or activation prompt) is queued for speaking before this resolves.
   */
  async handleTranscript(text: string, heardAt: number = Date.now()): Promise<TurnOutcome> {
    if (!this.accepting()) return { kind: "ignored", reason: "not-listening" };
    this.callbacks.onUserTranscript?.(text);
    if (!this.wake.detect(text)) {
      logger.debug({ event: "WAKE_WORD_ABSENT" }, "No wake word; ignoring utterance");
      countTurnOutcome("ignored");
      return { kind: "ignored", reason: "no-wake-word" };
    }

    const utterance = this.wake.strip(text);
    if (!utterance) {
      this.speech.enqueue(ACTIVATION_PROMPT);
      countTurnOutcome("activation");
      return { kind: "activation", reply: ACTIVATION_PROMPT };
    }

    logTurn(logger, "start");
    let intent: IntentResult | undefined;
    let intentLatencyMs: number | undefined;
    if (this.config.intentAnalysis) {
      const intentStart = Date.now();
      intent = await this.session.analyzeIntent(utterance);
      intentLatencyMs = Date.now() - intentStart;
      this.callbacks.onIntent?.(utterance, intent);
    }

    const responseStart = Date.now();
    const reply = await this.session.process(utterance);
    const responseLatencyMs = Date.now() - responseStart;
    if (this.closing) {
      logger.debug({ event: "REPLY_DROPPED", reason: "shutdown" }, "Shutting down; reply not spoken");
    } else {
      this.speech.enqueue(reply);
      this.callbacks.onReply?.(utterance, reply);
    }
    countTurnOutcome("reply");
    recordTurnMetrics({
      intentLatencyMs,
      responseLatencyMs,
      endOfUserSpeechToReplyQueuedMs: Date.now() - heardAt,
      replyLength: reply.length,
    });
    logTurn(logger, "end");
    return { kind: "reply", utterance, reply, intent };
  }

  /**
   * Stop capture, say goodbye, drain speech, close the queue. Safe to call from a signal
   * handler; later calls return the same promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) this.shutdownPromise = this.doShutdown();
    return this.shutdownPromise;
  }

  private async doShutdown(): Promise<void> {
    logger.info({ event: "ORCHESTRATOR_SHUTDOWN" }, "Shutting down");
    this.closing = true;
    this.io.microphone?.stop();
    this.vad.reset();
    this.audioBuffer = [];
    this.speech.speakNow(FAREWELL);
    const idle = await this.speech.waitUntilIdle(FAREWELL_IDLE_TIMEOUT_MS);
    if (!idle) {
      logger.warn({ event: "FAREWELL_TIMEOUT", timeoutMs: FAREWELL_IDLE_TIMEOUT_MS }, "Farewell did not finish in time");
    }
    await this.speech.shutdown();
    this.setState("stopped");
  }

  private accepting(): boolean {
    return this._state === "listening" && !this.closing;
  }

  private setState(state: OrchestratorState): void {
    if (this._state === state) return;
    this._state = state;
    this.callbacks.onStateChange?.(state);
  }

  private enqueueSegment(segment: Buffer, asr: IASR): void {
    const heardAt = Date.now();
    const transcript = this.transcribe(segment, asr);
    this.turnChain = this.turnChain.then(async () => {
      const result = await transcript;
      if (!result) return;
      recordTurnMetrics({ asrLatencyMs: result.latencyMs });
      try {
        await this.handleTranscript(result.text, heardAt);
      } catch (err) {
        logger.error({ event: "TURN_FAILED", err: toError(err).message }, "Error handling utterance");
      }
    });
  }

  /** Transcript text, or null when there was nothing usable. Never rejects. */
  private async transcribe(segment: Buffer, asr: IASR): Promise<{ text: string; latencyMs: number } | null> {
    const controller = new AbortController();
    const started = Date.now();
    try {
      const result = await withTimeout(
        asr.transcribe(pcmToWav(segment, VAD.getSampleRate()), "wav", controller.signal),
        this.asrTimeoutMs,
        "ASR"
      );
      const text = result.text.trim();
      if (!text) throw new TranscriptionError("no-speech", "Empty transcript");
      return { text, latencyMs: Date.now() - started };
    } catch (err) {
      controller.abort();
      if (err instanceof TranscriptionError && err.kind === "no-speech") {
        logger.debug({ event: "ASR_NO_SPEECH" }, "Could not understand audio");
        countTurnOutcome("no-speech");
      } else {
        logger.warn({ event: "ASR_FAILED", err: toError(err).message }, "Speech recognition service unavailable");
        countTurnOutcome("asr-failed");
      }
      return null;
    }
  }
}
