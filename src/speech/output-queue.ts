/**
 * Speech output queue: one async worker renders queued segments in FIFO order, so speaking
 * never blocks the caller and two segments never overlap.
 *
 * Interrupting calls (enqueue with interrupt, speakNow) halt the segment in flight, drop
 * everything pending and start a new epoch.
 */

import type { SpeechEngine } from "./engine";
import { settlesWithin } from "../pipeline/timeouts";
import { logger, logSpeech } from "../logging";
import { toError } from "../errors";

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 2000;

type SpeechSource = "queue" | "immediate";

interface IdleWaiter {
  resolve: (idle: boolean) => void;
  timer: NodeJS.Timeout;
}

export class SpeechOutputQueue {
  private pending: string[] = [];
  /** Segment being rendered (by the worker or speakNow), if any. */
  private active: Promise<void> | null = null;
  private epoch = 0;
  private closed = false;
  private wake: (() => void) | null = null;
  private waiters: IdleWaiter[] = [];
  private shutdownPromise: Promise<void> | null = null;
  private readonly worker: Promise<void>;

  constructor(private readonly engine: SpeechEngine) {
    this.worker = this.run();
  }

  /** Queue text for speaking. With interrupt, halt and drop everything before it. */
  enqueue(text: string, interrupt = false): void {
    const segment = text.trim();
    if (!segment) return;
    if (this.closed) {
      logger.warn({ event: "SPEECH_DROPPED", reason: "shutdown" }, "Speech queue is shut down; dropping segment");
      return;
    }
    if (interrupt) this.interrupt();
    this.pending.push(segment);
    logger.debug({ event: "SPEECH_QUEUED", interrupt, pending: this.pending.length }, "Queued speech segment");
    this.wakeWorker();
  }

  /**
   * Speak now, outside the FIFO. Returns immediately; the worker starts nothing else
   * until this segment is done.
   */
  speakNow(text: string): void {
    const segment = text.trim();
    if (!segment) return;
    if (this.closed) {
      logger.warn({ event: "SPEECH_DROPPED", reason: "shutdown" }, "Speech queue is shut down; dropping segment");
      return;
    }
    this.interrupt();
    const epoch = this.epoch;
    const previous = this.active ?? Promise.resolve();
    this.track(
      previous.then(async () => {
        // A later interrupt superseded this segment before it started.
        if (epoch !== this.epoch) return;
        await this.render(segment, "immediate");
      })
    );
  }

  /** Halt the segment in flight. Pending segments stay queued. */
  stop(): void {
    this.engine.stop();
  }

  isBusy(): boolean {
    return this.active !== null || this.pending.length > 0;
  }

  /** Resolves true once nothing is playing or pending, false if the timeout passes first. */
  waitUntilIdle(timeoutMs: number): Promise<boolean> {
    if (!this.isBusy()) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const waiter: IdleWaiter = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(false);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Drop pending work, let the segment in flight finish, join the worker, close the engine.
   * Later calls return the same promise.
   */
  shutdown(timeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<void> {
    if (!this.shutdownPromise) this.shutdownPromise = this.doShutdown(timeoutMs);
    return this.shutdownPromise;
  }

  private async doShutdown(timeoutMs: number): Promise<void> {
    this.closed = true;
    const dropped = this.pending.length;
    this.pending = [];
    this.wakeWorker();
    const joined = await settlesWithin(this.worker, timeoutMs);
    if (!joined) {
      logger.warn({ event: "SPEECH_WORKER_JOIN_TIMEOUT", timeoutMs }, "Speech worker did not finish in time; halting");
      this.engine.stop();
    }
    try {
      await this.engine.close();
    } catch (err) {
      logger.warn({ event: "SPEECH_ENGINE_CLOSE_FAILED", err: toError(err).message }, "Error closing speech engine");
    }
    logger.info({ event: "SPEECH_QUEUE_SHUTDOWN", dropped, joined }, "Speech queue shut down");
    this.notifyIdle();
  }

  private interrupt(): void {
    this.epoch++;
    const dropped = this.pending.length;
    this.pending = [];
    if (this.active) this.engine.stop();
    if (dropped > 0) logger.debug({ event: "SPEECH_DRAINED", dropped }, "Dropped pending speech");
  }

  private async run(): Promise<void> {
    for (;;) {
      if (this.active) {
        await this.active;
        continue;
      }
      const next = this.pending.shift();
      if (next !== undefined) {
        await this.track(this.render(next, "queue"));
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private wakeWorker(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  /** Mark `segment` as the one in flight until it settles. */
  private track(segment: Promise<void>): Promise<void> {
    const tracked: Promise<void> = segment.finally(() => {
      if (this.active === tracked) this.active = null;
      if (!this.isBusy()) this.notifyIdle();
    });
    this.active = tracked;
    return tracked;
  }

  private async render(text: string, source: SpeechSource): Promise<void> {
    const started = Date.now();
    try {
      await this.engine.speak(text);
      logSpeech(logger, source, text.length, Date.now() - started);
    } catch (err) {
      logger.warn({ event: "SPEECH_FAILED", source, err: toError(err).message }, "Speech engine failed; continuing");
    }
  }

  private notifyIdle(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) {
      clearTimeout(w.timer);
      w.resolve(true);
    }
  }
}
