/**
 * Shared test doubles: a complete AppConfig, a scripted completion endpoint and a
 * speech engine whose segments finish when the test says so.
 */

import type { AppConfig } from "../../src/config";
import type { ChatOptions, ChatResponse, ILLM, Message } from "../../src/adapters/llm";
import type { SpeechEngine } from "../../src/speech/engine";
import type { ITTS, VoiceOptions } from "../../src/adapters/tts";

export function testConfig(): AppConfig {
  return {
    assistant: { name: "Haro", mode: "local", personality: "You are Haro." },
    llm: {
      openaiModel: "gpt-4o",
      anthropicModel: "claude-3-5-sonnet-20241022",
      temperature: 0.7,
      maxTokens: 150,
      timeoutMs: 25_000,
    },
    conversation: { maxExchanges: 10, wakeWords: ["hey haro", "haro", "ai"], intentAnalysis: false },
    asr: { provider: "stub", timeoutMs: 20_000 },
    tts: { provider: "stub", voices: [], voiceIndex: 0, rate: 150, volume: 0.9, output: "none", timeoutMs: 15_000 },
    capture: {
      vadSilenceMs: 500,
      vadEnergyThreshold: 500,
      vadAggressiveness: 1,
      vadDetector: "energy",
      phraseLimitMs: 5000,
    },
  };
}

export interface ChatCall {
  messages: Message[];
  options?: ChatOptions;
}

/** Completion endpoint that answers from a queue of replies or errors. */
export class ScriptedLLM implements ILLM {
  readonly calls: ChatCall[] = [];
  private readonly script: Array<string | Error>;

  constructor(script: Array<string | Error> = []) {
    this.script = [...script];
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages: messages.map((m) => ({ ...m })), options });
    const next = this.script.shift();
    if (next === undefined) throw new Error("script exhausted");
    if (next instanceof Error) throw next;
    return { text: next };
  }
}

/** Completion endpoint that never answers (until aborted). */
export class HangingLLM implements ILLM {
  aborted = false;

  chat(_messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    return new Promise<ChatResponse>((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => {
        this.aborted = true;
        reject(new Error("aborted"));
      });
    });
  }
}

interface Segment {
  text: string;
  finish: () => void;
}

/**
 * Speech engine under test control: speak() stays pending until finishNext(), stop()
 * ends the segment in flight. Records what was started, stopped and completed.
 */
export class ControlledEngine implements SpeechEngine {
  readonly started: string[] = [];
  readonly completed: string[] = [];
  stops = 0;
  closed = false;
  failOn = new Set<string>();
  private current: Segment | null = null;

  speak(text: string): Promise<void> {
    this.started.push(text);
    if (this.failOn.has(text)) return Promise.reject(new Error(`cannot say ${text}`));
    return new Promise<void>((resolve) => {
      const segment: Segment = {
        text,
        finish: () => {
          if (this.current === segment) this.current = null;
          resolve();
        },
      };
      this.current = segment;
    });
  }

  get speaking(): string | null {
    return this.current?.text ?? null;
  }

  /** Complete the segment in flight normally. */
  finishNext(): void {
    const segment = this.current;
    if (!segment) throw new Error("nothing is being spoken");
    this.completed.push(segment.text);
    segment.finish();
  }

  stop(): void {
    this.stops++;
    this.current?.finish();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Engine that finishes every segment on the next tick. */
export class InstantEngine implements SpeechEngine {
  readonly spoken: string[] = [];
  closed = false;

  async speak(text: string): Promise<void> {
    this.spoken.push(text);
  }

  stop(): void {}

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Let pending promise callbacks run. */
export async function flushPromises(times = 10): Promise<void> {
  for (let i = 0; i < times; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** TTS whose requests for the `hanging` texts never answer until aborted; others return empty PCM. */
export class ControlledTTS implements ITTS {
  readonly started: string[] = [];
  readonly aborted: string[] = [];

  constructor(private readonly hanging: readonly string[] = []) {}

  synthesize(text: string, _options?: VoiceOptions, signal?: AbortSignal): Promise<Buffer> {
    this.started.push(text);
    if (!this.hanging.includes(text)) return Promise.resolve(Buffer.alloc(0));
    const request = deferred<Buffer>();
    signal?.addEventListener("abort", () => {
      this.aborted.push(text);
      request.reject(new Error("aborted"));
    });
    return request.promise;
  }
}
