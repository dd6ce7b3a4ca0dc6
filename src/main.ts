#!/usr/bin/env node
/**
 * Entry point: load config, build the session and speech queue, then run voice mode
 * (microphone + wake words) or the interactive text loop (--text).
 */

import * as readline from "readline";
import { parseArgs } from "util";
import { describeConfig, loadConfig, validateConfig, type AppConfig } from "./config";
import { createASR } from "./adapters/asr";
import { createLLM } from "./adapters/llm";
import { ArecordMicrophone } from "./audio/microphone";
import { ConversationSession } from "./conversation/session";
import { createResponder, RemoteResponder, systemPromptFor } from "./responders";
import { createSpeechEngine } from "./speech/engine";
import { SpeechOutputQueue } from "./speech/output-queue";
import { Orchestrator } from "./pipeline/orchestrator";
import { getSystemInfo } from "./system/info";
import { getTurnCounters } from "./metrics";
import { logger, logError, setLogLevel } from "./logging";
import { toError } from "./errors";

export interface CliOptions {
  text: boolean;
  speak: boolean;
  showConfig: boolean;
  debug: boolean;
}

export const QUIT_WORDS: readonly string[] = ["quit", "exit", "bye"];

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      text: { type: "boolean", default: false },
      speak: { type: "boolean", default: false },
      config: { type: "boolean", default: false },
      debug: { type: "boolean", default: false },
    },
    strict: true,
  });
  return {
    text: values.text ?? false,
    speak: values.speak ?? false,
    showConfig: values.config ?? false,
    debug: values.debug ?? false,
  };
}

/**
 * Graceful shutdown on SIGINT/SIGTERM. The handlers stay installed, so a second signal while
 * shutdown runs is logged and ignored instead of killing the process.
 */
export function handleShutdownSignals(
  shutdown: () => Promise<void>,
  exit: (code: number) => void,
  target: NodeJS.EventEmitter = process
): void {
  let stopping = false;
  const onSignal = (signal: NodeJS.Signals): void => {
    if (stopping) {
      logger.info({ event: "SIGNAL_IGNORED", signal }, "Already shutting down");
      return;
    }
    stopping = true;
    logger.info({ event: "SIGNAL", signal }, "Received shutdown signal");
    shutdown().then(
      () => exit(0),
      (err: unknown) => {
        logError(logger, toError(err));
        exit(1);
      }
    );
  };
  target.on("SIGINT", onSignal);
  target.on("SIGTERM", onSignal);
}

/** Session over the configured responder. Remote mode probes the endpoint first; failure is fatal. */
async function buildSession(config: AppConfig): Promise<ConversationSession> {
  const responder = createResponder(config, createLLM(config));
  if (responder instanceof RemoteResponder) await responder.verify();
  logger.info({ event: "RESPONDER_READY", mode: responder.mode, model: responder.label }, "Responder initialized");
  return new ConversationSession(responder, {
    aiName: config.assistant.name,
    systemPrompt: systemPromptFor(config, responder),
    maxExchanges: config.conversation.maxExchanges,
  });
}

function logSummary(session: ConversationSession): void {
  logger.info({ event: "SESSION_SUMMARY", ...session.summary(), outcomes: getTurnCounters() }, "Session summary");
}

async function runVoice(config: AppConfig): Promise<void> {
  const session = await buildSession(config);
  const asr = createASR(config);
  const engine = createSpeechEngine(config);
  await engine.probe();
  const speech = new SpeechOutputQueue(engine);

  const orchestrator = new Orchestrator(
    session,
    speech,
    {
      aiName: config.assistant.name,
      wakeWords: config.conversation.wakeWords,
      intentAnalysis: config.conversation.intentAnalysis,
      vadSilenceMs: config.capture.vadSilenceMs,
      vadEnergyThreshold: config.capture.vadEnergyThreshold,
      vadAggressiveness: config.capture.vadAggressiveness,
      vadDetector: config.capture.vadDetector,
      phraseLimitMs: config.capture.phraseLimitMs,
      timeouts: { asrMs: config.asr.timeoutMs },
    },
    { asr, microphone: new ArecordMicrophone({ device: config.capture.microphoneDevice }) },
    {
      onStateChange: (state) => logger.info({ event: "STATE", state }, `Assistant ${state}`),
      onIntent: (_utterance, intent) => logger.info({ event: "INTENT", ...intent }, "Intent"),
      onReply: (_utterance, reply) => logger.info({ event: "AGENT_REPLY", textLength: reply.length }, "Assistant replied"),
    }
  );

  handleShutdownSignals(
    () => orchestrator.shutdown().then(() => logSummary(session)),
    (code) => process.exit(code)
  );

  try {
    await orchestrator.start();
  } catch (err) {
    await orchestrator.shutdown();
    throw err;
  }
  logger.info({ event: "READY" }, `${config.assistant.name} is now active! Say a wake word to interact.`);
}

async function runText(config: AppConfig, speak: boolean): Promise<void> {
  const session = await buildSession(config);
  let speech: SpeechOutputQueue | null = null;
  if (speak) {
    const engine = createSpeechEngine(config);
    await engine.probe();
    speech = new SpeechOutputQueue(engine);
  }

  const out = process.stdout;
  out.write(`${config.assistant.name} text mode. Type 'quit' to exit.\n`);
  const rl = readline.createInterface({ input: process.stdin, output: out, prompt: "You: " });
  rl.prompt();
  for await (const line of rl) {
    const input = line.trim();
    if (QUIT_WORDS.includes(input.toLowerCase())) break;
    if (input) {
      const started = Date.now();
      const reply = await session.process(input);
      const seconds = ((Date.now() - started) / 1000).toFixed(2);
      out.write(`${config.assistant.name}: ${reply}\n(Response time: ${seconds}s)\n`);
      speech?.enqueue(reply);
    }
    rl.prompt();
  }
  rl.close();

  if (speech) {
    await speech.waitUntilIdle(3000);
    await speech.shutdown();
  }
  logSummary(session);
}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.debug) setLogLevel("debug");
  const config = loadConfig();
  if (options.showConfig) {
    process.stdout.write(describeConfig(config).join("\n") + "\n");
    return;
  }
  validateConfig(config);

  const info = getSystemInfo();
  logger.info({ event: "SYSTEM_INFO", ...info }, `Running on ${info.raspberryPi ? "Raspberry Pi" : info.platform}`);

  if (options.text) {
    await runText(config, options.speak);
  } else {
    await runVoice(config);
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logError(logger, toError(err));
    process.exit(1);
  });
}
