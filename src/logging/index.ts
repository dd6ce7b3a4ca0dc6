/**
 * Structured logging for the voice companion.
 * Logs responder calls, speech segments, turn events, and errors with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info; silent under Jest)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? fallback;
}

const underTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL, underTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !underTest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Switch the process-wide logger level (e.g. --debug). Call once at startup. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/** Log a responder call (summary only; transcripts may be personal). */
export function logResponderCall(
  log: pino.Logger,
  mode: "remote" | "local",
  historyLength: number,
  replyLength: number,
  durationMs?: number
): void {
  log.info({ event: "RESPONDER_CALL", mode, historyLength, replyLength, durationMs }, "Responder completed");
}

/** Log a rendered (or halted) speech segment. */
export function logSpeech(
  log: pino.Logger,
  source: "queue" | "immediate",
  textLength: number,
  durationMs?: number
): void {
  log.info({ event: "SPEECH_SEGMENT", source, textLength, durationMs }, "Speech segment finished");
}

/** Log turn start/end. */
export function logTurn(log: pino.Logger, phase: "start" | "end", turn?: string): void {
  log.info({ event: "TURN", phase, turn }, phase === "start" ? "Turn start" : "Turn end");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, name: err.name, stack: err.stack, ...context }, "Error");
}
