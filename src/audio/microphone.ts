/**
 * Microphone capture through arecord: 16kHz mono 16-bit PCM, the format the VAD expects.
 * start() resolves once the recorder process is running and rejects with ResourceError otherwise.
 */

import { spawn, type ChildProcessByStdio } from "child_process";
import type { Readable } from "stream";
import { ResourceError } from "../errors";
import { logger } from "../logging";

export interface IMicrophone {
  start(onChunk: (chunk: Buffer) => void): Promise<void>;
  stop(): void;
}

export interface ArecordMicrophoneConfig {
  /** ALSA capture device (-D); default device when unset. */
  device?: string;
  /** Recorder binary (default: arecord). */
  command?: string;
  sampleRateHz?: number;
}

export class ArecordMicrophone implements IMicrophone {
  private child: ChildProcessByStdio<null, Readable, Readable> | null = null;
  private stopping = false;

  constructor(private readonly config: ArecordMicrophoneConfig = {}) {}

  start(onChunk: (chunk: Buffer) => void): Promise<void> {
    if (this.child) return Promise.resolve();
    const command = this.config.command ?? "arecord";
    const args = ["-q", "-t", "raw", "-f", "S16_LE", "-c", "1", "-r", String(this.config.sampleRateHz ?? 16000)];
    if (this.config.device) args.push("-D", this.config.device);
    this.stopping = false;

    return new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
      child.once("spawn", () => {
        this.child = child;
        logger.info({ event: "MIC_STARTED", device: this.config.device ?? "default" }, "Microphone capture started");
        resolve();
      });
      child.once("error", (err) => {
        this.child = null;
        reject(new ResourceError(`Microphone unavailable (${command}): ${err.message}`, "microphone"));
      });
      child.stdout.on("data", (chunk: Buffer) => onChunk(chunk));
      child.stderr.on("data", (buf: Buffer) => {
        const msg = buf.toString("utf8").trim();
        if (msg) logger.warn({ event: "MIC_STDERR", msg }, "Microphone recorder stderr");
      });
      child.on("close", (code, signal) => {
        this.child = null;
        if (!this.stopping) {
          logger.error({ event: "MIC_EXITED", code, signal }, "Microphone recorder exited unexpectedly");
        }
      });
    });
  }

  stop(): void {
    if (!this.child) return;
    this.stopping = true;
    this.child.kill("SIGTERM");
    this.child = null;
    logger.info({ event: "MIC_STOPPED" }, "Microphone capture stopped");
  }
}
