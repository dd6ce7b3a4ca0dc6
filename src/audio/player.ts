/**
 * Audio playback through a child process (aplay on Raspberry Pi OS / ALSA).
 * One clip at a time; stop() kills the player so the pending play() resolves early.
 */

import { spawn, type ChildProcess } from "child_process";
import { ResourceError } from "../errors";
import { logger } from "../logging";

export interface IAudioPlayer {
  /** Play raw 16-bit mono PCM. Resolves when playback finishes or is stopped. */
  play(pcm: Buffer, sampleRateHz: number): Promise<void>;
  /** Halt current playback, if any. */
  stop(): void;
  /** Reject with ResourceError when the player cannot run on this host. */
  probe(): Promise<void>;
}

export interface AplayPlayerConfig {
  /** Player binary (default: aplay). */
  command?: string;
  /** ALSA output device (-D). */
  device?: string;
}

export class AplayPlayer implements IAudioPlayer {
  private current: ChildProcess | null = null;
  private readonly command: string;

  constructor(private readonly config: AplayPlayerConfig = {}) {
    this.command = config.command ?? "aplay";
  }

  play(pcm: Buffer, sampleRateHz: number): Promise<void> {
    if (pcm.length === 0) return Promise.resolve();
    const args = ["-q", "-t", "raw", "-f", "S16_LE", "-c", "1", "-r", String(sampleRateHz)];
    if (this.config.device) args.push("-D", this.config.device);
    args.push("-");
    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: ["pipe", "ignore", "pipe"] });
      this.current = child;
      let stderr = "";
      child.stderr?.on("data", (buf: Buffer) => {
        stderr += buf.toString("utf8");
      });
      child.on("error", (err) => {
        if (this.current === child) this.current = null;
        reject(err);
      });
      child.on("close", (code, signal) => {
        if (this.current === child) this.current = null;
        // Killed by stop(): a normal, early end.
        if (code === 0 || signal !== null) {
          resolve();
          return;
        }
        reject(new Error(`${this.command} exited with code ${code}: ${stderr.trim()}`));
      });
      // EPIPE when stop() lands mid-write; close handles the outcome.
      child.stdin?.on("error", () => undefined);
      child.stdin?.end(pcm);
    });
  }

  stop(): void {
    const child = this.current;
    if (!child) return;
    this.current = null;
    child.kill("SIGTERM");
    logger.debug({ event: "PLAYER_STOPPED" }, "Playback halted");
  }

  probe(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.command, ["--version"], { stdio: "ignore" });
      child.on("error", (err) =>
        reject(new ResourceError(`Audio player '${this.command}' unavailable: ${err.message}`, "player"))
      );
      child.on("close", () => resolve());
    });
  }
}

/** Discards audio. For text mode, AUDIO_OUTPUT=none and tests. */
export class SilentPlayer implements IAudioPlayer {
  readonly played: number[] = [];

  async play(pcm: Buffer, _sampleRateHz: number): Promise<void> {
    this.played.push(pcm.length);
  }

  stop(): void {}

  async probe(): Promise<void> {}
}
