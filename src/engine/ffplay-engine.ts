/**
 * Ffplay Engine: plays local files through an `ffplay` child process.
 *
 * One process per track, started with `-nodisp -autoexit` so it exits by
 * itself at the end of the file. Pause and resume stop and continue the
 * process; the engine is busy for as long as the process is alive.
 */

import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { once } from "node:events";
import { EngineError } from "../core/errors.js";
import { createLogger, describeError } from "../core/logger.js";
import type { Logger } from "../core/logger.js";
import type { LocalEngine, Track } from "../types/index.js";

export interface FfplayEngineOptions {
  /** Default: "ffplay" on PATH */
  binary?: string;
  /** Initial volume, 0–100. Default: 70 */
  volume?: number;
  logger?: Logger;
}

export class FfplayEngine implements LocalEngine {
  private child: ChildProcess | null = null;
  private volume: number;
  private readonly binary: string;
  private readonly logger: Logger;

  constructor(options: FfplayEngineOptions = {}) {
    this.binary = options.binary ?? "ffplay";
    this.volume = clampVolume(options.volume ?? 70);
    this.logger = options.logger ?? createLogger("ffplay");
  }

  /** Arguments passed to ffplay for `track`. */
  argsFor(track: Track): string[] {
    return ["-nodisp", "-autoexit", "-loglevel", "quiet", "-volume", String(this.volume), track.uri];
  }

  async play(track: Track): Promise<boolean> {
    this.terminate();

    const child = spawn(this.binary, this.argsFor(track), { stdio: "ignore" });
    try {
      await once(child, "spawn");
    } catch (err) {
      const message = isMissingBinary(err)
        ? `${this.binary} not found; install ffmpeg to enable local playback`
        : `Could not start ${this.binary}`;
      throw new EngineError(message, { binary: this.binary, uri: track.uri }, err);
    }

    child.on("exit", (code, signal) => {
      this.logger.debug({ code, signal, uri: track.uri }, "ffplay exited");
      if (this.child === child) this.child = null;
    });
    child.on("error", (err) => {
      this.logger.warn({ err: describeError(err), uri: track.uri }, "ffplay process error");
    });
    this.child = child;
    return true;
  }

  pause(): boolean {
    return this.child?.kill("SIGSTOP") ?? false;
  }

  resume(): boolean {
    return this.child?.kill("SIGCONT") ?? false;
  }

  stop(): boolean {
    this.terminate();
    return true;
  }

  isBusy(): boolean {
    const child = this.child;
    return child !== null && child.exitCode === null && child.signalCode === null;
  }

  /** Takes effect from the next track; ffplay has no volume control over stdin. */
  setVolume(level: number): void {
    this.volume = clampVolume(level);
  }

  dispose(): void {
    this.terminate();
  }

  private terminate(): void {
    const child = this.child;
    if (!child) return;
    this.child = null;
    // A stopped process only acts on SIGTERM once continued
    child.kill("SIGCONT");
    child.kill("SIGTERM");
  }
}

function clampVolume(level: number): number {
  return Math.round(Math.min(Math.max(level, 0), 100));
}

function isMissingBinary(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
