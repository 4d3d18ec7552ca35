/**
 * Watchdog Loop: notices when the local engine finishes a track on its own
 * and advances to the next one.
 *
 * Each tick runs inside the orchestrator's lock and only acts while the local
 * source is active and PLAYING. An explicit stop moves the machine out of
 * PLAYING under the same lock, so an idle engine seen here is a natural end.
 * A track the engine is never seen playing is abandoned after a few idle
 * ticks and the machine stops.
 */

import type { Clock, LocalEngine } from "../types/index.js";
import { createLogger, describeError } from "./logger.js";
import type { Logger } from "./logger.js";
import type { PlaybackOrchestrator } from "./orchestrator.js";
import type { PlaybackInfoStore } from "./playback-info.js";
import type { PlayerStateMachine } from "./state-machine.js";
import { settlesWithin, sleep } from "./timing.js";

export interface WatchdogOptions {
  orchestrator: PlaybackOrchestrator;
  machine: PlayerStateMachine;
  engine: LocalEngine;
  info: PlaybackInfoStore;
  /** Default: 100 */
  intervalMs?: number;
  /** Minimum gap between POSITION_CHANGED reports. Default: 1000 */
  positionReportIntervalMs?: number;
  /** Idle ticks allowed before a new track is first seen playing. Default: 20 */
  startupTicks?: number;
  clock?: Clock;
  logger?: Logger;
}

export class WatchdogLoop {
  private running = false;
  private loop: Promise<void> | null = null;
  private observedGeneration = -1;
  private sawBusy = false;
  private idleTicks = 0;
  private lastReportAt = Number.NEGATIVE_INFINITY;
  private readonly orchestrator: PlaybackOrchestrator;
  private readonly machine: PlayerStateMachine;
  private readonly engine: LocalEngine;
  private readonly info: PlaybackInfoStore;
  private readonly intervalMs: number;
  private readonly positionReportIntervalMs: number;
  private readonly startupTicks: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: WatchdogOptions) {
    this.orchestrator = options.orchestrator;
    this.machine = options.machine;
    this.engine = options.engine;
    this.info = options.info;
    this.intervalMs = options.intervalMs ?? 100;
    this.positionReportIntervalMs = options.positionReportIntervalMs ?? 1_000;
    this.startupTicks = options.startupTicks ?? 20;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger("watchdog");
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  start(): void {
    if (this.loop) return;
    this.running = true;
    this.loop = this.run();
    this.logger.debug({ intervalMs: this.intervalMs }, "Watchdog started");
  }

  /** Clear the running flag. The loop exits after its current tick. */
  requestStop(): void {
    this.running = false;
  }

  /**
   * Wait up to `timeoutMs` for the loop to exit. Resolves false (and logs a
   * warning) when it did not.
   */
  async join(timeoutMs: number): Promise<boolean> {
    const loop = this.loop;
    if (!loop) return true;
    const exited = await settlesWithin(loop, timeoutMs);
    if (exited) {
      this.loop = null;
    } else {
      this.logger.warn({ timeoutMs }, "Watchdog did not stop in time; continuing shutdown");
    }
    return exited;
  }

  // ── Polling ──────────────────────────────────────────────────────

  /** One poll of the engine. Never rejects. */
  async tick(): Promise<void> {
    try {
      await this.orchestrator.runExclusive(() => this.inspect());
    } catch (err) {
      this.logger.error({ err: describeError(err) }, "Watchdog tick failed");
    }
  }

  private async run(): Promise<void> {
    while (this.running) {
      await this.tick();
      if (!this.running) break;
      await sleep(this.intervalMs);
    }
    this.logger.debug("Watchdog stopped");
  }

  private async inspect(): Promise<void> {
    if (!this.orchestrator.isLocalActive() || this.machine.state !== "PLAYING") return;

    // A new track started since the last tick
    if (this.machine.generation !== this.observedGeneration) {
      this.observedGeneration = this.machine.generation;
      this.sawBusy = false;
      this.idleTicks = 0;
    }

    if (this.engine.isBusy()) {
      this.sawBusy = true;
      this.reportPosition();
      return;
    }
    if (!this.sawBusy) {
      this.idleTicks++;
      if (this.idleTicks < this.startupTicks) return;
      this.logger.warn(
        { trackId: this.machine.track?.id ?? null, idleTicks: this.idleTicks },
        "Engine never started the track, stopping",
      );
      await this.machine.abandonTrack();
      return;
    }

    this.sawBusy = false;
    this.logger.info({ trackId: this.machine.track?.id ?? null }, "Track finished, advancing");
    await this.machine.handleTrackEnded();
  }

  private reportPosition(): void {
    const now = this.clock();
    if (now - this.lastReportAt < this.positionReportIntervalMs) return;
    this.lastReportAt = now;
    this.info.update({ position: this.machine.position(), duration: this.machine.duration });
  }
}
