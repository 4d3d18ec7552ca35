/**
 * Playback Orchestrator: owns the active-source pointer and keeps at most
 * one source producing sound.
 *
 * Every switch runs behind one mutex: check the outgoing source, stop (or
 * pause) it, poll briefly for confirmation, move the pointer, reset
 * PlaybackInfo. The same mutex serializes the local state machine, so the
 * command path and the watchdog can never leave two sources PLAYING.
 *
 * Every call into a source is bounded by the source call timeout. A source
 * that does not answer, or does not confirm it stopped, is logged and
 * switched away from regardless.
 */

import type { Clock, PlaybackInfoUpdate, PlayerState, SourcePlayback } from "../types/index.js";
import { SourceUnavailableError } from "./errors.js";
import { createLogger, describeError } from "./logger.js";
import type { Logger } from "./logger.js";
import { Mutex } from "./mutex.js";
import { TRACK_FIELDS } from "./playback-info.js";
import type { PlaybackInfoStore } from "./playback-info.js";
import type { SourceHandle, SourceRegistry, SourceReleaser } from "./source-registry.js";
import { TIMED_OUT, sleep, within } from "./timing.js";

export interface PlaybackOrchestratorOptions {
  registry: SourceRegistry;
  info: PlaybackInfoStore;
  /** Confirmation polls after stopping the outgoing source. Default: 5 */
  stopConfirmAttempts?: number;
  /** Delay between confirmation polls. Default: 100 */
  stopConfirmIntervalMs?: number;
  /** Maximum age of a remote source's report before it is queried again. Default: 2000 */
  remoteRefreshIntervalMs?: number;
  /** Longest wait for a source to answer a stop, pause or playback query. Default: 1000 */
  sourceCallTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/** Track fields of a remote report, as PlaybackInfo holds them. */
function reportFields(playback: SourcePlayback): PlaybackInfoUpdate {
  return {
    trackName: playback.trackName,
    artist: playback.artist ?? null,
    album: playback.album ?? null,
    position: playback.position,
    duration: playback.duration,
  };
}

export class PlaybackOrchestrator implements SourceReleaser {
  private active: string;
  private readonly mutex = new Mutex();
  /** When each remote source's report was last applied to PlaybackInfo */
  private readonly refreshedAt = new Map<string, number>();
  private readonly registry: SourceRegistry;
  private readonly info: PlaybackInfoStore;
  private readonly stopConfirmAttempts: number;
  private readonly stopConfirmIntervalMs: number;
  private readonly remoteRefreshIntervalMs: number;
  private readonly sourceCallTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: PlaybackOrchestratorOptions) {
    this.registry = options.registry;
    this.info = options.info;
    this.active = options.registry.localSourceName;
    this.stopConfirmAttempts = options.stopConfirmAttempts ?? 5;
    this.stopConfirmIntervalMs = options.stopConfirmIntervalMs ?? 100;
    this.remoteRefreshIntervalMs = options.remoteRefreshIntervalMs ?? 2_000;
    this.sourceCallTimeoutMs = options.sourceCallTimeoutMs ?? 1_000;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger("orchestrator");
  }

  get activeSource(): string {
    return this.active;
  }

  get localSourceName(): string {
    return this.registry.localSourceName;
  }

  isLocalActive(): boolean {
    return this.active === this.registry.localSourceName;
  }

  /** Run `fn` while holding the orchestrator's mutex. */
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(fn);
  }

  // ── Exclusivity ──────────────────────────────────────────────────

  /**
   * Make `name` the active source, stopping whatever else is playing.
   * Resolves false only when `name` is not a loaded source.
   */
  async ensureExclusive(name: string): Promise<boolean> {
    // Already active: nothing to serialize. This also lets a source ask for
    // exclusivity from inside one of its own operations while the lock is held.
    if (name === this.active) return true;
    return this.mutex.runExclusive(() => this.switchToLocked(name));
  }

  /** Check-then-switch body of ensureExclusive, for callers already holding the mutex. */
  async switchToLocked(name: string): Promise<boolean> {
    if (name === this.active) return true;

    const incoming = this.registry.get(name);
    if (!incoming) {
      const error = new SourceUnavailableError(name);
      this.logger.warn({ source: name }, error.message);
      return false;
    }

    const previous = this.active;
    await this.quiesceLocked(previous);

    this.active = name;
    this.refreshedAt.delete(name);
    const report = await this.initialReport(incoming);
    const state: PlayerState = report ? (report.state ?? (report.isPlaying ? "PLAYING" : "STOPPED")) : "STOPPED";
    const fields = report && name !== this.registry.localSourceName ? reportFields(report) : {};
    this.info.update({ source: name, ...TRACK_FIELDS, ...fields, state });
    if (report) this.refreshedAt.set(name, this.clock());
    this.logger.info({ previousSource: previous, newSource: name }, `Active source is now ${name}`);
    return true;
  }

  /**
   * Force `name` out of playback and fail over to the local source when it
   * is the active one. A paused source is stopped too. Called before a
   * source is unloaded.
   */
  async releaseSource(name: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.refreshedAt.delete(name);
      if (this.active !== name) return;
      await this.quiesceLocked(name, true);
      await this.switchToLocked(this.registry.localSourceName);
    });
  }

  /**
   * Point at `name` without stopping the current source. Used during
   * shutdown once playback has already been stopped.
   */
  async forceActive(name: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (this.active === name) return;
      const previous = this.active;
      this.active = name;
      this.info.update({ source: name, ...TRACK_FIELDS, state: "STOPPED" });
      this.logger.info({ previousSource: previous, newSource: name }, `Active source forced to ${name}`);
    });
  }

  // ── Playback reports ─────────────────────────────────────────────

  /**
   * Whether `handle` is producing sound, asked live. A source that cannot
   * report, reports nothing or does not answer in time falls back to
   * PlaybackInfo while it is active.
   */
  async isPlaying(handle: SourceHandle): Promise<boolean> {
    if (!handle.supports("queryPlayback")) {
      return handle.name === this.active && this.info.state === "PLAYING";
    }
    const playback = await this.readReport(handle);
    if (!playback) {
      return handle.name === this.active && this.info.state === "PLAYING";
    }
    return playback.isPlaying;
  }

  /**
   * Pull the active remote source's report into PlaybackInfo unless one was
   * applied within the refresh interval. The local source keeps PlaybackInfo
   * current itself.
   */
  async refreshActive(): Promise<void> {
    const name = this.active;
    if (name === this.registry.localSourceName) return;
    const handle = this.registry.get(name);
    if (!handle?.supports("queryPlayback")) return;
    const refreshedAt = this.refreshedAt.get(name);
    if (refreshedAt !== undefined && this.clock() - refreshedAt < this.remoteRefreshIntervalMs) return;

    const playback = await this.readReport(handle);
    // Skip stale data if the source changed while the report was in flight
    if (!playback || this.active !== name) return;
    this.info.update({
      ...reportFields(playback),
      state: playback.state ?? (playback.isPlaying ? "PLAYING" : "PAUSED"),
    });
    this.refreshedAt.set(name, this.clock());
  }

  // ── Internal ─────────────────────────────────────────────────────

  /**
   * Stop (or pause) `name` if it is playing, then poll for confirmation.
   * `force` skips the playing check.
   */
  private async quiesceLocked(name: string, force = false): Promise<void> {
    const handle = this.registry.get(name);
    if (!handle) return;
    if (!force && !(await this.isPlaying(handle))) return;

    const operation = handle.supports("stop") ? "stop" : handle.supports("pause") ? "pause" : null;
    if (!operation) {
      this.logger.warn({ source: name }, `${handle.displayName} cannot be stopped or paused`);
      return;
    }

    try {
      if ((await within(handle.invoke(operation), this.sourceCallTimeoutMs)) === TIMED_OUT) {
        this.logger.warn(
          { source: name, operation, timeoutMs: this.sourceCallTimeoutMs },
          `${handle.displayName} did not answer ${operation} in time`,
        );
      }
    } catch (err) {
      this.logger.warn({ source: name, operation, err: describeError(err) }, `Failed to ${operation} ${handle.displayName}`);
    }

    if (!(await this.confirmStopped(handle))) {
      this.logger.warn(
        { source: name, attempts: this.stopConfirmAttempts },
        `${handle.displayName} did not confirm it stopped; switching anyway`,
      );
    }
  }

  private async confirmStopped(handle: SourceHandle): Promise<boolean> {
    for (let attempt = 0; attempt <= this.stopConfirmAttempts; attempt++) {
      if (!(await this.isPlaying(handle))) return true;
      if (attempt < this.stopConfirmAttempts) await sleep(this.stopConfirmIntervalMs);
    }
    return false;
  }

  /** Report PlaybackInfo starts from when `handle` becomes active. */
  private async initialReport(handle: SourceHandle): Promise<SourcePlayback | null> {
    if (!handle.supports("queryPlayback")) return null;
    return (await this.readReport(handle)) ?? null;
  }

  /** `handle`'s live report. Resolves undefined when the source failed to answer in time. */
  private async readReport(handle: SourceHandle): Promise<SourcePlayback | null | undefined> {
    try {
      const playback = await within(handle.queryPlayback(), this.sourceCallTimeoutMs);
      if (playback === TIMED_OUT) {
        this.logger.warn(
          { source: handle.name, timeoutMs: this.sourceCallTimeoutMs },
          `${handle.displayName} did not report playback in time`,
        );
        return undefined;
      }
      return playback;
    } catch (err) {
      this.logger.warn({ source: handle.name, err: describeError(err) }, `Could not query ${handle.displayName}`);
      return undefined;
    }
  }
}
