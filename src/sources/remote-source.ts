/**
 * Remote Source: base class for pluggable sources that drive playback
 * somewhere else (a streaming service, a network renderer).
 *
 * Subclasses implement the protected `*Playback` methods against their own
 * API. The public transport methods request exclusivity before playing and
 * report the resulting state through the SourceContext, so a subclass never
 * touches PlaybackInfo or the orchestrator directly.
 */

import { describeError } from "../core/logger.js";
import type { Logger } from "../core/logger.js";
import type {
  MediaSource,
  NavigationDirection,
  PlayerState,
  SourceContext,
  SourcePlayback,
} from "../types/index.js";

export abstract class RemoteSource implements MediaSource {
  readonly name: string;
  abstract readonly displayName: string;
  protected readonly context: SourceContext;
  protected readonly logger: Logger;

  constructor(context: SourceContext) {
    this.context = context;
    this.name = context.sourceName;
    this.logger = context.logger;
  }

  // ── Transport ────────────────────────────────────────────────────

  async play(args: readonly string[]): Promise<boolean> {
    if (!(await this.context.requestExclusivePlayback())) {
      this.logger.warn("Exclusive playback refused");
      return false;
    }
    return this.#report("PLAYING", await this.startPlayback(args));
  }

  async pause(args: readonly string[]): Promise<boolean> {
    return this.#report("PAUSED", await this.pausePlayback(args));
  }

  async stop(args: readonly string[]): Promise<boolean> {
    return this.#report("STOPPED", await this.stopPlayback(args));
  }

  async next(args: readonly string[]): Promise<boolean> {
    return this.#skip("next", args);
  }

  async prev(args: readonly string[]): Promise<boolean> {
    return this.#skip("prev", args);
  }

  async setVolume(level: number): Promise<boolean> {
    return this.applyVolume(level);
  }

  getCurrentPlayback(): Promise<SourcePlayback | null> {
    return this.fetchPlayback();
  }

  /** Stop whatever this source is playing. Failures are logged. */
  async onShutdown(): Promise<void> {
    try {
      await this.stopPlayback([]);
    } catch (err) {
      this.logger.warn({ err: describeError(err) }, "Failed to stop on shutdown");
    }
  }

  // ── Implemented by subclasses ────────────────────────────────────

  protected abstract startPlayback(args: readonly string[]): Promise<boolean>;
  protected abstract pausePlayback(args: readonly string[]): Promise<boolean>;
  protected abstract stopPlayback(args: readonly string[]): Promise<boolean>;

  /** What the remote end is playing, or null when it cannot tell. */
  protected abstract fetchPlayback(): Promise<SourcePlayback | null>;

  protected async skipTrack(direction: NavigationDirection, _args: readonly string[]): Promise<boolean> {
    this.logger.info({ direction }, `${this.displayName} cannot skip tracks`);
    return false;
  }

  protected async applyVolume(level: number): Promise<boolean> {
    this.logger.info({ level }, `${this.displayName} has no volume control`);
    return false;
  }

  // ── Internal ─────────────────────────────────────────────────────

  async #skip(direction: NavigationDirection, args: readonly string[]): Promise<boolean> {
    if (!(await this.skipTrack(direction, args))) return false;
    // The remote end picked the track; pull it into PlaybackInfo
    const playback = await this.fetchPlayback();
    if (playback) {
      this.context.updatePlaybackInfo({
        trackName: playback.trackName,
        artist: playback.artist ?? null,
        album: playback.album ?? null,
        position: playback.position,
        duration: playback.duration,
      });
    }
    return true;
  }

  #report(state: PlayerState, succeeded: boolean): boolean {
    if (succeeded) this.context.updatePlaybackInfo({ state });
    return succeeded;
  }
}
