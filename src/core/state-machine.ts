/**
 * Player State Machine: STOPPED / PLAYING / PAUSED over the local engine.
 *
 * Commands are delegated to the handler for the current state (see
 * player-states.ts). Every command resolves to a CommandResult; failures are
 * logged and returned, never thrown.
 *
 * The machine takes no lock of its own. Callers run commands inside the
 * orchestrator's `runExclusive` so the command path and the watchdog cannot
 * interleave a transition.
 */

import type {
  Clock,
  LocalEngine,
  NavigationDirection,
  PlaybackInfoUpdate,
  PlayerState,
  SourcePlayback,
  Track,
} from "../types/index.js";
import { EngineError, fail, ok, toEngineError } from "./errors.js";
import type { CommandResult } from "./errors.js";
import { createLogger, describeError } from "./logger.js";
import type { Logger } from "./logger.js";
import type { PlaybackInfoStore } from "./playback-info.js";
import { PLAYER_STATES } from "./player-states.js";
import type { StateContext } from "./player-states.js";
import type { TrackNavigator } from "./track-navigator.js";

export interface PlayerStateMachineOptions {
  engine: LocalEngine;
  navigator: TrackNavigator;
  info: PlaybackInfoStore;
  /** Whether the local source is the active one; PlaybackInfo is only written while it is. Default: always */
  isActive?: () => boolean;
  clock?: Clock;
  logger?: Logger;
}

/** Start baseline and pause mark, in clock milliseconds. */
interface PlaybackTiming {
  startedAt: number | null;
  pausedAt: number | null;
  /** Seconds, 0 when unknown */
  duration: number;
}

/** PlaybackInfo fields describing `track`. */
export function trackFields(track: Track | null): PlaybackInfoUpdate {
  return {
    trackId: track?.id ?? null,
    trackName: track?.title ?? null,
    artist: track?.artist ?? null,
    album: track?.album ?? null,
    genre: track?.genre ?? null,
  };
}

export class PlayerStateMachine {
  private current: PlayerState = "STOPPED";
  private loaded: Track | null = null;
  private generationCount = 0;
  private readonly timing: PlaybackTiming = { startedAt: null, pausedAt: null, duration: 0 };
  private readonly engine: LocalEngine;
  private readonly navigator: TrackNavigator;
  private readonly info: PlaybackInfoStore;
  private readonly isActive: () => boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly context: StateContext;

  constructor(options: PlayerStateMachineOptions) {
    this.engine = options.engine;
    this.navigator = options.navigator;
    this.info = options.info;
    this.isActive = options.isActive ?? (() => true);
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger("state-machine");
    this.context = {
      engine: this.engine,
      navigator: this.navigator,
      startTrack: (track) => this.startTrack(track),
      enterPaused: () => this.enterPaused(),
      enterResumed: () => this.enterResumed(),
      enterStopped: () => this.enterStopped(),
      stage: (track) => this.stage(track),
    };
  }

  // ── Queries ──────────────────────────────────────────────────────

  get state(): PlayerState {
    return this.current;
  }

  /** The track playing, paused or staged. */
  get track(): Track | null {
    return this.loaded;
  }

  /** Incremented every time a track starts; lets the watchdog tell tracks apart. */
  get generation(): number {
    return this.generationCount;
  }

  /** Elapsed seconds of the loaded track, excluding time spent paused. */
  position(): number {
    const { startedAt, pausedAt, duration } = this.timing;
    if (startedAt === null) return 0;
    const until = this.current === "PAUSED" && pausedAt !== null ? pausedAt : this.clock();
    const elapsed = Math.max(0, (until - startedAt) / 1000);
    return duration > 0 ? Math.min(elapsed, duration) : elapsed;
  }

  get duration(): number {
    return this.timing.duration;
  }

  /** Live report for the orchestrator: the engine's busy flag plus the machine's state. */
  report(): SourcePlayback {
    const busy = this.engine.isBusy();
    return {
      trackName: this.loaded?.title ?? null,
      artist: this.loaded?.artist ?? null,
      album: this.loaded?.album ?? null,
      position: this.position(),
      duration: this.timing.duration,
      // A paused engine stays alive but is silent
      isPlaying: busy && this.current !== "PAUSED",
      state: this.current,
    };
  }

  // ── Commands ─────────────────────────────────────────────────────

  play(): Promise<CommandResult> {
    return this.run("play", () => PLAYER_STATES[this.current].play(this.context));
  }

  pause(): Promise<CommandResult> {
    return this.run("pause", () => PLAYER_STATES[this.current].pause(this.context));
  }

  stop(): Promise<CommandResult> {
    return this.run("stop", () => PLAYER_STATES[this.current].stop(this.context));
  }

  next(): Promise<CommandResult> {
    return this.run("next", () => PLAYER_STATES[this.current].navigate(this.context, "next"));
  }

  prev(): Promise<CommandResult> {
    return this.run("prev", () => PLAYER_STATES[this.current].navigate(this.context, "prev"));
  }

  navigate(direction: NavigationDirection): Promise<CommandResult> {
    return direction === "next" ? this.next() : this.prev();
  }

  /**
   * The engine finished the track by itself: PLAYING → STOPPED, advance the
   * cursor, play what it lands on.
   */
  handleTrackEnded(): Promise<CommandResult> {
    return this.run("auto-advance", async () => {
      if (this.current !== "PLAYING") return ok;
      this.enterStopped();
      const track = this.navigator.navigate("next");
      if (!track) return ok;
      return this.startTrack(track);
    });
  }

  /** The engine went idle without ever being seen playing the loaded track. */
  abandonTrack(): Promise<CommandResult> {
    return this.run("abandon", async () => {
      if (this.current !== "PLAYING") return ok;
      const track = this.loaded;
      this.enterStopped();
      const title = track?.title ?? "The track";
      return fail(new EngineError(`${title} stopped before it was heard`, { trackId: track?.id ?? null }));
    });
  }

  async setVolume(level: number): Promise<CommandResult> {
    try {
      await this.engine.setVolume(level);
      return ok;
    } catch (err) {
      const error = toEngineError(err, "Engine failed to set volume", { level });
      this.logger.warn({ err: describeError(err), level }, error.message);
      return fail(error);
    }
  }

  /** Stage the track under the cursor while STOPPED, e.g. after the playlist changed. */
  cue(): void {
    if (this.current !== "STOPPED") return;
    const track = this.navigator.currentTrack();
    if (track) {
      this.stage(track);
    } else {
      this.loaded = null;
      this.timing.duration = 0;
      this.commit({ position: 0 });
    }
  }

  // ── Transitions ──────────────────────────────────────────────────

  private async startTrack(track: Track): Promise<CommandResult> {
    let started: boolean;
    try {
      started = await this.engine.play(track);
    } catch (err) {
      return fail(toEngineError(err, `Could not play ${track.title}`, { trackId: track.id }));
    }
    if (!started) {
      return fail(new EngineError(`Could not play ${track.title}`, { trackId: track.id }));
    }

    this.generationCount++;
    this.loaded = track;
    this.timing.startedAt = this.clock();
    this.timing.pausedAt = null;
    this.timing.duration = await this.resolveDuration(track);
    this.current = "PLAYING";
    this.commit({ position: 0 });
    this.logger.info({ trackId: track.id, generation: this.generationCount }, `Playing ${track.title}`);
    return ok;
  }

  private enterPaused(): void {
    this.timing.pausedAt = this.clock();
    this.current = "PAUSED";
    this.commit({});
  }

  private enterResumed(): void {
    const { startedAt, pausedAt } = this.timing;
    if (startedAt !== null && pausedAt !== null) {
      this.timing.startedAt = startedAt + (this.clock() - pausedAt);
    }
    this.timing.pausedAt = null;
    this.current = "PLAYING";
    this.commit({});
  }

  private enterStopped(): void {
    this.timing.startedAt = null;
    this.timing.pausedAt = null;
    this.current = "STOPPED";
    this.commit({ position: 0 });
  }

  private stage(track: Track): void {
    this.loaded = track;
    this.timing.duration = track.duration ?? 0;
    this.commit({ position: 0 });
  }

  private commit(fields: PlaybackInfoUpdate): void {
    if (!this.isActive()) return;
    this.info.update({
      ...trackFields(this.loaded),
      position: this.position(),
      duration: this.timing.duration,
      state: this.current,
      ...fields,
    });
  }

  private async resolveDuration(track: Track): Promise<number> {
    if (track.duration !== undefined) return track.duration;
    if (!this.engine.getDuration) return 0;
    try {
      return (await this.engine.getDuration(track)) ?? 0;
    } catch (err) {
      this.logger.debug({ trackId: track.id, err: describeError(err) }, "Could not read track duration");
      return 0;
    }
  }

  private async run(command: string, fn: () => Promise<CommandResult>): Promise<CommandResult> {
    const from = this.current;
    const result = await fn();
    if (!result.ok) {
      this.logger.warn(
        { command, state: from, code: result.error.code, context: result.error.context },
        result.error.message,
      );
    }
    return result;
  }
}
