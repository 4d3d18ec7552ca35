/**
 * Player: the orchestrator context. Builds every core component, wires
 * them together and is the one object the CLI and display code talk to.
 *
 * Transport commands run inside the orchestrator's lock: they go to the
 * local state machine while the local source is active and to the active
 * source's handle otherwise. Sources never see the player; each gets a
 * SourceContext bound to its own name.
 */

import type {
  Clock,
  LocalEngine,
  NavigationDirection,
  PlaybackInfo,
  PlaybackInfoUpdate,
  SourceContext,
  SourcePlaybackUpdate,
  SourceDescriptor,
  Track,
  TransportOperation,
} from "../types/index.js";
import { LocalSource } from "../sources/local-source.js";
import { resolveConfig } from "./config.js";
import type { PlayerConfig, PlayerConfigInput } from "./config.js";
import { EngineError, SourceUnavailableError, fail, ok, toEngineError } from "./errors.js";
import type { CommandResult } from "./errors.js";
import { EventBus } from "./event-bus.js";
import type { PlayerEventBus } from "./event-bus.js";
import { createLogger, describeError } from "./logger.js";
import type { Logger } from "./logger.js";
import { PlaybackOrchestrator } from "./orchestrator.js";
import { PlaybackInfoStore } from "./playback-info.js";
import { Playlist } from "./playlist.js";
import { SourceRegistry } from "./source-registry.js";
import type { AvailableSource } from "./source-registry.js";
import { PlayerStateMachine } from "./state-machine.js";
import { TIMED_OUT, settlesWithin, within } from "./timing.js";
import { TrackNavigator } from "./track-navigator.js";
import { WatchdogLoop } from "./watchdog.js";

export interface PlayerOptions {
  engine: LocalEngine;
  config?: PlayerConfigInput;
  /** Sources to make available. Which of them load is decided by the config. */
  sources?: SourceDescriptor[];
  /** Uniform [0, 1) source for shuffle. Default: Math.random */
  random?: () => number;
  clock?: Clock;
  logger?: Logger;
}

export interface LoadPlaylistOptions {
  name?: string;
  startIndex?: number;
}

export class Player {
  readonly config: PlayerConfig;
  readonly bus: PlayerEventBus;
  readonly registry: SourceRegistry;
  readonly orchestrator: PlaybackOrchestrator;
  readonly playlist: Playlist;
  readonly navigator: TrackNavigator;
  readonly machine: PlayerStateMachine;
  readonly watchdog: WatchdogLoop;
  private readonly info: PlaybackInfoStore;
  private readonly engine: LocalEngine;
  private readonly logger: Logger;
  private started = false;
  private shutdownTask: Promise<void> | null = null;

  constructor(options: PlayerOptions) {
    const config = resolveConfig(options.config ?? {});
    const logger = options.logger ?? createLogger("player");
    const childLogger = (component: string) => logger.child({ component });
    const clock = options.clock ?? Date.now;

    this.config = config;
    this.engine = options.engine;
    this.logger = logger;

    this.bus = new EventBus({
      queueLimit: config.subscriberQueueLimit,
      logger: childLogger("event-bus"),
    });
    this.info = new PlaybackInfoStore({
      bus: this.bus,
      source: config.localSourceName,
      volume: config.defaultVolume,
      clock,
    });
    this.registry = new SourceRegistry({
      bus: this.bus,
      localSourceName: config.localSourceName,
      shutdownTimeoutMs: config.shutdownTimeoutMs,
      logger: childLogger("source-registry"),
    });
    this.orchestrator = new PlaybackOrchestrator({
      registry: this.registry,
      info: this.info,
      stopConfirmAttempts: config.stopConfirmAttempts,
      stopConfirmIntervalMs: config.stopConfirmIntervalMs,
      remoteRefreshIntervalMs: config.remoteRefreshIntervalMs,
      sourceCallTimeoutMs: config.sourceCallTimeoutMs,
      clock,
      logger: childLogger("orchestrator"),
    });
    this.registry.setReleaser(this.orchestrator);

    this.playlist = new Playlist();
    this.navigator = new TrackNavigator(this.playlist, {
      shuffle: config.shuffle,
      random: options.random,
      logger: childLogger("navigator"),
    });
    this.machine = new PlayerStateMachine({
      engine: this.engine,
      navigator: this.navigator,
      info: this.info,
      isActive: () => this.orchestrator.isLocalActive(),
      clock,
      logger: childLogger("state-machine"),
    });
    this.registry.register(new LocalSource(config.localSourceName, this.machine));

    this.watchdog = new WatchdogLoop({
      orchestrator: this.orchestrator,
      machine: this.machine,
      engine: this.engine,
      info: this.info,
      intervalMs: config.watchdogIntervalMs,
      positionReportIntervalMs: config.positionReportIntervalMs,
      clock,
      logger: childLogger("watchdog"),
    });

    for (const descriptor of options.sources ?? []) {
      this.registry.discover(descriptor);
    }
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  /** Apply the initial volume, load the configured sources and start the watchdog. */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    await this.machine.setVolume(this.config.defaultVolume);
    const names = this.config.autoLoadPlugins
      ? this.registry.listAvailable().map((source) => source.name)
      : this.config.enabledPlugins;
    for (const name of names) {
      this.enableSource(name);
    }
    this.watchdog.start();
    this.logger.info({ sources: this.registry.listLoaded() }, "Player started");
  }

  /**
   * Stop playback, hand control back to the local source, notify every
   * source and wait (bounded) for the watchdog and the bus. Safe to call
   * more than once.
   */
  shutdown(): Promise<void> {
    this.shutdownTask ??= this.performShutdown();
    return this.shutdownTask;
  }

  // ── Transport ────────────────────────────────────────────────────

  play(args: readonly string[] = []): Promise<CommandResult> {
    return this.transport("play", args);
  }

  pause(args: readonly string[] = []): Promise<CommandResult> {
    return this.transport("pause", args);
  }

  stop(args: readonly string[] = []): Promise<CommandResult> {
    return this.transport("stop", args);
  }

  next(args: readonly string[] = []): Promise<CommandResult> {
    return this.transport("next", args);
  }

  prev(args: readonly string[] = []): Promise<CommandResult> {
    return this.transport("prev", args);
  }

  /** Make `name` exclusive, then play it. */
  playSource(name: string, args: readonly string[] = []): Promise<CommandResult> {
    return this.orchestrator.runExclusive(async () => {
      if (!(await this.orchestrator.switchToLocked(name))) {
        return fail(new SourceUnavailableError(name));
      }
      return this.dispatchLocked("play", args);
    });
  }

  /** Set the volume (clamped to 0–100) on the local engine and the active remote source. */
  setVolume(level: number): Promise<CommandResult> {
    const volume = Math.round(Math.min(Math.max(level, 0), 100));
    return this.orchestrator.runExclusive(async () => {
      let result = await this.machine.setVolume(volume);
      const active = this.orchestrator.activeSource;
      if (active !== this.registry.localSourceName) {
        const handle = this.registry.get(active);
        if (handle?.supports("setVolume")) {
          try {
            const applied = await within(handle.setVolume(volume), this.config.sourceCallTimeoutMs);
            if (applied === TIMED_OUT) {
              const message = `${handle.displayName} did not answer the volume change in time`;
              result = fail(new EngineError(message, { source: active, volume }));
            } else if (!applied) {
              result = fail(new EngineError(`${handle.displayName} refused the volume change`, { source: active, volume }));
            }
          } catch (err) {
            result = fail(toEngineError(err, `${handle.displayName} failed to set volume`, { source: active }));
          }
        }
      }
      this.info.update({ volume });
      return result;
    });
  }

  // ── Playlist ─────────────────────────────────────────────────────

  /** Replace the playlist, stopping local playback first. */
  loadPlaylist(tracks: Track[], options: LoadPlaylistOptions = {}): Promise<void> {
    return this.orchestrator.runExclusive(async () => {
      if (this.orchestrator.isLocalActive()) await this.machine.stop();
      this.playlist.replace(tracks, options.name ?? null);
      this.navigator.reset(options.startIndex ?? 0);
      this.machine.cue();
      this.logger.info({ name: options.name ?? null, tracks: tracks.length }, "Playlist loaded");
    });
  }

  appendTrack(track: Track): Promise<void> {
    return this.orchestrator.runExclusive(() => {
      this.playlist.append(track);
      this.navigator.refresh();
      this.machine.cue();
    });
  }

  /**
   * Remove the track at `index`. Removing the track under the cursor while
   * local playback is on stops it first. Resolves the removed track, or null.
   */
  removeTrack(index: number): Promise<Track | null> {
    return this.orchestrator.runExclusive(async () => {
      const current = this.navigator.cursor().current;
      if (index === current && this.orchestrator.isLocalActive() && this.machine.state !== "STOPPED") {
        await this.machine.stop();
      }
      const removed = this.playlist.removeAt(index);
      if (!removed) return null;
      this.navigator.trackRemoved(index);
      this.machine.cue();
      return removed;
    });
  }

  /** Flip shuffle mode. Returns the new setting. */
  toggleShuffle(): boolean {
    const enabled = !this.navigator.isShuffle();
    this.navigator.setShuffle(enabled);
    this.logger.info({ shuffle: enabled }, `Shuffle ${enabled ? "on" : "off"}`);
    return enabled;
  }

  // ── Sources ──────────────────────────────────────────────────────

  discoverSource(descriptor: SourceDescriptor): void {
    this.registry.discover(descriptor);
  }

  enableSource(name: string): boolean {
    return this.registry.load(name, this.createContext(name)) !== null;
  }

  disableSource(name: string): Promise<boolean> {
    return this.registry.unregister(name);
  }

  listSources(): AvailableSource[] {
    return this.registry.listAvailable();
  }

  // ── Core interface ───────────────────────────────────────────────

  /** Merge a source's own fields into PlaybackInfo. A `source` field is dropped. */
  updatePlaybackInfo(fields: SourcePlaybackUpdate): void {
    const { source, ...rest }: PlaybackInfoUpdate = fields;
    if (source !== undefined) {
      this.logger.warn({ source }, "Ignoring an attempt to set the active source through a playback update");
    }
    this.info.update(rest);
  }

  /** PlaybackInfo after a live refresh from the active source. */
  async getCurrentPlayback(): Promise<PlaybackInfo> {
    if (this.orchestrator.isLocalActive()) {
      if (this.machine.state === "PLAYING") {
        this.info.update({ position: this.machine.position() });
      }
    } else {
      await this.orchestrator.refreshActive();
    }
    return this.info.snapshot();
  }

  /** PlaybackInfo as it stands, without refreshing. */
  playbackInfo(): PlaybackInfo {
    return this.info.snapshot();
  }

  ensureExclusivePlayback(name: string): Promise<boolean> {
    return this.orchestrator.ensureExclusive(name);
  }

  navigateTrack(direction: NavigationDirection): Track | null {
    return this.navigator.navigate(direction);
  }

  // ── Internal ─────────────────────────────────────────────────────

  private transport(operation: TransportOperation, args: readonly string[]): Promise<CommandResult> {
    return this.orchestrator.runExclusive(() => this.dispatchLocked(operation, args));
  }

  /** Send `operation` to whichever source is active. Lock held. */
  private async dispatchLocked(operation: TransportOperation, args: readonly string[]): Promise<CommandResult> {
    const name = this.orchestrator.activeSource;
    if (name === this.registry.localSourceName) {
      return this.localCommand(operation);
    }

    const handle = this.registry.get(name);
    if (!handle) return fail(new SourceUnavailableError(name));
    try {
      const timeoutMs = this.config.sourceCallTimeoutMs;
      const done = await within(handle.invoke(operation, args), timeoutMs);
      if (done === TIMED_OUT) {
        const error = new EngineError(`${handle.displayName} did not answer ${operation} in time`, { source: name, operation });
        this.logger.warn({ source: name, operation, timeoutMs }, error.message);
        return fail(error);
      }
      if (done) return ok;
      const error = new EngineError(`${handle.displayName} could not ${operation}`, { source: name, operation });
      this.logger.warn({ source: name, operation }, error.message);
      return fail(error);
    } catch (err) {
      const error = toEngineError(err, `${handle.displayName} failed to ${operation}`, { source: name, operation });
      this.logger.warn({ source: name, operation, err: describeError(err) }, error.message);
      return fail(error);
    }
  }

  private localCommand(operation: TransportOperation): Promise<CommandResult> {
    switch (operation) {
      case "play":
        return this.machine.play();
      case "pause":
        return this.machine.pause();
      case "stop":
        return this.machine.stop();
      case "next":
        return this.machine.next();
      case "prev":
        return this.machine.prev();
    }
  }

  private createContext(name: string): SourceContext {
    const logger = this.logger.child({ source: name });
    return {
      sourceName: name,
      logger,
      updatePlaybackInfo: (fields) => {
        if (this.orchestrator.activeSource !== name) {
          logger.warn({ fields: Object.keys(fields) }, "Ignoring playback update from an inactive source");
          return;
        }
        this.updatePlaybackInfo(fields);
      },
      getCurrentPlayback: () => this.getCurrentPlayback(),
      requestExclusivePlayback: () => this.ensureExclusivePlayback(name),
      navigateTrack: (direction) => this.navigateTrack(direction),
    };
  }

  private async performShutdown(): Promise<void> {
    const timeoutMs = this.config.shutdownTimeoutMs;
    const local = this.registry.localSourceName;
    this.logger.info("Shutting down");

    this.watchdog.requestStop();
    const previous = this.orchestrator.activeSource;

    const stopped = await settlesWithin(
      this.orchestrator.runExclusive(() => this.stopForShutdown(previous)),
      timeoutMs,
    );
    if (!stopped) this.logger.warn({ source: previous, timeoutMs }, "Timed out stopping playback");

    // Local is active before any source hears about the shutdown
    if (!(await settlesWithin(this.orchestrator.forceActive(local), timeoutMs))) {
      this.logger.warn({ timeoutMs }, "Timed out switching back to the local source");
    }

    const handles = this.registry.all().filter((handle) => handle.supports("shutdown"));
    const ordered = [
      ...handles.filter((handle) => handle.name !== previous),
      ...handles.filter((handle) => handle.name === previous),
    ];
    for (const handle of ordered) {
      const notified = handle.shutdown().catch((err: unknown) => {
        this.logger.warn({ source: handle.name, err: describeError(err) }, `${handle.displayName} failed to shut down`);
      });
      if (!(await settlesWithin(notified, timeoutMs))) {
        this.logger.warn({ source: handle.name, timeoutMs }, `${handle.displayName} did not finish shutting down`);
      }
    }

    await this.watchdog.join(timeoutMs);
    if (!(await settlesWithin(this.bus.drain(), timeoutMs))) {
      this.logger.warn({ timeoutMs }, "Event deliveries still pending at shutdown");
    }

    try {
      await this.engine.dispose?.();
    } catch (err) {
      this.logger.warn({ err: describeError(err) }, "Failed to dispose the local engine");
    }
    this.logger.info("Player shut down");
  }

  /** Stop whatever is playing. Failures are warnings. Lock held. */
  private async stopForShutdown(name: string): Promise<void> {
    if (name === this.registry.localSourceName) {
      const result = await this.machine.stop();
      if (!result.ok) this.logger.warn({ err: result.error.toJSON() }, "Failed to stop the local engine");
      return;
    }
    const handle = this.registry.get(name);
    if (!handle?.supports("stop")) return;
    try {
      const timeoutMs = this.config.sourceCallTimeoutMs;
      if ((await within(handle.invoke("stop"), timeoutMs)) === TIMED_OUT) {
        this.logger.warn({ source: name, timeoutMs }, `${handle.displayName} did not answer stop in time`);
      }
    } catch (err) {
      this.logger.warn({ source: name, err: describeError(err) }, `Failed to stop ${handle.displayName}`);
    }
  }
}
