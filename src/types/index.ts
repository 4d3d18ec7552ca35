// ── Domain types ─────────────────────────────────────────────────────
// Shared by the orchestration core, the sources and the display layer.

import type { Logger } from "pino";

/** Player state. Exactly one value is globally active per player. */
export type PlayerState = "STOPPED" | "PLAYING" | "PAUSED";

export type NavigationDirection = "next" | "prev";

/** A value a source may return synchronously or from a remote call. */
export type MaybePromise<T> = T | Promise<T>;

/** A playable entry in a playlist. */
export interface Track {
  /** Stable identifier, the file path for local media */
  id: string;
  /** Display name (e.g. the file's base name) */
  title: string;
  /** Location handed to the engine */
  uri: string;
  artist?: string;
  album?: string;
  genre?: string;
  /** Duration in seconds, when known ahead of playback */
  duration?: number;
}

/**
 * The single shared playback record. Read by display code, written only
 * through PlaybackInfoStore.update().
 */
export interface PlaybackInfo {
  /** Name of the active source */
  source: string;
  trackId: string | null;
  trackName: string | null;
  artist: string | null;
  album: string | null;
  genre: string | null;
  /** Elapsed seconds */
  position: number;
  /** Track length in seconds, 0 when unknown */
  duration: number;
  state: PlayerState;
  /** 0–100 */
  volume: number;
  /** Epoch milliseconds of the last update */
  updatedAt: number;
}

/** Fields a writer may merge into PlaybackInfo. `updatedAt` is stamped by the store. */
export type PlaybackInfoUpdate = Partial<Omit<PlaybackInfo, "updatedAt">>;

/** What a source may write about its own playback. The active source is the orchestrator's to set. */
export type SourcePlaybackUpdate = Omit<PlaybackInfoUpdate, "source">;

// ── Events ───────────────────────────────────────────────────────────

export const STATE_CHANGED = "state_changed";
export const SOURCE_CHANGED = "source_changed";
export const TRACK_CHANGED = "track_changed";
export const POSITION_CHANGED = "position_changed";
export const VOLUME_CHANGED = "volume_changed";

export interface StateChangedEvent {
  previousState: PlayerState;
  newState: PlayerState;
  source: string;
}

export interface SourceChangedEvent {
  previousSource: string;
  newSource: string;
}

export interface TrackChangedEvent {
  previousTrack: string | null;
  newTrack: string | null;
}

export interface PositionChangedEvent {
  position: number;
  duration: number;
}

export interface VolumeChangedEvent {
  previousVolume: number;
  newVolume: number;
}

/** Payload shape per event type. */
export interface PlayerEvents {
  [STATE_CHANGED]: StateChangedEvent;
  [SOURCE_CHANGED]: SourceChangedEvent;
  [TRACK_CHANGED]: TrackChangedEvent;
  [POSITION_CHANGED]: PositionChangedEvent;
  [VOLUME_CHANGED]: VolumeChangedEvent;
}

export type PlayerEventType = keyof PlayerEvents;

// ── Sources ──────────────────────────────────────────────────────────

export type Capability =
  | "play"
  | "pause"
  | "stop"
  | "next"
  | "prev"
  | "setVolume"
  | "queryPlayback"
  | "shutdown";

/** Transport operations that take CLI-style arguments. */
export type TransportOperation = "play" | "pause" | "stop" | "next" | "prev";

/** What a source reports about its own playback. */
export interface SourcePlayback {
  trackName: string | null;
  artist?: string | null;
  album?: string | null;
  /** Seconds */
  position: number;
  /** Seconds */
  duration: number;
  isPlaying: boolean;
  /** Exact state, for sources that can tell PAUSED from STOPPED */
  state?: PlayerState;
}

/**
 * The contract every source implements. Every method is optional: the
 * registry records which ones exist when the source is registered and never
 * looks again.
 */
export interface MediaSource {
  readonly name: string;
  readonly displayName?: string;

  play?(args: readonly string[]): MaybePromise<boolean>;
  pause?(args: readonly string[]): MaybePromise<boolean>;
  stop?(args: readonly string[]): MaybePromise<boolean>;
  next?(args: readonly string[]): MaybePromise<boolean>;
  prev?(args: readonly string[]): MaybePromise<boolean>;
  /** Level 0–100 */
  setVolume?(level: number): MaybePromise<boolean>;
  getCurrentPlayback?(): MaybePromise<SourcePlayback | null>;

  onStateChanged?(event: StateChangedEvent): MaybePromise<void>;
  onTrackChanged?(event: TrackChangedEvent): MaybePromise<void>;
  onSourceChanged?(event: SourceChangedEvent): MaybePromise<void>;
  onVolumeChanged?(event: VolumeChangedEvent): MaybePromise<void>;
  onShutdown?(): MaybePromise<void>;
}

/**
 * The narrow interface a source receives instead of a reference to the
 * player. Bound to the source's own name.
 */
export interface SourceContext {
  readonly sourceName: string;
  /** Child logger bound to this source */
  readonly logger: Logger;
  /** Merge fields into PlaybackInfo. Ignored unless this source is active. */
  updatePlaybackInfo(fields: SourcePlaybackUpdate): void;
  getCurrentPlayback(): Promise<PlaybackInfo>;
  /** Make this source the active one, stopping whatever else is playing. */
  requestExclusivePlayback(): Promise<boolean>;
  navigateTrack(direction: NavigationDirection): Track | null;
}

/** A discoverable, not yet instantiated source. */
export interface SourceDescriptor {
  name: string;
  displayName?: string;
  create(context: SourceContext): MediaSource;
}

// ── Local engine ─────────────────────────────────────────────────────

/**
 * The audio output behind the local source. Implementations resolve `false`
 * (or throw) when they cannot carry out a command.
 */
export interface LocalEngine {
  /** Start playing `track` from the beginning. */
  play(track: Track): MaybePromise<boolean>;
  pause(): MaybePromise<boolean>;
  resume(): MaybePromise<boolean>;
  stop(): MaybePromise<boolean>;
  /** True while the engine is producing audio for the current track. */
  isBusy(): boolean;
  /** Level 0–100 */
  setVolume(level: number): MaybePromise<void>;
  /** Track length in seconds when the engine can tell. */
  getDuration?(track: Track): MaybePromise<number | null>;
  dispose?(): MaybePromise<void>;
}

/** Milliseconds since the epoch. Injected so tests control time. */
export type Clock = () => number;
