/**
 * Playback Info Store: owns the single PlaybackInfo record.
 *
 * `update()` is the only way to change it: it merges the given fields,
 * works out which of state, source, track, position and volume changed, and
 * publishes one event for each.
 */

import type { Clock, PlaybackInfo, PlaybackInfoUpdate } from "../types/index.js";
import {
  POSITION_CHANGED,
  SOURCE_CHANGED,
  STATE_CHANGED,
  TRACK_CHANGED,
  VOLUME_CHANGED,
} from "../types/index.js";
import type { PlayerEventBus } from "./event-bus.js";

export interface PlaybackInfoStoreOptions {
  bus: PlayerEventBus;
  source: string;
  volume?: number;
  clock?: Clock;
}

/** Fields cleared whenever the active source changes. */
export const TRACK_FIELDS = {
  trackId: null,
  trackName: null,
  artist: null,
  album: null,
  genre: null,
  position: 0,
  duration: 0,
} as const satisfies PlaybackInfoUpdate;

export class PlaybackInfoStore {
  private info: PlaybackInfo;
  private readonly bus: PlayerEventBus;
  private readonly clock: Clock;

  constructor(options: PlaybackInfoStoreOptions) {
    this.bus = options.bus;
    this.clock = options.clock ?? Date.now;
    this.info = {
      source: options.source,
      ...TRACK_FIELDS,
      state: "STOPPED",
      volume: options.volume ?? 70,
      updatedAt: this.clock(),
    };
  }

  /** A copy of the current record. */
  snapshot(): PlaybackInfo {
    return { ...this.info };
  }

  get state(): PlaybackInfo["state"] {
    return this.info.state;
  }

  get source(): string {
    return this.info.source;
  }

  /**
   * Merge `fields` into the record and publish what changed. Returns the
   * updated snapshot.
   */
  update(fields: PlaybackInfoUpdate): PlaybackInfo {
    const previous = this.info;
    const next: PlaybackInfo = { ...previous };
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined && key in next) {
        Object.assign(next, { [key]: value });
      }
    }

    // While playing, the timestamp never moves backwards
    const now = this.clock();
    next.updatedAt = next.state === "PLAYING" ? Math.max(previous.updatedAt, now) : now;
    this.info = next;

    this.publishChanges(previous, next);
    return this.snapshot();
  }

  private publishChanges(previous: PlaybackInfo, next: PlaybackInfo): void {
    if (previous.source !== next.source) {
      this.bus.publish(SOURCE_CHANGED, {
        previousSource: previous.source,
        newSource: next.source,
      });
    }

    if (previous.state !== next.state) {
      this.bus.publish(STATE_CHANGED, {
        previousState: previous.state,
        newState: next.state,
        source: next.source,
      });
    }

    // A track cleared on a source switch is not a track change
    const trackKey = (info: PlaybackInfo) => info.trackId ?? info.trackName;
    if (trackKey(next) !== null && trackKey(previous) !== trackKey(next)) {
      this.bus.publish(TRACK_CHANGED, {
        previousTrack: previous.trackName,
        newTrack: next.trackName,
      });
    }

    if (previous.position !== next.position || previous.duration !== next.duration) {
      this.bus.publish(POSITION_CHANGED, {
        position: next.position,
        duration: next.duration,
      });
    }

    if (previous.volume !== next.volume) {
      this.bus.publish(VOLUME_CHANGED, {
        previousVolume: previous.volume,
        newVolume: next.volume,
      });
    }
  }
}
