/**
 * In-process stand-ins shared by the tests: an engine, a clock, a remote
 * source and an event recorder. Nothing here spawns a process or opens a
 * socket.
 */

import { vi } from "vitest";
import type { EventBus } from "../../src/core/event-bus.js";
import { RemoteSource } from "../../src/sources/remote-source.js";
import {
  POSITION_CHANGED,
  SOURCE_CHANGED,
  STATE_CHANGED,
  TRACK_CHANGED,
  VOLUME_CHANGED,
} from "../../src/types/index.js";
import type {
  Clock,
  LocalEngine,
  PlayerEvents,
  PlayerEventType,
  SourceContext,
  SourceDescriptor,
  SourcePlayback,
  Track,
} from "../../src/types/index.js";
import { logger } from "../../src/core/logger.js";
import tracksFixture from "../fixtures/tracks.json" with { type: "json" };

export const fixtureTracks: Track[] = tracksFixture;

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
  return { id, title: id, uri: `/music/${id}.flac`, ...overrides };
}

// ── Clock ────────────────────────────────────────────────────────────

export class FakeClock {
  now = 1_700_000_000_000;
  readonly clock: Clock = () => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

// ── Engine ───────────────────────────────────────────────────────────

export class FakeEngine implements LocalEngine {
  busy = false;
  paused = false;
  current: Track | null = null;
  volume: number | null = null;
  disposed = false;
  readonly calls: string[] = [];
  /** Value `play` resolves with */
  playResult = true;
  playError: Error | null = null;
  stopError: Error | null = null;
  busyError: Error | null = null;
  /** Runs inside `stop`, before the engine goes idle */
  onStop: (() => void) | null = null;

  play(track: Track): boolean {
    this.calls.push(`play:${track.id}`);
    if (this.playError) throw this.playError;
    if (!this.playResult) return false;
    this.current = track;
    this.busy = true;
    this.paused = false;
    return true;
  }

  pause(): boolean {
    this.calls.push("pause");
    this.paused = true;
    return true;
  }

  resume(): boolean {
    this.calls.push("resume");
    this.paused = false;
    return true;
  }

  stop(): boolean {
    this.calls.push("stop");
    this.onStop?.();
    if (this.stopError) throw this.stopError;
    this.busy = false;
    this.paused = false;
    this.current = null;
    return true;
  }

  isBusy(): boolean {
    if (this.busyError) throw this.busyError;
    return this.busy;
  }

  setVolume(level: number): void {
    this.volume = level;
  }

  dispose(): void {
    this.disposed = true;
  }

  /** The file ran out. */
  finish(): void {
    this.busy = false;
  }
}

// ── Remote source ────────────────────────────────────────────────────

export class FakeRemoteSource extends RemoteSource {
  readonly displayName: string;
  playing = false;
  paused = false;
  trackName = "Remote Song";
  volume: number | null = null;
  readonly calls: string[] = [];
  /** Playback queries that still report PLAYING after a stop */
  stopLag = 0;
  /** Ignore stop requests altogether */
  stuck = false;

  constructor(context: SourceContext, displayName = "Fake Remote") {
    super(context);
    this.displayName = displayName;
  }

  protected async startPlayback(args: readonly string[]): Promise<boolean> {
    this.calls.push(`play:${args.join(" ")}`);
    this.playing = true;
    this.paused = false;
    return true;
  }

  protected async pausePlayback(): Promise<boolean> {
    this.calls.push("pause");
    this.paused = true;
    return true;
  }

  protected async stopPlayback(): Promise<boolean> {
    this.calls.push("stop");
    if (this.stuck) return true;
    if (this.stopLag === 0) this.playing = false;
    return true;
  }

  protected async skipTrack(direction: "next" | "prev"): Promise<boolean> {
    this.calls.push(direction);
    this.trackName = direction === "next" ? "Remote Next" : "Remote Prev";
    return true;
  }

  protected async applyVolume(level: number): Promise<boolean> {
    this.volume = level;
    return true;
  }

  protected async fetchPlayback(): Promise<SourcePlayback | null> {
    this.calls.push("query");
    if (this.stopLag > 0 && this.calls.includes("stop")) {
      this.stopLag--;
      if (this.stopLag === 0) this.playing = false;
      return this.snapshot(true);
    }
    return this.snapshot(this.playing && !this.paused);
  }

  private snapshot(isPlaying: boolean): SourcePlayback {
    return {
      trackName: this.trackName,
      artist: "Remote Artist",
      album: null,
      position: 12,
      duration: 300,
      isPlaying,
    };
  }
}

/** A descriptor for a FakeRemoteSource, plus access to the instance once loaded. */
export function fakeRemote(name: string): { descriptor: SourceDescriptor; readonly source: FakeRemoteSource } {
  let instance: FakeRemoteSource | null = null;
  return {
    descriptor: {
      name,
      displayName: `Fake ${name}`,
      create: (context) => {
        instance = new FakeRemoteSource(context, `Fake ${name}`);
        return instance;
      },
    },
    get source(): FakeRemoteSource {
      if (!instance) throw new Error(`${name} was never loaded`);
      return instance;
    },
  };
}

/** A SourceContext backed by mocks, for testing a source on its own. */
export function mockContext(sourceName: string) {
  return {
    sourceName,
    logger: logger.child({ source: sourceName }),
    updatePlaybackInfo: vi.fn(),
    getCurrentPlayback: vi.fn(),
    requestExclusivePlayback: vi.fn(async () => true),
    navigateTrack: vi.fn(() => null),
  } satisfies SourceContext;
}

// ── Events ───────────────────────────────────────────────────────────

export interface RecordedEvent<K extends PlayerEventType = PlayerEventType> {
  type: K;
  payload: PlayerEvents[K];
}

/** Subscribe to every event type and collect deliveries in order. */
export function recordEvents(bus: EventBus<PlayerEvents>) {
  const events: RecordedEvent[] = [];
  const listen = <K extends PlayerEventType>(type: K) => {
    bus.subscribe(type, (payload) => {
      events.push({ type, payload });
    });
  };
  listen(STATE_CHANGED);
  listen(SOURCE_CHANGED);
  listen(TRACK_CHANGED);
  listen(POSITION_CHANGED);
  listen(VOLUME_CHANGED);

  return {
    events,
    /** Payloads of one event type, in delivery order. */
    of<K extends PlayerEventType>(type: K): PlayerEvents[K][] {
      const payloads: PlayerEvents[K][] = [];
      for (const event of events) {
        if (isType(event, type)) payloads.push(event.payload);
      }
      return payloads;
    },
  };
}

function isType<K extends PlayerEventType>(event: RecordedEvent, type: K): event is RecordedEvent<K> {
  return event.type === type;
}
