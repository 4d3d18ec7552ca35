import { describe, it, expect, beforeEach } from "vitest";
import { EventBus } from "./event-bus.js";
import { PlaybackInfoStore, TRACK_FIELDS } from "./playback-info.js";
import { FakeClock, recordEvents } from "../../test/helpers/fakes.js";
import type { PlayerEvents } from "../types/index.js";

describe("PlaybackInfoStore", () => {
  let bus: EventBus<PlayerEvents>;
  let clock: FakeClock;
  let store: PlaybackInfoStore;
  let recorder: ReturnType<typeof recordEvents>;

  beforeEach(() => {
    bus = new EventBus();
    clock = new FakeClock();
    store = new PlaybackInfoStore({ bus, source: "local", volume: 50, clock: clock.clock });
    recorder = recordEvents(bus);
  });

  it("starts stopped on the given source with no track", () => {
    expect(store.snapshot()).toEqual({
      source: "local",
      ...TRACK_FIELDS,
      state: "STOPPED",
      volume: 50,
      updatedAt: clock.now,
    });
  });

  it("returns copies that later updates do not touch", () => {
    const before = store.snapshot();
    store.update({ trackName: "Song" });
    expect(before.trackName).toBeNull();
  });

  it("publishes one event per changed aspect, in a fixed order", async () => {
    store.update({
      source: "radio",
      state: "PLAYING",
      trackName: "Song",
      position: 3,
      duration: 200,
      volume: 60,
    });
    await bus.drain();

    expect(recorder.events.map((event) => event.type)).toEqual([
      "source_changed",
      "state_changed",
      "track_changed",
      "position_changed",
      "volume_changed",
    ]);
    expect(recorder.of("source_changed")).toEqual([{ previousSource: "local", newSource: "radio" }]);
    expect(recorder.of("state_changed")).toEqual([
      { previousState: "STOPPED", newState: "PLAYING", source: "radio" },
    ]);
    expect(recorder.of("track_changed")).toEqual([{ previousTrack: null, newTrack: "Song" }]);
    expect(recorder.of("position_changed")).toEqual([{ position: 3, duration: 200 }]);
    expect(recorder.of("volume_changed")).toEqual([{ previousVolume: 50, newVolume: 60 }]);
  });

  it("publishes nothing when no field changes", async () => {
    store.update({ state: "STOPPED", source: "local" });
    await bus.drain();
    expect(recorder.events).toEqual([]);
  });

  it("skips undefined fields", () => {
    store.update({ trackName: "Song" });
    store.update({ trackName: undefined, artist: "Artist" });
    expect(store.snapshot().trackName).toBe("Song");
    expect(store.snapshot().artist).toBe("Artist");
  });

  it("detects a track change by id when two tracks share a title", async () => {
    store.update({ trackId: "/a/intro.flac", trackName: "Intro" });
    store.update({ trackId: "/b/intro.flac", trackName: "Intro" });
    await bus.drain();

    expect(recorder.of("track_changed")).toEqual([
      { previousTrack: null, newTrack: "Intro" },
      { previousTrack: "Intro", newTrack: "Intro" },
    ]);
  });

  it("does not report clearing the track as a track change", async () => {
    store.update({ trackName: "Song" });
    store.update({ ...TRACK_FIELDS });
    await bus.drain();
    expect(recorder.of("track_changed")).toHaveLength(1);
  });

  it("never moves updatedAt backwards while playing", () => {
    store.update({ state: "PLAYING" });
    const playingSince = store.snapshot().updatedAt;

    clock.advance(-5_000);
    store.update({ position: 1 });
    expect(store.snapshot().updatedAt).toBe(playingSince);

    clock.advance(10_000);
    store.update({ position: 2 });
    expect(store.snapshot().updatedAt).toBe(playingSince + 5_000);
  });
});
