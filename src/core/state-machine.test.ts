import { describe, it, expect, beforeEach } from "vitest";
import { EngineError, NavigationError, TransitionError } from "./errors.js";
import type { CommandResult } from "./errors.js";
import { EventBus } from "./event-bus.js";
import { PlaybackInfoStore } from "./playback-info.js";
import { Playlist } from "./playlist.js";
import { PlayerStateMachine } from "./state-machine.js";
import { TrackNavigator } from "./track-navigator.js";
import { STATE_CHANGED, TRACK_CHANGED } from "../types/index.js";
import type { PlayerEvents } from "../types/index.js";
import { FakeClock, FakeEngine, makeTrack, recordEvents } from "../../test/helpers/fakes.js";

function errorOf(result: CommandResult) {
  if (result.ok) throw new Error("expected the command to fail");
  return result.error;
}

describe("PlayerStateMachine", () => {
  let bus: EventBus<PlayerEvents>;
  let clock: FakeClock;
  let info: PlaybackInfoStore;
  let engine: FakeEngine;
  let playlist: Playlist;
  let machine: PlayerStateMachine;
  let recorder: ReturnType<typeof recordEvents>;

  beforeEach(() => {
    bus = new EventBus();
    clock = new FakeClock();
    info = new PlaybackInfoStore({ bus, source: "local", clock: clock.clock });
    engine = new FakeEngine();
    playlist = new Playlist([makeTrack("a"), makeTrack("b"), makeTrack("c")]);
    machine = new PlayerStateMachine({
      engine,
      navigator: new TrackNavigator(playlist),
      info,
      clock: clock.clock,
    });
    recorder = recordEvents(bus);
  });

  // ── play ───────────────────────────────────────────────────────

  describe("play", () => {
    it("starts the track under the cursor", async () => {
      await expect(machine.play()).resolves.toEqual({ ok: true });

      expect(machine.state).toBe("PLAYING");
      expect(machine.generation).toBe(1);
      expect(engine.calls).toEqual(["play:a"]);
      expect(info.snapshot()).toMatchObject({
        trackId: "a",
        trackName: "a",
        position: 0,
        duration: 0,
        state: "PLAYING",
      });
    });

    it("is idempotent while playing", async () => {
      await machine.play();
      await expect(machine.play()).resolves.toEqual({ ok: true });
      await bus.drain();

      expect(engine.calls).toEqual(["play:a"]);
      expect(machine.generation).toBe(1);
      expect(recorder.of(STATE_CHANGED)).toEqual([
        { previousState: "STOPPED", newState: "PLAYING", source: "local" },
      ]);
    });

    it("fails on an empty playlist", async () => {
      playlist.clear();
      const error = errorOf(await machine.play());

      expect(error).toBeInstanceOf(NavigationError);
      expect(error.message).toBe("No tracks in playlist");
      expect(machine.state).toBe("STOPPED");
    });

    it("stays stopped when the engine refuses the track", async () => {
      engine.playResult = false;
      const error = errorOf(await machine.play());

      expect(error).toBeInstanceOf(EngineError);
      expect(error.message).toBe("Could not play a");
      expect(machine.state).toBe("STOPPED");
      expect(machine.generation).toBe(0);
      expect(info.state).toBe("STOPPED");
    });

    it("stays stopped when the engine throws", async () => {
      engine.playError = new Error("no output device");
      const error = errorOf(await machine.play());

      expect(error.message).toBe("Could not play a: no output device");
      expect(machine.state).toBe("STOPPED");
    });

    it("takes the duration from the track when it has one", async () => {
      playlist.replace([makeTrack("short", { duration: 3 })]);
      await machine.play();
      clock.advance(10_000);

      expect(machine.duration).toBe(3);
      expect(machine.position()).toBe(3);
    });
  });

  // ── pause and resume ───────────────────────────────────────────

  describe("pause", () => {
    it("freezes the position until resumed", async () => {
      await machine.play();
      clock.advance(5_000);

      await expect(machine.pause()).resolves.toEqual({ ok: true });
      expect(machine.state).toBe("PAUSED");
      expect(machine.position()).toBe(5);

      clock.advance(10_000);
      expect(machine.position()).toBe(5);

      await machine.play();
      expect(machine.state).toBe("PLAYING");
      expect(machine.position()).toBe(5);

      clock.advance(2_000);
      expect(machine.position()).toBe(7);
      expect(engine.calls).toEqual(["play:a", "pause", "resume"]);
    });

    it("is idempotent while paused", async () => {
      await machine.play();
      await machine.pause();
      await expect(machine.pause()).resolves.toEqual({ ok: true });
      expect(engine.calls).toEqual(["play:a", "pause"]);
    });

    it("is refused while stopped", async () => {
      const error = errorOf(await machine.pause());

      expect(error).toBeInstanceOf(TransitionError);
      expect(error.message).toBe("cannot pause: stopped");
      expect(engine.calls).toEqual([]);
    });

    it("reports a paused engine as not playing", async () => {
      await machine.play();
      await machine.pause();

      expect(machine.report()).toMatchObject({ trackName: "a", isPlaying: false, state: "PAUSED" });
    });
  });

  // ── stop ───────────────────────────────────────────────────────

  describe("stop", () => {
    it("stops the engine and clears the position", async () => {
      await machine.play();
      clock.advance(4_000);

      await expect(machine.stop()).resolves.toEqual({ ok: true });

      expect(machine.state).toBe("STOPPED");
      expect(machine.position()).toBe(0);
      expect(engine.busy).toBe(false);
      expect(info.snapshot()).toMatchObject({ state: "STOPPED", position: 0, trackId: "a" });
    });

    it("is a no-op while stopped", async () => {
      await expect(machine.stop()).resolves.toEqual({ ok: true });
      expect(engine.calls).toEqual([]);
    });

    it("ends up stopped even when the engine fails to stop", async () => {
      await machine.play();
      engine.stopError = new Error("jammed");

      const error = errorOf(await machine.stop());

      expect(error.message).toBe("Engine failed to stop: jammed");
      expect(machine.state).toBe("STOPPED");
    });
  });

  // ── next and prev ──────────────────────────────────────────────

  describe("navigation", () => {
    it("only moves the cursor while stopped", async () => {
      await expect(machine.next()).resolves.toEqual({ ok: true });

      expect(machine.state).toBe("STOPPED");
      expect(machine.track?.id).toBe("b");
      expect(engine.calls).toEqual([]);
      expect(info.snapshot()).toMatchObject({ trackId: "b", state: "STOPPED" });
    });

    it("stops, advances and plays while playing", async () => {
      await machine.play();
      await machine.next();
      await bus.drain();

      expect(engine.calls).toEqual(["play:a", "stop", "play:b"]);
      expect(machine.state).toBe("PLAYING");
      expect(machine.generation).toBe(2);
      expect(recorder.of(TRACK_CHANGED)).toEqual([
        { previousTrack: null, newTrack: "a" },
        { previousTrack: "a", newTrack: "b" },
      ]);
      expect(recorder.of(STATE_CHANGED).map((event) => event.newState)).toEqual([
        "PLAYING",
        "STOPPED",
        "PLAYING",
      ]);
    });

    it("plays the previous track when skipping back from pause", async () => {
      await machine.play();
      await machine.pause();

      await machine.navigate("prev");

      expect(engine.calls).toEqual(["play:a", "pause", "stop", "play:c"]);
      expect(machine.state).toBe("PLAYING");
      expect(machine.track?.id).toBe("c");
    });

    it("fails on an empty playlist", async () => {
      playlist.clear();
      expect(errorOf(await machine.next())).toBeInstanceOf(NavigationError);
    });
  });

  // ── Track end ──────────────────────────────────────────────────

  describe("handleTrackEnded", () => {
    it("advances to the next track without stopping the engine", async () => {
      await machine.play();
      engine.finish();

      await expect(machine.handleTrackEnded()).resolves.toEqual({ ok: true });

      expect(engine.calls).toEqual(["play:a", "play:b"]);
      expect(machine.state).toBe("PLAYING");
      expect(machine.track?.id).toBe("b");
    });

    it("ignores an end reported after a pause", async () => {
      await machine.play();
      await machine.pause();

      await machine.handleTrackEnded();

      expect(machine.state).toBe("PAUSED");
      expect(engine.calls).toEqual(["play:a", "pause"]);
    });
  });

  describe("abandonTrack", () => {
    it("stops with an engine error and keeps the track staged", async () => {
      await machine.play();
      engine.finish();

      const result = await machine.abandonTrack();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(EngineError);
      expect(result.error.message).toBe("a stopped before it was heard");
      expect(machine.state).toBe("STOPPED");
      expect(machine.track?.id).toBe("a");
      expect(info.snapshot()).toMatchObject({ trackId: "a", position: 0, state: "STOPPED" });
    });

    it("does nothing unless playing", async () => {
      await expect(machine.abandonTrack()).resolves.toEqual({ ok: true });
      expect(machine.state).toBe("STOPPED");
    });
  });

  // ── Other ──────────────────────────────────────────────────────

  it("leaves PlaybackInfo alone while another source is active", async () => {
    const inactive = new PlayerStateMachine({
      engine,
      navigator: new TrackNavigator(playlist),
      info,
      isActive: () => false,
      clock: clock.clock,
    });

    await inactive.play();

    expect(inactive.state).toBe("PLAYING");
    expect(info.snapshot()).toMatchObject({ trackId: null, state: "STOPPED" });
  });

  it("forwards the volume to the engine", async () => {
    await expect(machine.setVolume(40)).resolves.toEqual({ ok: true });
    expect(engine.volume).toBe(40);
  });

  it("cues the current track while stopped and clears it for an empty playlist", () => {
    machine.cue();
    expect(machine.track?.id).toBe("a");
    expect(info.snapshot().trackId).toBe("a");

    playlist.clear();
    machine.cue();
    expect(machine.track).toBeNull();
  });
});
