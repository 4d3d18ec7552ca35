/**
 * Player states: the behaviour of STOPPED, PLAYING and PAUSED.
 *
 * Each state is a stateless handler: everything it reads or changes lives on
 * the StateContext the machine passes in, so one instance per state is shared
 * for the lifetime of the process.
 */

import type { LocalEngine, NavigationDirection, PlayerState, Track } from "../types/index.js";
import { EngineError, NavigationError, TransitionError, fail, ok, toEngineError } from "./errors.js";
import type { CommandResult } from "./errors.js";
import type { TrackNavigator } from "./track-navigator.js";

/** What a state handler may touch. Implemented by PlayerStateMachine. */
export interface StateContext {
  readonly engine: LocalEngine;
  readonly navigator: TrackNavigator;
  /** Start `track` from the beginning and enter PLAYING. */
  startTrack(track: Track): Promise<CommandResult>;
  /** Freeze the elapsed position and enter PAUSED. */
  enterPaused(): void;
  /** Shift the start baseline past the pause and enter PLAYING. */
  enterResumed(): void;
  /** Clear position tracking and enter STOPPED. */
  enterStopped(): void;
  /** Make `track` the loaded track without playing it. */
  stage(track: Track): void;
}

export interface PlayerStateHandler {
  readonly state: PlayerState;
  play(ctx: StateContext): Promise<CommandResult>;
  pause(ctx: StateContext): Promise<CommandResult>;
  stop(ctx: StateContext): Promise<CommandResult>;
  navigate(ctx: StateContext, direction: NavigationDirection): Promise<CommandResult>;
}

async function engineCall(
  operation: string,
  call: () => boolean | Promise<boolean>,
): Promise<CommandResult> {
  try {
    if (await call()) return ok;
    return fail(new EngineError(`Engine refused to ${operation}`, { operation }));
  } catch (err) {
    return fail(toEngineError(err, `Engine failed to ${operation}`, { operation }));
  }
}

/** Stop the engine, then navigate and play: the composed skip from an active state. */
async function skip(ctx: StateContext, direction: NavigationDirection): Promise<CommandResult> {
  const stopped = await stopEngine(ctx);
  if (!stopped.ok) return stopped;
  const track = ctx.navigator.navigate(direction);
  if (!track) return fail(new NavigationError());
  return ctx.startTrack(track);
}

async function stopEngine(ctx: StateContext): Promise<CommandResult> {
  const result = await engineCall("stop", () => ctx.engine.stop());
  // Position tracking is cleared even when the engine complains; the
  // orchestrator still sees a busy engine through its live query.
  ctx.enterStopped();
  return result;
}

export class StoppedState implements PlayerStateHandler {
  readonly state = "STOPPED";

  async play(ctx: StateContext): Promise<CommandResult> {
    const track = ctx.navigator.currentTrack();
    if (!track) return fail(new NavigationError());
    return ctx.startTrack(track);
  }

  async pause(): Promise<CommandResult> {
    return fail(new TransitionError("cannot pause: stopped", { state: this.state }));
  }

  async stop(): Promise<CommandResult> {
    return ok;
  }

  /** Move the cursor and stage the track; nothing becomes audible. */
  async navigate(ctx: StateContext, direction: NavigationDirection): Promise<CommandResult> {
    const track = ctx.navigator.navigate(direction);
    if (!track) return fail(new NavigationError());
    ctx.stage(track);
    return ok;
  }
}

export class PlayingState implements PlayerStateHandler {
  readonly state = "PLAYING";

  async play(): Promise<CommandResult> {
    return ok;
  }

  async pause(ctx: StateContext): Promise<CommandResult> {
    const result = await engineCall("pause", () => ctx.engine.pause());
    if (result.ok) ctx.enterPaused();
    return result;
  }

  stop(ctx: StateContext): Promise<CommandResult> {
    return stopEngine(ctx);
  }

  navigate(ctx: StateContext, direction: NavigationDirection): Promise<CommandResult> {
    return skip(ctx, direction);
  }
}

export class PausedState implements PlayerStateHandler {
  readonly state = "PAUSED";

  async play(ctx: StateContext): Promise<CommandResult> {
    const result = await engineCall("resume", () => ctx.engine.resume());
    if (result.ok) ctx.enterResumed();
    return result;
  }

  async pause(): Promise<CommandResult> {
    return ok;
  }

  stop(ctx: StateContext): Promise<CommandResult> {
    return stopEngine(ctx);
  }

  navigate(ctx: StateContext, direction: NavigationDirection): Promise<CommandResult> {
    return skip(ctx, direction);
  }
}

export const PLAYER_STATES: Record<PlayerState, PlayerStateHandler> = {
  STOPPED: new StoppedState(),
  PLAYING: new PlayingState(),
  PAUSED: new PausedState(),
};
