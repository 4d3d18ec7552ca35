/**
 * Local Source: the default source, playing the playlist through the local
 * engine.
 *
 * Every method forwards to the state machine and is called with the
 * orchestrator's lock already held (by the player or by a source switch).
 */

import type { CommandResult } from "../core/errors.js";
import type { PlayerStateMachine } from "../core/state-machine.js";
import type { MediaSource, SourcePlayback } from "../types/index.js";

export class LocalSource implements MediaSource {
  readonly displayName = "Local files";

  constructor(
    readonly name: string,
    private readonly machine: PlayerStateMachine,
  ) {}

  async play(): Promise<boolean> {
    return succeeded(await this.machine.play());
  }

  async pause(): Promise<boolean> {
    return succeeded(await this.machine.pause());
  }

  async stop(): Promise<boolean> {
    return succeeded(await this.machine.stop());
  }

  async next(): Promise<boolean> {
    return succeeded(await this.machine.next());
  }

  async prev(): Promise<boolean> {
    return succeeded(await this.machine.prev());
  }

  async setVolume(level: number): Promise<boolean> {
    return succeeded(await this.machine.setVolume(level));
  }

  /** Always live: asks the engine whether it is busy right now. */
  getCurrentPlayback(): SourcePlayback {
    return this.machine.report();
  }
}

function succeeded(result: CommandResult): boolean {
  return result.ok;
}
