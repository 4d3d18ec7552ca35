/**
 * Interactive transport: play local files through ffplay and drive the
 * player from the terminal.
 *
 * Usage:
 *   npx tsx scripts/play.ts ~/Music/one.flac ~/Music/two.mp3
 *
 * Settings are read from the environment, or from a .env file in the
 * working directory (DEFAULT_VOLUME, DEFAULT_SORT=random, LOG_LEVEL, ...).
 */

import "dotenv/config";
import * as readline from "node:readline/promises";
import { basename, extname, resolve } from "node:path";
import { configFromEnv } from "../src/core/config.js";
import type { PlayerConfig } from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";
import type { CommandResult } from "../src/core/errors.js";
import { Player } from "../src/core/player.js";
import { FfplayEngine } from "../src/engine/ffplay-engine.js";
import { TRACK_CHANGED } from "../src/types/index.js";
import type { Track } from "../src/types/index.js";
import { StatusView, formatDuration } from "../src/ui/status-view.js";

const HELP = `Commands:
  play [source]   play, resume, or switch to a source and play it
  pause | stop | next | prev
  vol <0-100>     set the volume
  shuffle         toggle shuffle
  list            show the playlist
  rm <n>          remove track n from the playlist
  sources         list sources
  enable <name> | disable <name>
  status          show what is playing
  quit`;

// ── Helpers ──────────────────────────────────────────────────────────

function loadConfig(): PlayerConfig {
  try {
    return configFromEnv();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error("Invalid configuration:");
      for (const issue of err.issues) console.error(`  ${issue}`);
      process.exit(1);
    }
    throw err;
  }
}

function toTrack(path: string): Track {
  const fullPath = resolve(path);
  return {
    id: fullPath,
    title: basename(fullPath, extname(fullPath)),
    uri: fullPath,
  };
}

function outcome(result: CommandResult, view: StatusView): string {
  return result.ok ? view.describe() : `Error: ${result.error.message}`;
}

// ── Commands ─────────────────────────────────────────────────────────

async function runCommand(player: Player, view: StatusView, command: string, args: string[]): Promise<string> {
  switch (command) {
    case "play": {
      const [source] = args;
      const result = source ? await player.playSource(source, args.slice(1)) : await player.play();
      return outcome(result, view);
    }
    case "pause":
      return outcome(await player.pause(args), view);
    case "stop":
      return outcome(await player.stop(args), view);
    case "next":
      return outcome(await player.next(args), view);
    case "prev":
      return outcome(await player.prev(args), view);
    case "vol": {
      const level = Number.parseInt(args[0] ?? "", 10);
      if (Number.isNaN(level)) return "Usage: vol <0-100>";
      return outcome(await player.setVolume(level), view);
    }
    case "shuffle":
      return `Shuffle ${player.toggleShuffle() ? "on" : "off"}`;
    case "list":
      return view
        .getPlaylist()
        .map(({ track, isCurrentTrack }, i) => {
          const marker = isCurrentTrack ? ">" : " ";
          const length = track.duration !== undefined ? `  [${formatDuration(track.duration)}]` : "";
          return `${marker} ${String(i + 1).padStart(3)}. ${track.title}${length}`;
        })
        .join("\n") || "Playlist is empty.";
    case "rm": {
      const index = Number.parseInt(args[0] ?? "", 10) - 1;
      const removed = Number.isNaN(index) ? null : await player.removeTrack(index);
      return removed ? `Removed ${removed.title}` : "No such track.";
    }
    case "sources":
      return player
        .listSources()
        .map((source) => `${source.loaded ? "*" : " "} ${source.name} (${source.displayName})`)
        .join("\n") || "No plugin sources available.";
    case "enable":
      return player.enableSource(args[0] ?? "") ? `Enabled ${args[0]}` : "Could not enable that source.";
    case "disable":
      return (await player.disableSource(args[0] ?? "")) ? `Disabled ${args[0]}` : "Could not disable that source.";
    case "status":
      await player.getCurrentPlayback();
      return view.describe();
    default:
      return HELP;
  }
}

// ── Main ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadConfig();
  const player = new Player({
    engine: new FfplayEngine({ volume: config.defaultVolume }),
    config,
  });
  const view = new StatusView(player);

  await player.start();
  await player.loadPlaylist(process.argv.slice(2).map(toTrack), { name: "command line" });
  player.bus.subscribe(TRACK_CHANGED, (event) => {
    if (event.newTrack) console.log(`\nNow playing: ${event.newTrack}`);
  });

  console.log(`${player.playlist.length} track(s) loaded. Type "help" for commands.`);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const line = (await rl.question("> ")).trim();
      if (line === "") continue;
      const [command = "", ...args] = line.split(/\s+/);
      if (command === "quit" || command === "q") break;
      console.log(await runCommand(player, view, command, args));
    }
  } finally {
    rl.close();
    await player.shutdown();
  }
}

main().catch((err) => {
  console.error("Failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
