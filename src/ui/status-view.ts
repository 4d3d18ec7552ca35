/**
 * Status View: computes derived display state from the player.
 *
 * Pure computation layer: reads PlaybackInfo, the playlist and the registry
 * and returns snapshots. No side effects, no subscriptions.
 */

import type { Player } from "../core/player.js";
import type { Capability, PlayerState, Track } from "../types/index.js";

export interface PlayerStatus {
  state: PlayerState;
  source: string;
  track: string | null;
  artist: string | null;
  album: string | null;
  playlistLength: number;
  /** Cursor index, null on an empty playlist */
  currentIndex: number | null;
  position: number;
  duration: number;
  volume: number;
  shuffle: boolean;
  enabledSources: number;
  availableSources: number;
}

export interface ProgressInfo {
  elapsed: number;
  total: number;
  percentage: number;
}

export interface ControlsInfo {
  canPlay: boolean;
  canPause: boolean;
  canStop: boolean;
  canNext: boolean;
  canPrevious: boolean;
}

export interface PlaylistEntry {
  track: Track;
  isCurrentTrack: boolean;
}

/** Render seconds as `m:ss`. */
export function formatDuration(seconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(totalSeconds / 60);
  const rest = totalSeconds % 60;
  return `${minutes}:${rest.toString().padStart(2, "0")}`;
}

export class StatusView {
  constructor(private readonly player: Player) {}

  getStatus(): PlayerStatus {
    const info = this.player.playbackInfo();
    const length = this.player.playlist.length;
    return {
      state: info.state,
      source: info.source,
      track: info.trackName,
      artist: info.artist,
      album: info.album,
      playlistLength: length,
      currentIndex: length > 0 ? this.player.navigator.cursor().current : null,
      position: info.position,
      duration: info.duration,
      volume: info.volume,
      shuffle: this.player.navigator.isShuffle(),
      enabledSources: this.player.registry.listLoaded().length,
      availableSources: this.player.registry.listAvailable().length,
    };
  }

  getProgress(): ProgressInfo {
    const { position, duration } = this.player.playbackInfo();
    return {
      elapsed: position,
      total: duration,
      percentage: duration > 0 ? (position / duration) * 100 : 0,
    };
  }

  getControls(): ControlsInfo {
    const { state, source } = this.player.playbackInfo();
    const isLocal = source === this.player.registry.localSourceName;
    const handle = this.player.registry.get(source);
    // Local commands need tracks; a remote source needs the capability
    const can = (capability: Capability) =>
      isLocal ? this.player.playlist.length > 0 : handle?.supports(capability) ?? false;

    return {
      canPlay: state !== "PLAYING" && can("play"),
      canPause: state === "PLAYING" && (isLocal || (handle?.supports("pause") ?? false)),
      canStop: state !== "STOPPED",
      canNext: can("next"),
      canPrevious: can("prev"),
    };
  }

  getPlaylist(): PlaylistEntry[] {
    const tracks = this.player.playlist.toArray();
    const current = this.player.navigator.cursor().current;
    return tracks.map((track, index) => ({
      track,
      isCurrentTrack: index === current,
    }));
  }

  /** One-line summary for a terminal. */
  describe(): string {
    const status = this.getStatus();
    const track = status.track
      ? `${status.artist ? `${status.artist} - ` : ""}${status.track}`
      : "(no track)";
    const progress = `${formatDuration(status.position)}/${formatDuration(status.duration)}`;
    const flags = [`vol ${status.volume}`, status.shuffle ? "shuffle" : "in order"].join(", ");
    return `[${status.source}] ${status.state} ${track} ${progress} (${flags})`;
  }
}
