/**
 * Track Navigator: current/next/prev cursor over a live Playlist.
 *
 * Sequential mode wraps around in both directions. Shuffle mode draws the
 * next index uniformly from every index except the current one and keeps a
 * single level of history for `prev`.
 *
 * The cursor is derived state: every call re-reads the playlist length and
 * clamps, so a playlist that shrank since the last call can never push an
 * index out of range. Navigation is synchronous and runs to completion, so
 * the command path and the watchdog cannot interleave inside it.
 */

import type { NavigationDirection, Track } from "../types/index.js";
import { NavigationError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { Playlist } from "./playlist.js";

export interface NavigationCursor {
  current: number;
  next: number;
  prev: number;
  shuffle: boolean;
}

export interface TrackNavigatorOptions {
  shuffle?: boolean;
  /** Uniform [0, 1) source. Default: Math.random */
  random?: () => number;
  logger?: Logger;
}

export class TrackNavigator {
  private current = 0;
  private nextIndex = 0;
  private prevIndex = 0;
  private shuffle: boolean;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly playlist: Playlist,
    options: TrackNavigatorOptions = {},
  ) {
    this.shuffle = options.shuffle ?? false;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger("navigator");
    this.reset();
  }

  // ── Cursor lifecycle ─────────────────────────────────────────────

  /** Reinitialize the cursor, e.g. after a new playlist is loaded. */
  reset(startIndex = 0): void {
    this.current = this.clamp(startIndex);
    this.prevIndex = this.sequentialPrev(this.current);
    this.nextIndex = this.shuffle ? this.drawShuffleNext(this.current) : this.sequentialNext(this.current);
  }

  setShuffle(enabled: boolean): void {
    if (this.shuffle === enabled) return;
    this.shuffle = enabled;
    this.current = this.clamp(this.current);
    this.nextIndex = enabled ? this.drawShuffleNext(this.current) : this.sequentialNext(this.current);
    if (!enabled) this.prevIndex = this.sequentialPrev(this.current);
  }

  /**
   * Recompute the neighbours after the playlist changed, keeping the current
   * index. A pre-drawn shuffle pick is kept while it is still valid.
   */
  refresh(): void {
    this.current = this.clamp(this.current);
    if (!this.shuffle) {
      this.prevIndex = this.sequentialPrev(this.current);
      this.nextIndex = this.sequentialNext(this.current);
      return;
    }
    this.prevIndex = this.clamp(this.prevIndex);
    const next = this.clamp(this.nextIndex);
    this.nextIndex = next === this.current ? this.drawShuffleNext(this.current) : next;
  }

  /**
   * Follow the removal of the track at `index`: every cursor position after
   * it moves down one, so current, the drawn next and the prev history keep
   * pointing at the same tracks.
   */
  trackRemoved(index: number): void {
    const shift = (position: number) => (position > index ? position - 1 : position);
    this.current = shift(this.current);
    this.nextIndex = shift(this.nextIndex);
    this.prevIndex = shift(this.prevIndex);
    this.refresh();
  }

  isShuffle(): boolean {
    return this.shuffle;
  }

  // ── Navigation ───────────────────────────────────────────────────

  /**
   * Move the cursor one step and return the new current track, or null on
   * an empty playlist.
   */
  navigate(direction: NavigationDirection): Track | null {
    const length = this.playlist.length;
    if (length === 0) {
      const error = new NavigationError();
      this.logger.info({ direction }, error.message);
      return null;
    }

    const from = this.clamp(this.current);
    if (direction === "next") {
      this.moveNext(from);
    } else {
      this.movePrev(from);
    }
    return this.playlist.at(this.current);
  }

  /** The track under the cursor, or null on an empty playlist. */
  currentTrack(): Track | null {
    if (this.playlist.length === 0) return null;
    return this.playlist.at(this.clamp(this.current));
  }

  /** The track `navigate(direction)` would land on. */
  peek(direction: NavigationDirection): Track | null {
    if (this.playlist.length === 0) return null;
    const index = direction === "next" ? this.clamp(this.nextIndex) : this.clamp(this.prevIndex);
    return this.playlist.at(index);
  }

  /** The cursor, clamped against the playlist as it is now. */
  cursor(): NavigationCursor {
    return {
      current: this.clamp(this.current),
      next: this.clamp(this.nextIndex),
      prev: this.clamp(this.prevIndex),
      shuffle: this.shuffle,
    };
  }

  // ── Internal ─────────────────────────────────────────────────────

  private moveNext(from: number): void {
    if (!this.shuffle) {
      this.current = this.sequentialNext(from);
      this.prevIndex = this.sequentialPrev(this.current);
      this.nextIndex = this.sequentialNext(this.current);
      return;
    }

    let target = this.clamp(this.nextIndex);
    if (target === from) target = this.drawShuffleNext(from);
    this.prevIndex = from;
    this.current = target;
    this.nextIndex = this.drawShuffleNext(target);
  }

  private movePrev(from: number): void {
    if (!this.shuffle) {
      this.current = this.sequentialPrev(from);
      this.prevIndex = this.sequentialPrev(this.current);
      this.nextIndex = this.sequentialNext(this.current);
      return;
    }

    // One level of history: prevIndex is left as is, so a second prev
    // lands on the same track instead of walking further back.
    this.current = this.clamp(this.prevIndex);
    this.nextIndex = from;
  }

  private sequentialNext(index: number): number {
    const length = this.playlist.length;
    return length === 0 ? 0 : (index + 1) % length;
  }

  private sequentialPrev(index: number): number {
    const length = this.playlist.length;
    return length === 0 ? 0 : (index - 1 + length) % length;
  }

  /** Uniform pick among every index except `exclude`. */
  private drawShuffleNext(exclude: number): number {
    const length = this.playlist.length;
    if (length <= 1) return 0;
    const pick = Math.floor(this.random() * (length - 1));
    const bounded = Math.min(Math.max(pick, 0), length - 2);
    return bounded >= exclude ? bounded + 1 : bounded;
  }

  private clamp(index: number): number {
    const length = this.playlist.length;
    if (length === 0) return 0;
    return Math.min(Math.max(index, 0), length - 1);
  }
}
