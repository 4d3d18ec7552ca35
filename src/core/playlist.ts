/**
 * Playlist: the ordered list of tracks the local source plays from.
 *
 * Mutable at any time, including while a navigator holds a cursor over it.
 * The navigator re-reads the length on every call, so this class never
 * adjusts cursors itself.
 */

import type { Track } from "../types/index.js";

export class Playlist {
  private tracks: Track[] = [];
  private name: string | null = null;

  constructor(tracks: Track[] = [], name: string | null = null) {
    this.replace(tracks, name);
  }

  // ── Mutators ─────────────────────────────────────────────────────

  /** Replace the whole list, e.g. when a saved playlist is loaded. */
  replace(tracks: Track[], name: string | null = null): void {
    this.tracks = [...tracks];
    this.name = name;
  }

  append(track: Track): void {
    this.tracks.push(track);
  }

  appendAll(tracks: Track[]): void {
    if (tracks.length === 0) return;
    this.tracks.push(...tracks);
  }

  /** Insert at `index`, clamped to the list bounds. */
  insert(index: number, track: Track): void {
    const at = Math.max(0, Math.min(index, this.tracks.length));
    this.tracks.splice(at, 0, track);
  }

  /** Remove the track at `index`. Returns it, or null when out of range. */
  removeAt(index: number): Track | null {
    if (index < 0 || index >= this.tracks.length) return null;
    const [removed] = this.tracks.splice(index, 1);
    return removed ?? null;
  }

  clear(): void {
    this.tracks = [];
  }

  // ── Queries ──────────────────────────────────────────────────────

  get length(): number {
    return this.tracks.length;
  }

  get playlistName(): string | null {
    return this.name;
  }

  at(index: number): Track | null {
    return this.tracks[index] ?? null;
  }

  indexOf(trackId: string): number {
    return this.tracks.findIndex((track) => track.id === trackId);
  }

  toArray(): Track[] {
    return [...this.tracks];
  }
}
