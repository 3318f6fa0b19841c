import { Track, TrackProvider } from '../types/music';

/**
 * Provider over a finished, in-memory track list. The list is copied and
 * frozen on construction so nothing the producer does afterwards leaks in.
 */
export class MemoryTrackProvider implements TrackProvider {
  private readonly tracks: ReadonlyArray<Track>;
  private cursor = 0;

  constructor(tracks: ReadonlyArray<Track>) {
    this.tracks = Object.freeze(
      tracks.map(track => Object.freeze({ uri: track.uri, tag: Object.freeze({ ...track.tag }) }))
    );
  }

  get size(): number {
    return this.tracks.length;
  }

  /** Next track, or null once the list is exhausted. */
  read(): Track | null {
    const track = this.tracks[this.cursor];
    if (!track) return null;
    this.cursor++;
    return track;
  }

  rewind(): void {
    this.cursor = 0;
  }

  toArray(): Track[] {
    return [...this.tracks];
  }

  [Symbol.iterator](): Iterator<Track> {
    return this.tracks[Symbol.iterator]();
  }
}
