export type TrackField = 'duration' | 'title' | 'stream_url' | 'other';

/** Events an incremental JSON parser delivers, in document order. */
export interface JsonEventHandler {
  onMapKey(key: string): void;
  onString(value: string): void;
  onInteger(value: number): void;
  onStartObject(): void;
  onEndObject(): void;
}

export interface ScratchTrack {
  streamUrl: string;
  title?: string;
  durationMs?: number;
}

const FIELDS: ReadonlyMap<string, TrackField> = new Map([
  ['duration', 'duration'],
  ['title', 'title'],
  ['stream_url', 'stream_url'],
]);

/**
 * Collects `duration`, `title` and `stream_url` from track objects of the
 * SoundCloud API, wherever they sit in the document (a single track, or the
 * `tracks` array of a playlist).
 *
 * `depth` is 0 until a stream_url is seen, then 1 for the object that
 * carried it; nested objects push it higher. When the owning object closes
 * (1 -> 0) the collected fields are emitted as one track and cleared.
 */
export class JsonTrackHandler implements JsonEventHandler {
  private field: TrackField = 'other';
  private title: string | undefined;
  private streamUrl: string | undefined;
  private durationMs: number | undefined;
  private depth = 0;

  constructor(private readonly emit: (track: ScratchTrack) => void) {}

  onMapKey(key: string): void {
    this.field = FIELDS.get(key) ?? 'other';
  }

  onInteger(value: number): void {
    if (this.field === 'duration') {
      this.durationMs = value;
    }
  }

  onString(value: string): void {
    switch (this.field) {
      case 'title':
        this.title = value;
        break;
      case 'stream_url':
        this.streamUrl = value;
        this.depth = 1;
        break;
      default:
        break;
    }
  }

  // Opening an object does not clear the fields: a track's title may come
  // before a nested "user" object. A playlist-level title or duration seen
  // before `tracks` carries into a first track that has none of its own.
  onStartObject(): void {
    if (this.depth > 0) {
      this.depth++;
    }
  }

  onEndObject(): void {
    if (this.depth > 1) {
      this.depth--;
      return;
    }
    if (this.depth === 0) return;

    this.depth = 0;
    const streamUrl = this.streamUrl;
    if (streamUrl !== undefined) {
      this.emit({
        streamUrl,
        ...(this.title !== undefined ? { title: this.title } : {}),
        ...(this.durationMs !== undefined ? { durationMs: this.durationMs } : {}),
      });
    }

    // Next sibling starts clean
    this.title = undefined;
    this.streamUrl = undefined;
    this.durationMs = undefined;
  }
}
