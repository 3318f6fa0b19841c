import { Track, TrackProvider } from '../../types/music';
import { BasePlaylistPlugin } from './BasePlaylistPlugin';
import { InputStream } from '../input/InputStream';
import { MemoryTrackProvider } from '../MemoryTrackProvider';
import { readStreamText, splitLines } from './readStreamText';

interface PlsEntry {
  file?: string;
  title?: string;
  length?: number;
}

const ENTRY_PATTERN = /^(file|title|length)(\d+)$/i;

/** Shoutcast/Winamp `[playlist]` files with FileN, TitleN and LengthN keys. */
export class PlsPlaylistPlugin extends BasePlaylistPlugin {
  constructor() {
    super('pls', {
      suffixes: ['pls'],
      mimeTypes: ['audio/x-scpls', 'audio/scpls'],
    });
  }

  async openByStream(stream: InputStream): Promise<TrackProvider | null> {
    const text = await readStreamText(stream);
    const entries = this.parseEntries(splitLines(text));
    if (!entries) return null;

    const tracks: Track[] = [];
    for (const index of [...entries.keys()].sort((a, b) => a - b)) {
      const entry = entries.get(index);
      if (!entry?.file) continue;

      tracks.push(this.createTrack({
        uri: entry.file,
        ...(entry.title !== undefined ? { name: entry.title } : {}),
        ...(entry.length !== undefined ? { durationSeconds: entry.length } : {}),
      }));
    }

    return tracks.length > 0 ? new MemoryTrackProvider(tracks) : null;
  }

  /** Entries of the `[playlist]` section by index, or null when there is none. */
  private parseEntries(lines: string[]): Map<number, PlsEntry> | null {
    const entries = new Map<number, PlsEntry>();
    let inPlaylist = false;
    let sawHeader = false;

    for (const raw of lines) {
      const line = raw.trim();
      if (line === '' || line.startsWith(';')) continue;

      if (line.startsWith('[') && line.endsWith(']')) {
        inPlaylist = line.slice(1, -1).trim().toLowerCase() === 'playlist';
        sawHeader = sawHeader || inPlaylist;
        continue;
      }
      if (!inPlaylist) continue;

      const eq = line.indexOf('=');
      if (eq <= 0) continue;

      const match = ENTRY_PATTERN.exec(line.slice(0, eq).trim());
      const key = match?.[1];
      const number = match?.[2];
      if (!key || !number) continue;

      const index = Number.parseInt(number, 10);
      const value = line.slice(eq + 1).trim();
      const entry = entries.get(index) ?? {};

      switch (key.toLowerCase()) {
        case 'file':
          if (value !== '') entry.file = value;
          break;
        case 'title':
          if (value !== '') entry.title = this.cleanTitle(value);
          break;
        case 'length': {
          const seconds = Number.parseInt(value, 10);
          if (Number.isFinite(seconds) && seconds >= 0) entry.length = seconds;
          break;
        }
      }
      entries.set(index, entry);
    }

    return sawHeader ? entries : null;
  }
}
