import { Track, TrackProvider } from '../../types/music';
import { BasePlaylistPlugin } from './BasePlaylistPlugin';
import { InputStream } from '../input/InputStream';
import { MemoryTrackProvider } from '../MemoryTrackProvider';
import { readStreamText, splitLines } from './readStreamText';

const EXTM3U_HEADER = '#EXTM3U';
const EXTINF_PREFIX = '#EXTINF:';

interface ExtInf {
  durationSeconds?: number;
  name?: string;
}

/**
 * Extended M3U. Declines documents without the `#EXTM3U` header so the
 * plain M3U plugin gets its turn.
 */
export class ExtM3uPlaylistPlugin extends BasePlaylistPlugin {
  constructor() {
    super('extm3u', {
      suffixes: ['m3u'],
      mimeTypes: ['audio/x-mpegurl'],
    });
  }

  async openByStream(stream: InputStream): Promise<TrackProvider | null> {
    const text = await readStreamText(stream);
    const lines = splitLines(text).map(line => line.trim());

    if (lines[0] !== EXTM3U_HEADER) {
      return null;
    }

    const tracks: Track[] = [];
    let pending: ExtInf | null = null;

    for (const line of lines.slice(1)) {
      if (line === '') continue;

      if (line.startsWith(EXTINF_PREFIX)) {
        pending = this.parseExtInf(line.slice(EXTINF_PREFIX.length));
        continue;
      }
      if (line.startsWith('#')) continue;

      tracks.push(this.createTrack({ uri: line, ...pending }));
      pending = null;
    }

    return tracks.length > 0 ? new MemoryTrackProvider(tracks) : null;
  }

  /** `<seconds>[ attributes],<name>`; a negative length means unknown. */
  private parseExtInf(value: string): ExtInf {
    const comma = value.indexOf(',');
    const lengthPart = (comma >= 0 ? value.slice(0, comma) : value).trim().split(/\s+/)[0] ?? '';
    const namePart = comma >= 0 ? this.cleanTitle(value.slice(comma + 1)) : '';

    const info: ExtInf = {};
    const seconds = Number.parseInt(lengthPart, 10);
    if (Number.isFinite(seconds) && seconds >= 0) {
      info.durationSeconds = seconds;
    }
    if (namePart !== '') {
      info.name = namePart;
    }
    return info;
  }
}
