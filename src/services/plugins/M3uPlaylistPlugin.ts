import { TrackProvider } from '../../types/music';
import { BasePlaylistPlugin } from './BasePlaylistPlugin';
import { InputStream } from '../input/InputStream';
import { MemoryTrackProvider } from '../MemoryTrackProvider';
import { readStreamText, splitLines } from './readStreamText';

/** Plain M3U: one address per line, `#` lines are comments. */
export class M3uPlaylistPlugin extends BasePlaylistPlugin {
  constructor() {
    super('m3u', {
      suffixes: ['m3u'],
      mimeTypes: ['audio/x-mpegurl', 'audio/mpegurl'],
    });
  }

  async openByStream(stream: InputStream): Promise<TrackProvider | null> {
    const text = await readStreamText(stream);

    const tracks = splitLines(text)
      .map(line => line.trim())
      .filter(line => line !== '' && !line.startsWith('#'))
      .map(uri => this.createTrack({ uri }));

    return tracks.length > 0 ? new MemoryTrackProvider(tracks) : null;
  }
}
