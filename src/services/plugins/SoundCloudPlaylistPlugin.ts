import { Track, TrackProvider } from '../../types/music';
import { PluginConfig } from '../../config/pluginConfig';
import { BasePlaylistPlugin } from './BasePlaylistPlugin';
import { JsonTrackHandler, ScratchTrack } from './JsonTrackHandler';
import { ClarinetJsonEventSource } from './ClarinetJsonEventSource';
import { MemoryTrackProvider } from '../MemoryTrackProvider';
import { OpenInputStream, READ_CHUNK_SIZE, closeQuietly } from '../input/InputStream';
import { openInputStream } from '../input/openInputStream';
import { TransportError } from '../../utils/errors';
import { logEvent, logWarning, logDebug, describeError } from '../../utils/logger';

const API_BASE_URL = 'https://api.soundcloud.com';
const SITE_BASE_URL = 'https://soundcloud.com';

/**
 * soundcloud:// addresses, resolved against the SoundCloud API. Accepted
 * forms:
 *   soundcloud://track/<track-id>
 *   soundcloud://playlist/<playlist-id>
 *   soundcloud://url/<url or path of a soundcloud page>
 *
 * The JSON response is parsed while it streams in; only the fields of the
 * current track are kept in memory.
 */
export class SoundCloudPlaylistPlugin extends BasePlaylistPlugin {
  private apiKey: string | null = null;
  private readonly openStream: OpenInputStream;

  constructor(opts?: { openStream?: OpenInputStream }) {
    super('soundcloud', { schemes: ['soundcloud'] });
    this.openStream = opts?.openStream ?? ((uri: string) => openInputStream(uri));
  }

  init(config: PluginConfig): boolean {
    const apiKey = config.getString('apikey')?.trim();
    if (!apiKey) {
      logDebug('soundcloud_plugin_disabled', { reason: 'API key is not set' });
      return false;
    }

    this.apiKey = apiKey;
    return true;
  }

  finish(): void {
    this.apiKey = null;
  }

  async openByUri(uri: string): Promise<TrackProvider | null> {
    const apiKey = this.apiKey;
    if (!apiKey) return null;

    const endpoint = this.buildEndpoint(uri, apiKey);
    if (!endpoint) return null;

    logEvent('soundcloud_fetch_started', { uri });

    let tracks: Track[];
    try {
      tracks = await this.fetchTracks(endpoint, apiKey);
    } catch (error) {
      logWarning('soundcloud_fetch_failed', { uri, error: this.redact(describeError(error).message, apiKey) });
      return null;
    }

    if (tracks.length === 0) {
      logEvent('soundcloud_no_tracks', { uri });
      return null;
    }

    logEvent('soundcloud_fetch_completed', { uri, tracks: tracks.length });
    return new MemoryTrackProvider(tracks);
  }

  /** API endpoint for a soundcloud:// address, or null when it is not one we know. */
  buildEndpoint(uri: string, apiKey: string): string | null {
    const separator = uri.indexOf('://');
    const scheme = separator >= 0 ? uri.slice(0, separator).toLowerCase() : '';
    if (scheme !== 'soundcloud') {
      logWarning('soundcloud_incompatible_scheme', { uri });
      return null;
    }

    const rest = uri.slice(separator + 3);
    const slash = rest.indexOf('/');
    const kind = slash >= 0 ? rest.slice(0, slash) : rest;
    const arg = slash >= 0 ? rest.slice(slash + 1) : '';
    const auth = new URLSearchParams({ client_id: apiKey }).toString();

    if (arg !== '') {
      switch (kind) {
        case 'track':
          return `${API_BASE_URL}/tracks/${arg}.json?${auth}`;
        case 'playlist':
          return `${API_BASE_URL}/playlists/${arg}.json?${auth}`;
        case 'url': {
          // The resolver answers with a redirect to the resource, which axios follows
          const query = new URLSearchParams({ url: this.resolvePageUrl(arg), client_id: apiKey });
          return `${API_BASE_URL}/resolve.json?${query.toString()}`;
        }
        default:
          break;
      }
    }

    logWarning('soundcloud_unknown_uri', { uri });
    return null;
  }

  private resolvePageUrl(page: string): string {
    if (/^https?:\/\//i.test(page)) return page;
    if (page.startsWith('soundcloud.com')) return `https://${page}`;
    return `${SITE_BASE_URL}/${page.replace(/^\/+/, '')}`;
  }

  /**
   * Stream the document through the parser. Any transport or parse failure
   * throws, so tracks collected so far never escape.
   */
  private async fetchTracks(endpoint: string, apiKey: string): Promise<Track[]> {
    const tracks: Track[] = [];
    const handler = new JsonTrackHandler(scratch => {
      tracks.push(this.toTrack(scratch, apiKey));
    });
    const events = new ClarinetJsonEventSource(handler);

    const stream = await this.openStream(endpoint);
    try {
      await stream.waitReady();

      for (;;) {
        const chunk = await stream.read(READ_CHUNK_SIZE);
        if (chunk.length === 0) {
          if (!stream.isEof()) {
            throw new TransportError('Read returned no data before end of stream', endpoint);
          }
          events.end();
          break;
        }
        events.write(chunk);
      }
    } finally {
      await closeQuietly(stream);
    }

    return tracks;
  }

  private toTrack(scratch: ScratchTrack, apiKey: string): Track {
    // Bare stream URLs from the API carry no authentication
    const separator = scratch.streamUrl.includes('?') ? '&' : '?';
    const uri = `${scratch.streamUrl}${separator}client_id=${encodeURIComponent(apiKey)}`;

    return this.createTrack({
      uri,
      ...(scratch.title !== undefined ? { name: scratch.title } : {}),
      ...(scratch.durationMs !== undefined && scratch.durationMs >= 0
        ? { durationSeconds: Math.trunc(scratch.durationMs / 1000) }
        : {}),
    });
  }

  private redact(message: string, apiKey: string): string {
    return message.split(apiKey).join('***');
  }
}
