import { fileURLToPath } from 'url';
import { TrackProvider } from '../types/music';
import { PluginRegistry } from './PluginRegistry';
import { PlaylistPlugin } from './plugins/types';
import { InputStream, OpenInputStream, closeQuietly } from './input/InputStream';
import { openInputStream } from './input/openInputStream';
import { getUriScheme, getUriSuffix, stripMimeParameters, isRemoteUri } from '../utils/uri';
import { logEvent, logWarning, logDebug, describeError } from '../utils/logger';

export interface Resolution {
  provider: TrackProvider;
  /** Stream the provider was read from; the caller now owns and must close it. */
  stream: InputStream | null;
}

type StreamMatcher = (plugin: PlaylistPlugin) => boolean;

/**
 * Turns a URI, a local path or an already opened stream into a track list by
 * asking the registry's enabled plugins in order until one accepts it.
 * Plugin failures never escape: they count as "not accepted" and the
 * search continues with the next candidate.
 */
export class PlaylistResolver {
  private readonly registry: PluginRegistry;
  private readonly openStream: OpenInputStream;

  constructor(registry: PluginRegistry, opts?: { openStream?: OpenInputStream }) {
    this.registry = registry;
    this.openStream = opts?.openStream ?? ((uri: string) => openInputStream(uri));
  }

  /**
   * Scheme pass, then suffix pass over the `openByUri` plugins the scheme
   * pass did not already try.
   */
  async resolveByUri(uri: string): Promise<TrackProvider | null> {
    logEvent('resolve_by_uri_started', { uri });

    const tried = new Set<PlaylistPlugin>();
    const provider =
      (await this.openUriByScheme(uri, tried)) ?? (await this.openUriBySuffix(uri, tried));

    this.logOutcome('resolve_by_uri', uri, provider);
    return provider;
  }

  /**
   * Scheme pass only. Every plugin invoked without success is added to
   * `tried` so a later suffix pass can skip it.
   */
  async openUriByScheme(uri: string, tried: Set<PlaylistPlugin>): Promise<TrackProvider | null> {
    const scheme = getUriScheme(uri);
    if (!scheme) return null;

    for (const plugin of this.registry.enabledPlugins()) {
      const openByUri = plugin.openByUri;
      if (!openByUri || plugin.schemes?.has(scheme) !== true) continue;

      const provider = await this.attempt(plugin, uri, () => openByUri.call(plugin, uri));
      if (provider) return provider;

      tried.add(plugin);
    }

    return null;
  }

  async openUriBySuffix(uri: string, tried: ReadonlySet<PlaylistPlugin>): Promise<TrackProvider | null> {
    const suffix = getUriSuffix(uri);
    if (!suffix) return null;

    for (const plugin of this.registry.enabledPlugins()) {
      const openByUri = plugin.openByUri;
      if (tried.has(plugin) || !openByUri || plugin.suffixes?.has(suffix) !== true) continue;

      const provider = await this.attempt(plugin, uri, () => openByUri.call(plugin, uri));
      if (provider) return provider;
    }

    return null;
  }

  /**
   * Content-type pass, then suffix pass. The stream is rewound before every
   * attempt. On failure the stream stays open and remains the caller's.
   */
  async resolveByStream(stream: InputStream, uri?: string): Promise<TrackProvider | null> {
    const target = uri ?? stream.uri;
    logEvent('resolve_by_stream_started', { uri: target });

    try {
      await stream.waitReady();
    } catch (error) {
      logWarning('resolve_by_stream_not_ready', { uri: target, error: describeError(error).message });
      return null;
    }

    let provider: TrackProvider | null = null;

    const fullMime = stream.getMimeType();
    const mime = fullMime !== undefined ? stripMimeParameters(fullMime) : '';
    if (mime) {
      provider = await this.openStreamMatching(stream, target, p => p.mimeTypes?.has(mime) === true);
    }

    if (!provider) {
      const suffix = getUriSuffix(target);
      if (suffix) {
        provider = await this.openStreamBySuffix(stream, target, suffix);
      }
    }

    this.logOutcome('resolve_by_stream', target, provider);
    return provider;
  }

  /**
   * Suffix-driven: nothing is opened unless an enabled plugin claims the
   * suffix. On success the opened stream goes to the caller with the
   * provider; on failure it is closed here.
   */
  async resolveByPath(path: string): Promise<Resolution | null> {
    const suffix = getUriSuffix(path);
    if (!suffix || !this.registry.isSuffixSupported(suffix)) {
      logDebug('resolve_by_path_unsupported_suffix', { path, suffix });
      return null;
    }

    let stream: InputStream;
    try {
      stream = await this.openStream(path);
    } catch (error) {
      logWarning('resolve_by_path_open_failed', { path, error: describeError(error).message });
      return null;
    }

    let provider: TrackProvider | null = null;
    try {
      await stream.waitReady();
      provider = await this.openStreamBySuffix(stream, path, suffix);
    } catch (error) {
      logWarning('resolve_by_path_failed', { path, error: describeError(error).message });
    }

    this.logOutcome('resolve_by_path', path, provider);
    if (provider) {
      return { provider, stream };
    }

    await closeQuietly(stream);
    return null;
  }

  /**
   * Resolve any address: plugin URIs first, then remote documents by
   * content type and suffix, then local files by suffix.
   */
  async resolve(uri: string): Promise<Resolution | null> {
    const scheme = getUriScheme(uri);

    if (scheme === null) {
      return this.resolveByPath(uri);
    }
    if (scheme === 'file') {
      let path: string;
      try {
        path = fileURLToPath(uri);
      } catch (error) {
        logWarning('resolve_invalid_file_uri', { uri, error: describeError(error).message });
        return null;
      }
      return this.resolveByPath(path);
    }

    const provider = await this.resolveByUri(uri);
    if (provider) {
      return { provider, stream: null };
    }

    if (!isRemoteUri(uri)) {
      return null;
    }

    let stream: InputStream;
    try {
      stream = await this.openStream(uri);
    } catch (error) {
      logWarning('resolve_open_failed', { uri, error: describeError(error).message });
      return null;
    }

    const streamed = await this.resolveByStream(stream, uri);
    if (streamed) {
      return { provider: streamed, stream };
    }

    await closeQuietly(stream);
    return null;
  }

  isSuffixSupported(suffix: string): boolean {
    return this.registry.isSuffixSupported(suffix);
  }

  private openStreamBySuffix(stream: InputStream, uri: string, suffix: string): Promise<TrackProvider | null> {
    return this.openStreamMatching(stream, uri, p => p.suffixes?.has(suffix) === true);
  }

  private async openStreamMatching(
    stream: InputStream,
    uri: string,
    matches: StreamMatcher
  ): Promise<TrackProvider | null> {
    for (const plugin of this.registry.enabledPlugins()) {
      const openByStream = plugin.openByStream;
      if (!openByStream || !matches(plugin)) continue;

      await this.rewind(stream);
      const provider = await this.attempt(plugin, uri, () => openByStream.call(plugin, stream, uri));
      if (provider) return provider;
    }

    return null;
  }

  private async rewind(stream: InputStream): Promise<void> {
    try {
      await stream.seek(0);
    } catch (error) {
      // The next plugin sees whatever is left; it will usually reject it
      logDebug('input_stream_rewind_failed', { uri: stream.uri, error: describeError(error).message });
    }
  }

  private async attempt(
    plugin: PlaylistPlugin,
    uri: string,
    open: () => Promise<TrackProvider | null>
  ): Promise<TrackProvider | null> {
    try {
      const provider = await open();
      // An empty provider is no match either
      if (!provider || provider.size === 0) {
        logDebug('playlist_plugin_declined', { plugin: plugin.name, uri });
        return null;
      }
      logEvent('playlist_plugin_matched', { plugin: plugin.name, uri, tracks: provider.size });
      return provider;
    } catch (error) {
      logWarning('playlist_plugin_failed', { plugin: plugin.name, uri, error: describeError(error).message });
      return null;
    }
  }

  private logOutcome(operation: string, uri: string, provider: TrackProvider | null): void {
    if (provider) {
      logEvent(`${operation}_completed`, { uri, tracks: provider.size });
    } else {
      logEvent(`${operation}_no_match`, { uri });
    }
  }
}
