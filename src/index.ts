import { AppConfig } from './types/music';
import { PluginRegistry } from './services/PluginRegistry';
import { PlaylistResolver } from './services/PlaylistResolver';
import { PlaylistPlugin } from './services/plugins/types';
import { OpenInputStream } from './services/input/InputStream';
import { ExtM3uPlaylistPlugin } from './services/plugins/ExtM3uPlaylistPlugin';
import { M3uPlaylistPlugin } from './services/plugins/M3uPlaylistPlugin';
import { PlsPlaylistPlugin } from './services/plugins/PlsPlaylistPlugin';
import { SoundCloudPlaylistPlugin } from './services/plugins/SoundCloudPlaylistPlugin';

export type { Track, TrackTag, TrackProvider, AppConfig, PluginBlock } from './types/music';
export type { PlaylistPlugin } from './services/plugins/types';
export type { InputStream, OpenInputStream } from './services/input/InputStream';
export type { Resolution } from './services/PlaylistResolver';
export type { RegistryEntry, PluginConfigs } from './services/PluginRegistry';
export { PluginConfig } from './config/pluginConfig';
export { loadAppConfig } from './config/schema';
export { PluginRegistry } from './services/PluginRegistry';
export { PlaylistResolver } from './services/PlaylistResolver';
export { MemoryTrackProvider } from './services/MemoryTrackProvider';
export { BasePlaylistPlugin } from './services/plugins/BasePlaylistPlugin';
export { ExtM3uPlaylistPlugin } from './services/plugins/ExtM3uPlaylistPlugin';
export { M3uPlaylistPlugin } from './services/plugins/M3uPlaylistPlugin';
export { PlsPlaylistPlugin } from './services/plugins/PlsPlaylistPlugin';
export { SoundCloudPlaylistPlugin } from './services/plugins/SoundCloudPlaylistPlugin';
export { FileInputStream } from './services/input/FileInputStream';
export { HttpInputStream } from './services/input/HttpInputStream';
export { openInputStream, createStreamOpener } from './services/input/openInputStream';
export { TransportError, PlaylistParseError } from './utils/errors';

/** The bundled plugins in dispatch order. */
export function createDefaultPlugins(opts?: { openStream?: OpenInputStream }): PlaylistPlugin[] {
  return [
    new ExtM3uPlaylistPlugin(),
    new M3uPlaylistPlugin(),
    new PlsPlaylistPlugin(),
    new SoundCloudPlaylistPlugin(opts),
  ];
}

export function createDefaultRegistry(opts?: { openStream?: OpenInputStream }): PluginRegistry {
  return new PluginRegistry(createDefaultPlugins(opts));
}

/**
 * Registry of the bundled plugins, initialized from `config.plugins`, behind
 * a resolver. Call `registry.finalize()` on shutdown.
 */
export async function createResolver(
  config: AppConfig,
  opts?: { openStream?: OpenInputStream }
): Promise<{ registry: PluginRegistry; resolver: PlaylistResolver }> {
  const registry = createDefaultRegistry(opts);
  await registry.initialize(config.plugins);
  const resolver = new PlaylistResolver(registry, opts);
  return { registry, resolver };
}
