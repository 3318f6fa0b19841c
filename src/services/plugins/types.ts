import { TrackProvider } from '../../types/music';
import { PluginConfig } from '../../config/pluginConfig';
import { InputStream } from '../input/InputStream';

/**
 * A playlist source. Every capability is optional: dispatch only calls
 * what a plugin provides, and a missing one simply means "not applicable".
 * Open operations resolve to null when the address or stream is not
 * accepted.
 */
export interface PlaylistPlugin {
  readonly name: string;

  readonly schemes?: ReadonlySet<string>;
  readonly suffixes?: ReadonlySet<string>;
  readonly mimeTypes?: ReadonlySet<string>;

  /** Returns false when the plugin cannot run with this configuration. */
  init?(config: PluginConfig): boolean | Promise<boolean>;
  finish?(): void | Promise<void>;

  openByUri?(uri: string): Promise<TrackProvider | null>;
  openByStream?(stream: InputStream, uri?: string): Promise<TrackProvider | null>;
}
