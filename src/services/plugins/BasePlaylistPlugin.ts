import { Track, TrackTag } from '../../types/music';
import { PlaylistPlugin } from './types';

export interface PluginCapabilities {
  schemes?: ReadonlyArray<string>;
  suffixes?: ReadonlyArray<string>;
  mimeTypes?: ReadonlyArray<string>;
}

function toSet(values?: ReadonlyArray<string>): ReadonlySet<string> | undefined {
  return values ? new Set(values.map(v => v.toLowerCase())) : undefined;
}

/**
 * Shared plumbing for the bundled plugins: name, lookup sets and track
 * construction. Open operations are left to subclasses so a plugin only
 * advertises the capabilities it really has.
 */
export abstract class BasePlaylistPlugin implements PlaylistPlugin {
  readonly name: string;
  readonly schemes?: ReadonlySet<string>;
  readonly suffixes?: ReadonlySet<string>;
  readonly mimeTypes?: ReadonlySet<string>;

  constructor(name: string, capabilities: PluginCapabilities) {
    this.name = name;

    const schemes = toSet(capabilities.schemes);
    if (schemes) this.schemes = schemes;
    const suffixes = toSet(capabilities.suffixes);
    if (suffixes) this.suffixes = suffixes;
    const mimeTypes = toSet(capabilities.mimeTypes);
    if (mimeTypes) this.mimeTypes = mimeTypes;
  }

  protected createTrack(data: { uri: string; durationSeconds?: number; name?: string }): Track {
    const tag: TrackTag = {};

    if (data.durationSeconds !== undefined && Number.isInteger(data.durationSeconds) && data.durationSeconds >= 0) {
      tag.durationSeconds = data.durationSeconds;
    }

    if (data.name !== undefined) {
      tag.name = data.name;
    }

    return { uri: data.uri, tag };
  }

  protected cleanTitle(title: string): string {
    return title
      .replace(/\s+/g, ' ')
      .trim();
  }
}
