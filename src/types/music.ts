export interface TrackTag {
  durationSeconds?: number; // whole seconds, never negative
  name?: string;
}

export interface Track {
  uri: string;
  tag: TrackTag;
}

/**
 * Ordered, finite track list handed to the caller after a successful
 * resolution. Iterating always starts from the first track.
 */
export interface TrackProvider extends Iterable<Track> {
  readonly size: number;
  read(): Track | null;
  rewind(): void;
  toArray(): Track[];
}

export type PluginOptionValue = string | number | boolean;

export type PluginBlock = Record<string, PluginOptionValue>;

export interface AppConfig {
  logging: {
    level: string;
    toFile: boolean;
    directory: string;
    maxSizeBytes?: number;
    maxFiles?: number;
  };
  http: {
    timeoutMs: number;
  };
  // Raw plugin blocks keyed by plugin name
  plugins: Record<string, PluginBlock>;
}
