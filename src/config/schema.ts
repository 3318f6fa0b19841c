import fs from 'fs';
import { z } from 'zod';
import { AppConfig, PluginBlock } from '../types/music';

// Helpers to coerce and validate env values
const bool = () =>
  z.preprocess((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'string') {
      const s = v.trim().toLowerCase();
      if (['true', '1', 'yes', 'y'].includes(s)) return true;
      if (['false', '0', 'no', 'n'].includes(s)) return false;
    }
    return v;
  }, z.boolean());

const intInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
    }
    return def;
  }, z.number().int().min(min).max(max));

const allowedLogLevels: ReadonlyArray<string> = ['error', 'warn', 'info', 'debug', 'verbose', 'silly'];

const EnvSchema = z.object({
  LOG_LEVEL: z.string().optional(),
  LOG_TO_FILE: bool().optional().default(true),
  LOG_DIR: z.string().min(1).optional().default('logs'),
  LOG_MAX_SIZE_MB: intInRange(1, 200, 10).optional().default(10),
  LOG_MAX_FILES: intInRange(1, 20, 3).optional().default(3),

  HTTP_TIMEOUT_SECONDS: intInRange(1, 600, 30).optional().default(30),

  PLAYLIST_PLUGINS_FILE: z.string().optional(),
  SOUNDCLOUD_APIKEY: z.string().optional(),
});

const PluginBlockSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const PluginsFileSchema = z.record(PluginBlockSchema);

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Read the JSON document of plugin blocks, e.g.
 * `{ "soundcloud": { "apikey": "..." }, "pls": { "enabled": false } }`.
 */
export function loadPluginsFile(filePath: string): Record<string, PluginBlock> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read plugin configuration ${filePath}: ${reason}`);
  }

  const parsed = PluginsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid plugin configuration in ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadAppConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${formatIssues(parsed.error)}`);
  }
  const env = parsed.data;
  const nodeEnv = (source.NODE_ENV || '').toLowerCase();
  const defaultLogLevel = nodeEnv === 'production' ? 'info' : 'debug';
  const inputLevel = env.LOG_LEVEL ? env.LOG_LEVEL.trim().toLowerCase() : defaultLogLevel;
  const level = allowedLogLevels.includes(inputLevel) ? inputLevel : defaultLogLevel;

  const plugins: Record<string, PluginBlock> = env.PLAYLIST_PLUGINS_FILE
    ? loadPluginsFile(env.PLAYLIST_PLUGINS_FILE)
    : {};

  // SOUNDCLOUD_APIKEY overrides the file value
  if (env.SOUNDCLOUD_APIKEY) {
    plugins.soundcloud = { ...plugins.soundcloud, apikey: env.SOUNDCLOUD_APIKEY };
  }

  return {
    logging: {
      level,
      toFile: env.LOG_TO_FILE,
      directory: env.LOG_DIR,
      maxSizeBytes: env.LOG_MAX_SIZE_MB * 1024 * 1024,
      maxFiles: env.LOG_MAX_FILES,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_SECONDS * 1000,
    },
    plugins,
  };
}
