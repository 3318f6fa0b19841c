import { PluginBlock, PluginOptionValue } from '../types/music';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'y']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'n']);

/**
 * Read-only view of one plugin's configuration block. A plugin without a
 * block gets an empty one, which leaves it enabled with default options.
 */
export class PluginConfig {
  private readonly values: ReadonlyMap<string, PluginOptionValue>;

  constructor(block: PluginBlock = {}) {
    this.values = new Map(Object.entries(block));
  }

  static empty(): PluginConfig {
    return new PluginConfig();
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  getString(key: string): string | undefined {
    const value = this.values.get(key);
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return undefined;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const value = this.values.get(key);
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
      const s = value.trim().toLowerCase();
      if (TRUE_VALUES.has(s)) return true;
      if (FALSE_VALUES.has(s)) return false;
    }
    if (typeof value === 'number') return value !== 0;
    return fallback;
  }

  isEnabled(): boolean {
    return this.getBoolean('enabled', true);
  }
}
