import { PluginBlock } from '../types/music';
import { PluginConfig } from '../config/pluginConfig';
import { PlaylistPlugin } from './plugins/types';
import { logEvent, logError, logWarning, describeError } from '../utils/logger';

export interface RegistryEntry {
  readonly plugin: PlaylistPlugin;
  readonly enabled: boolean;
}

export type PluginConfigs = Record<string, PluginBlock | PluginConfig>;

/**
 * Fixed, ordered plugin table plus the enabled flag of each entry. Dispatch
 * order is registration order. Flags are decided once by `initialize()`
 * and stay put until `finalize()`.
 */
export class PluginRegistry {
  private readonly plugins: ReadonlyArray<PlaylistPlugin>;
  private readonly enabled: boolean[];
  private initialized = false;

  constructor(plugins: ReadonlyArray<PlaylistPlugin>) {
    const names = new Set<string>();
    for (const plugin of plugins) {
      if (names.has(plugin.name)) {
        throw new Error(`Duplicate playlist plugin name: ${plugin.name}`);
      }
      names.add(plugin.name);
    }

    this.plugins = [...plugins];
    this.enabled = plugins.map(() => false);
  }

  get size(): number {
    return this.plugins.length;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async initialize(configs: PluginConfigs = {}): Promise<void> {
    if (this.initialized) {
      throw new Error('Plugin registry is already initialized');
    }
    this.initialized = true;

    for (const [index, plugin] of this.plugins.entries()) {
      const raw = configs[plugin.name];
      const config = raw instanceof PluginConfig ? raw : new PluginConfig(raw);

      if (raw !== undefined && !config.isEnabled()) {
        logEvent('playlist_plugin_disabled_by_config', { plugin: plugin.name });
        continue;
      }

      this.enabled[index] = await this.initPlugin(plugin, config);
    }

    const enabledNames = this.enabledPlugins().map(p => p.name);
    logEvent('plugin_registry_initialized', {
      totalPlugins: this.plugins.length,
      enabledPlugins: enabledNames.length,
      enabledPluginNames: enabledNames
    });

    if (enabledNames.length === 0) {
      logWarning('No playlist plugins are enabled');
    }
  }

  async finalize(): Promise<void> {
    for (const [index, plugin] of this.plugins.entries()) {
      if (!this.enabled[index] || !plugin.finish) continue;

      try {
        await plugin.finish();
      } catch (error) {
        logError(`Playlist plugin finish failed: ${plugin.name}`, describeError(error), { plugin: plugin.name });
      }
    }
    logEvent('plugin_registry_finalized', { plugins: this.plugins.length });
  }

  getEntries(): RegistryEntry[] {
    return this.plugins.map((plugin, index) => ({ plugin, enabled: this.enabled[index] === true }));
  }

  /** Enabled plugins in registration order. */
  enabledPlugins(): PlaylistPlugin[] {
    return this.plugins.filter((_, index) => this.enabled[index] === true);
  }

  isEnabled(name: string): boolean {
    const index = this.plugins.findIndex(p => p.name === name);
    return index >= 0 && this.enabled[index] === true;
  }

  getPlugin(name: string): PlaylistPlugin | null {
    return this.plugins.find(p => p.name === name) || null;
  }

  /** True when some enabled plugin claims `suffix`. */
  isSuffixSupported(suffix: string): boolean {
    const wanted = suffix.toLowerCase();
    return this.enabledPlugins().some(plugin => plugin.suffixes?.has(wanted) === true);
  }

  private async initPlugin(plugin: PlaylistPlugin, config: PluginConfig): Promise<boolean> {
    if (!plugin.init) {
      logEvent('playlist_plugin_enabled', { plugin: plugin.name });
      return true;
    }

    try {
      const ok = await plugin.init(config);
      if (ok) {
        logEvent('playlist_plugin_enabled', { plugin: plugin.name });
      } else {
        logWarning('playlist_plugin_init_declined', { plugin: plugin.name });
      }
      return ok;
    } catch (error) {
      logError(`Playlist plugin init failed: ${plugin.name}`, describeError(error), { plugin: plugin.name });
      return false;
    }
  }
}
