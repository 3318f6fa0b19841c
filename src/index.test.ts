import { describe, it, expect, vi } from 'vitest';
import { createResolver, createDefaultPlugins, loadAppConfig, InputStream } from './index';
import { MemoryInputStream } from './test/fakes';

const SOUNDCLOUD_BODY = '{"tracks":[{"title":"First","duration":61000,"stream_url":"http://sc/1"}]}';

function fakeNetwork() {
  return vi.fn(async (uri: string): Promise<InputStream> => {
    if (uri.startsWith('https://api.soundcloud.com/')) {
      return new MemoryInputStream(uri, SOUNDCLOUD_BODY, { mimeType: 'application/json' });
    }
    if (uri === 'http://radio.example/listen') {
      return new MemoryInputStream(uri, '[playlist]\nFile1=http://radio.example/stream\n', {
        mimeType: 'audio/x-scpls',
      });
    }
    return new MemoryInputStream(uri, '#EXTM3U\n#EXTINF:30,Local\n/music/local.flac\n');
  });
}

describe('createDefaultPlugins', () => {
  it('registers the bundled plugins in dispatch order', () => {
    expect(createDefaultPlugins().map(p => p.name)).toEqual(['extm3u', 'm3u', 'pls', 'soundcloud']);
  });
});

describe('createResolver', () => {
  it('leaves soundcloud disabled without an API key', async () => {
    const { registry } = await createResolver(loadAppConfig({ LOG_TO_FILE: 'false' }));
    expect(registry.enabledPlugins().map(p => p.name)).toEqual(['extm3u', 'm3u', 'pls']);
  });

  it('resolves soundcloud addresses with the configured key', async () => {
    const openStream = fakeNetwork();
    const config = loadAppConfig({ LOG_TO_FILE: 'false', SOUNDCLOUD_APIKEY: 'test-key' });
    const { resolver, registry } = await createResolver(config, { openStream });

    const result = await resolver.resolve('soundcloud://playlist/5');
    expect(result?.stream).toBeNull();
    expect(result?.provider.toArray()).toEqual([
      { uri: 'http://sc/1?client_id=test-key', tag: { name: 'First', durationSeconds: 61 } },
    ]);
    expect(openStream).toHaveBeenCalledWith('https://api.soundcloud.com/playlists/5.json?client_id=test-key');

    await registry.finalize();
  });

  it('resolves remote playlists by content type', async () => {
    const { resolver } = await createResolver(loadAppConfig({ LOG_TO_FILE: 'false' }), { openStream: fakeNetwork() });

    const result = await resolver.resolve('http://radio.example/listen');
    expect(result?.provider.toArray()).toEqual([{ uri: 'http://radio.example/stream', tag: {} }]);
    expect(result?.stream?.uri).toBe('http://radio.example/listen');
  });

  it('resolves local playlists by suffix', async () => {
    const { resolver } = await createResolver(loadAppConfig({ LOG_TO_FILE: 'false' }), { openStream: fakeNetwork() });

    const result = await resolver.resolve('/music/local.m3u');
    expect(result?.provider.toArray()).toEqual([{ uri: '/music/local.flac', tag: { durationSeconds: 30, name: 'Local' } }]);
  });

  it('honours plugins disabled in configuration', async () => {
    const config = loadAppConfig({ LOG_TO_FILE: 'false' });
    const { resolver, registry } = await createResolver(
      { ...config, plugins: { pls: { enabled: false } } },
      { openStream: fakeNetwork() }
    );

    expect(registry.isEnabled('pls')).toBe(false);
    expect(await resolver.resolve('http://radio.example/listen')).toBeNull();
  });
});
