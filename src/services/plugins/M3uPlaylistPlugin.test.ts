import { describe, it, expect } from 'vitest';
import { M3uPlaylistPlugin } from './M3uPlaylistPlugin';
import { ExtM3uPlaylistPlugin } from './ExtM3uPlaylistPlugin';
import { PluginRegistry } from '../PluginRegistry';
import { PlaylistResolver } from '../PlaylistResolver';
import { MemoryInputStream } from '../../test/fakes';

// ── M3U ─────────────────────────────────────────────────────────────

describe('M3uPlaylistPlugin', () => {
  const plugin = new M3uPlaylistPlugin();

  it('reads one address per line and skips comments and blanks', async () => {
    const stream = new MemoryInputStream('/music/list.m3u', '# my list\r\nhttp://a/1.mp3\n\n  song two.ogg  \n#EXTINF:3,x\nhttp://a/3.mp3');

    const provider = await plugin.openByStream(stream);
    expect(provider?.toArray().map(t => t.uri)).toEqual(['http://a/1.mp3', 'song two.ogg', 'http://a/3.mp3']);
  });

  it('drops a leading byte order mark', async () => {
    const stream = new MemoryInputStream('/music/list.m3u', '\uFEFFhttp://a/1.mp3\n');

    const provider = await plugin.openByStream(stream);
    expect(provider?.toArray()).toEqual([{ uri: 'http://a/1.mp3', tag: {} }]);
  });

  it('declines a document without entries', async () => {
    const stream = new MemoryInputStream('/music/list.m3u', '#EXTM3U\n\n# nothing\n');
    expect(await plugin.openByStream(stream)).toBeNull();
  });

  it('reads documents larger than one chunk', async () => {
    const uris = Array.from({ length: 300 }, (_, i) => `http://radio.example/stream/${i}.mp3`);
    const stream = new MemoryInputStream('/music/big.m3u', uris.join('\n'));

    const provider = await plugin.openByStream(stream);
    expect(provider?.size).toBe(300);
    expect(provider?.toArray()[299]?.uri).toBe('http://radio.example/stream/299.mp3');
  });

  it('fails when the stream stalls before its end', async () => {
    const stream = new MemoryInputStream('/music/list.m3u', 'http://a/1.mp3\nhttp://a/2.mp3\n', { stallAt: 5 });
    await expect(plugin.openByStream(stream)).rejects.toThrow(/ended before end of stream/);
  });
});

// ── Extended M3U ────────────────────────────────────────────────────

describe('ExtM3uPlaylistPlugin', () => {
  const plugin = new ExtM3uPlaylistPlugin();

  it('attaches EXTINF length and name to the next entry', async () => {
    const stream = new MemoryInputStream(
      '/music/list.m3u',
      '#EXTM3U\n#EXTINF:123 tvg-id="x",Artist  -   Title\nhttp://a/1.mp3\nhttp://a/2.mp3\n'
    );

    const provider = await plugin.openByStream(stream);
    expect(provider?.toArray()).toEqual([
      { uri: 'http://a/1.mp3', tag: { durationSeconds: 123, name: 'Artist - Title' } },
      { uri: 'http://a/2.mp3', tag: {} },
    ]);
  });

  it('treats a negative length as unknown', async () => {
    const stream = new MemoryInputStream('/radio.m3u', '#EXTM3U\n#EXTINF:-1,Live\nhttp://radio/live\n');

    const provider = await plugin.openByStream(stream);
    expect(provider?.toArray()).toEqual([{ uri: 'http://radio/live', tag: { name: 'Live' } }]);
  });

  it('ignores other directives', async () => {
    const stream = new MemoryInputStream('/list.m3u', '#EXTM3U\n#EXTGRP:rock\n#PLAYLIST:Mine\nhttp://a/1.mp3\n');

    const provider = await plugin.openByStream(stream);
    expect(provider?.toArray()).toEqual([{ uri: 'http://a/1.mp3', tag: {} }]);
  });

  it('declines documents without the header', async () => {
    const stream = new MemoryInputStream('/list.m3u', 'http://a/1.mp3\n');
    expect(await plugin.openByStream(stream)).toBeNull();
  });
});

// ── Both through the resolver ───────────────────────────────────────

describe('M3U plugins in registration order', () => {
  async function resolver() {
    const registry = new PluginRegistry([new ExtM3uPlaylistPlugin(), new M3uPlaylistPlugin()]);
    await registry.initialize();
    return new PlaylistResolver(registry);
  }

  it('lets the plain plugin read what the extended one declined', async () => {
    const stream = new MemoryInputStream('http://h/list', 'http://a/1.mp3\nhttp://a/2.mp3\n', {
      mimeType: 'audio/x-mpegurl',
    });

    const provider = await (await resolver()).resolveByStream(stream);
    expect(provider?.toArray().map(t => t.uri)).toEqual(['http://a/1.mp3', 'http://a/2.mp3']);
    // rewound before each of the two attempts
    expect(stream.seekPositions).toEqual([0, stream.data.length]);
  });

  it('prefers the extended plugin when the header is present', async () => {
    const stream = new MemoryInputStream('/music/list.m3u', '#EXTM3U\n#EXTINF:60,One\nhttp://a/1.mp3\n');

    const provider = await (await resolver()).resolveByStream(stream);
    expect(provider?.toArray()).toEqual([{ uri: 'http://a/1.mp3', tag: { durationSeconds: 60, name: 'One' } }]);
  });
});
