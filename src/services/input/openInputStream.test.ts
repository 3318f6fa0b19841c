import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import axios from 'axios';
import { openInputStream, createStreamOpener } from './openInputStream';
import { FileInputStream } from './FileInputStream';
import { HttpInputStream } from './HttpInputStream';
import { TransportError } from '../../utils/errors';

let tempDir: string;
let file: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tracklist-open-'));
  file = path.join(tempDir, 'list.m3u');
  fs.writeFileSync(file, 'http://a/1.mp3\n', 'utf8');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('openInputStream', () => {
  it('opens plain paths from disk', async () => {
    const stream = await openInputStream(file);
    expect(stream).toBeInstanceOf(FileInputStream);
    expect(stream.uri).toBe(file);
    await stream.close();
  });

  it('opens file uris from disk', async () => {
    const stream = await openInputStream(pathToFileURL(file).href);
    expect(stream).toBeInstanceOf(FileInputStream);
    expect((await stream.read(64)).toString()).toBe('http://a/1.mp3\n');
    await stream.close();
  });

  it('creates lazy http streams without connecting', async () => {
    const stream = await openInputStream('http://127.0.0.1:9/list.m3u');
    expect(stream).toBeInstanceOf(HttpInputStream);
    await stream.close();
  });

  it('rejects schemes it cannot read', async () => {
    await expect(openInputStream('soundcloud://track/1')).rejects.toBeInstanceOf(TransportError);
  });

  it('binds a custom http client', async () => {
    const open = createStreamOpener(axios.create());
    const stream = await open('https://example.invalid/list.pls');
    expect(stream).toBeInstanceOf(HttpInputStream);
    await stream.close();
  });
});
