import { describe, it, expect } from 'vitest';
import { ClarinetJsonEventSource } from './ClarinetJsonEventSource';
import { JsonEventHandler } from './JsonTrackHandler';
import { PlaylistParseError } from '../../utils/errors';

class RecordingHandler implements JsonEventHandler {
  readonly events: string[] = [];

  onMapKey(key: string): void {
    this.events.push(`key:${key}`);
  }
  onString(value: string): void {
    this.events.push(`string:${value}`);
  }
  onInteger(value: number): void {
    this.events.push(`integer:${value}`);
  }
  onStartObject(): void {
    this.events.push('{');
  }
  onEndObject(): void {
    this.events.push('}');
  }
}

const DOCUMENT = '{"a":"x","b":2,"c":[{"d":1.5,"e":true}],"f":{}}';
const EXPECTED = ['{', 'key:a', 'string:x', 'key:b', 'integer:2', 'key:c', '{', 'key:d', 'key:e', '}', 'key:f', '{', '}', '}'];

describe('ClarinetJsonEventSource', () => {
  it('translates a document into handler events', () => {
    const handler = new RecordingHandler();
    const source = new ClarinetJsonEventSource(handler);
    source.write(Buffer.from(DOCUMENT));
    source.end();

    expect(handler.events).toEqual(EXPECTED);
  });

  it('produces the same events when fed one byte at a time', () => {
    const handler = new RecordingHandler();
    const source = new ClarinetJsonEventSource(handler);
    const bytes = Buffer.from(DOCUMENT);
    for (let i = 0; i < bytes.length; i++) {
      source.write(bytes.subarray(i, i + 1));
    }
    source.end();

    expect(handler.events).toEqual(EXPECTED);
  });

  it('decodes multi-byte characters split across chunks', () => {
    const handler = new RecordingHandler();
    const source = new ClarinetJsonEventSource(handler);
    const bytes = Buffer.from('{"t":"Straße ☕"}');
    const middleOfSharpS = bytes.indexOf(0xc3) + 1;
    source.write(bytes.subarray(0, middleOfSharpS));
    source.write(bytes.subarray(middleOfSharpS));
    source.end();

    expect(handler.events).toEqual(['{', 'key:t', 'string:Straße ☕', '}']);
  });

  it('throws a parse error on malformed input', () => {
    const source = new ClarinetJsonEventSource(new RecordingHandler(), 'http://api/x.json');
    let thrown: unknown;
    try {
      source.write(Buffer.from('{"a":}'));
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(PlaylistParseError);
    expect(thrown).toMatchObject({ uri: 'http://api/x.json' });
    expect(String(thrown)).toMatch(/Malformed JSON: /);
  });

  it('keeps failing after the first error', () => {
    const source = new ClarinetJsonEventSource(new RecordingHandler());
    expect(() => source.write(Buffer.from('{"a":}'))).toThrow(PlaylistParseError);
    expect(() => source.write(Buffer.from('{"b":1}'))).toThrow(PlaylistParseError);
    expect(() => source.end()).toThrow(PlaylistParseError);
  });

  it('rejects a truncated document at end', () => {
    const source = new ClarinetJsonEventSource(new RecordingHandler());
    source.write(Buffer.from('{"tracks":[{"stream_url":"http://a"},{"stream_url":"http://b"'));
    expect(() => source.end()).toThrow(PlaylistParseError);
  });

  it('rejects an empty document', () => {
    const source = new ClarinetJsonEventSource(new RecordingHandler());
    expect(() => source.end()).toThrow(PlaylistParseError);
  });

  it('rejects a whitespace-only document', () => {
    const source = new ClarinetJsonEventSource(new RecordingHandler());
    source.write(Buffer.from('  \n '));
    expect(() => source.end()).toThrow(PlaylistParseError);
  });
});
