import { parser as createJsonParser } from 'clarinet';
import { StringDecoder } from 'string_decoder';
import { JsonEventHandler } from './JsonTrackHandler';
import { PlaylistParseError } from '../../utils/errors';

/** Feeds a JSON document chunk by chunk through clarinet into a handler. */
export interface JsonEventSource {
  write(chunk: Buffer): void;
  /** Flush trailing state; throws when the document is incomplete. */
  end(): void;
}

export class ClarinetJsonEventSource implements JsonEventSource {
  private readonly parser = createJsonParser();
  private readonly decoder = new StringDecoder('utf8');
  private failure: Error | null = null;
  private depth = 0;
  private sawValue = false;

  constructor(handler: JsonEventHandler, private readonly uri?: string) {
    // clarinet reports the first key of an object together with the open event
    this.parser.onopenobject = (key?: string) => {
      this.open();
      handler.onStartObject();
      if (key !== undefined) handler.onMapKey(key);
    };
    this.parser.onkey = (key: string) => handler.onMapKey(key);
    this.parser.oncloseobject = () => {
      this.depth--;
      handler.onEndObject();
    };
    this.parser.onopenarray = () => this.open();
    this.parser.onclosearray = () => {
      this.depth--;
    };
    this.parser.onvalue = (value: unknown) => {
      this.sawValue = true;
      if (typeof value === 'string') {
        handler.onString(value);
      } else if (typeof value === 'number' && Number.isInteger(value)) {
        handler.onInteger(value);
      }
    };
    this.parser.onerror = (error: Error) => {
      this.failure ??= error;
    };
  }

  write(chunk: Buffer): void {
    const text = this.decoder.write(chunk);
    if (text !== '') {
      this.run(() => this.parser.write(text));
    }
  }

  end(): void {
    const tail = this.decoder.end();
    if (tail !== '') {
      this.run(() => this.parser.write(tail));
    }
    this.run(() => this.parser.close());

    if (!this.sawValue) {
      throw new PlaylistParseError('Empty JSON document', this.uri);
    }
    if (this.depth !== 0) {
      throw new PlaylistParseError('Unexpected end of JSON document', this.uri);
    }
  }

  private open(): void {
    this.sawValue = true;
    this.depth++;
  }

  private run(step: () => unknown): void {
    if (!this.failure) {
      try {
        step();
      } catch (error) {
        this.failure = error instanceof Error ? error : new Error(String(error));
      }
    }
    if (this.failure) {
      throw new PlaylistParseError(`Malformed JSON: ${this.failure.message.split('\n')[0] ?? ''}`, this.uri);
    }
  }
}
