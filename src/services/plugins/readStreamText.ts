import { StringDecoder } from 'string_decoder';
import { InputStream, READ_CHUNK_SIZE } from '../input/InputStream';
import { PlaylistParseError, TransportError } from '../../utils/errors';

export const MAX_PLAYLIST_TEXT_BYTES = 1024 * 1024;

/**
 * Read a whole text playlist from the current stream position. Multi-byte
 * characters split across chunks are decoded intact; a leading BOM is
 * dropped.
 */
export async function readStreamText(
  stream: InputStream,
  limit: number = MAX_PLAYLIST_TEXT_BYTES
): Promise<string> {
  const decoder = new StringDecoder('utf8');
  let text = '';
  let total = 0;

  for (;;) {
    const chunk = await stream.read(READ_CHUNK_SIZE);
    if (chunk.length === 0) {
      if (!stream.isEof()) {
        throw new TransportError(`Read from ${stream.uri} ended before end of stream`, stream.uri);
      }
      break;
    }

    total += chunk.length;
    if (total > limit) {
      throw new PlaylistParseError(`Playlist exceeds ${limit} bytes`, stream.uri);
    }
    text += decoder.write(chunk);
  }

  text += decoder.end();
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}

export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}
