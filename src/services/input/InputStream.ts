import { logWarning, describeError } from '../../utils/logger';

/**
 * Byte source a playlist plugin reads from. The opener owns the stream and
 * must close it; closing also fails any read still waiting for data.
 */
export interface InputStream {
  readonly uri: string;

  /** Resolves once metadata such as the content type is known. */
  waitReady(): Promise<void>;

  getMimeType(): string | undefined;

  /**
   * Up to `size` bytes. An empty buffer means the stream ended, which
   * `isEof()` confirms; any other empty read is a failure.
   */
  read(size: number): Promise<Buffer>;

  isEof(): boolean;

  /** Only rewinding to offset 0 has to be supported. */
  seek(offset: number): Promise<void>;

  close(): Promise<void>;
}

export type OpenInputStream = (uri: string) => Promise<InputStream>;

export const READ_CHUNK_SIZE = 4096;

/** Close a stream on a failure path; a close error is logged, not rethrown. */
export async function closeQuietly(stream: InputStream): Promise<void> {
  try {
    await stream.close();
  } catch (error) {
    logWarning('input_stream_close_failed', { uri: stream.uri, error: describeError(error).message });
  }
}
