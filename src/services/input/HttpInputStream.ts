import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { InputStream } from './InputStream';
import { TransportError } from '../../utils/errors';
import { logDebug } from '../../utils/logger';

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

function describeFailure(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.code ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Streams an HTTP(S) response body. The request starts on the first
 * `waitReady()` or `read()`; rewinding after data was consumed issues a
 * fresh request.
 */
export class HttpInputStream implements InputStream {
  private ready: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private body: Readable | null = null;
  private iterator: AsyncIterator<unknown> | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private offset = 0;
  private eof = false;
  private closed = false;
  private mimeType: string | undefined;

  constructor(
    readonly uri: string,
    private readonly http: AxiosInstance,
  ) {}

  waitReady(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError(`Stream closed: ${this.uri}`, this.uri));
    }
    if (!this.ready) {
      this.ready = this.request();
    }
    return this.ready;
  }

  getMimeType(): string | undefined {
    return this.mimeType;
  }

  async read(size: number): Promise<Buffer> {
    await this.waitReady();

    while (this.pending.length === 0 && !this.eof) {
      const iterator = this.iterator;
      if (!iterator || this.closed) {
        throw new TransportError(`Stream closed: ${this.uri}`, this.uri);
      }

      let next: IteratorResult<unknown>;
      try {
        next = await iterator.next();
      } catch (error) {
        throw new TransportError(`Read failed on ${this.uri}: ${describeFailure(error)}`, this.uri, error);
      }

      if (this.closed) {
        throw new TransportError(`Stream closed: ${this.uri}`, this.uri);
      }
      if (next.done) {
        this.eof = true;
      } else {
        this.pending = toBuffer(next.value);
      }
    }

    const chunk = this.pending.subarray(0, size);
    this.pending = this.pending.subarray(chunk.length);
    this.offset += chunk.length;
    return chunk;
  }

  isEof(): boolean {
    return this.eof && this.pending.length === 0;
  }

  async seek(offset: number): Promise<void> {
    if (offset !== 0) {
      throw new TransportError(`Cannot seek to ${offset} on ${this.uri}`, this.uri);
    }
    await this.waitReady();
    // Nothing handed out yet: the buffered head is still the start of the body
    if (this.offset === 0) return;

    logDebug('http_input_stream_restart', { uri: this.uri, consumed: this.offset });
    this.release();
    this.pending = Buffer.alloc(0);
    this.offset = 0;
    this.eof = false;
    this.ready = this.request();
    await this.ready;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.release();
  }

  private async request(): Promise<void> {
    const controller = new AbortController();
    this.controller = controller;

    try {
      const response = await this.http.get<Readable>(this.uri, {
        responseType: 'stream',
        signal: controller.signal,
      });
      if (this.closed) {
        response.data.destroy();
        throw new TransportError(`Stream closed: ${this.uri}`, this.uri);
      }

      this.body = response.data;
      this.iterator = response.data[Symbol.asyncIterator]();
      const contentType = response.headers['content-type'];
      this.mimeType = typeof contentType === 'string' ? contentType : undefined;
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (axios.isAxiosError(error)) {
        const data: unknown = error.response?.data;
        if (data instanceof Readable) data.destroy();
      }
      throw new TransportError(`Failed to open ${this.uri}: ${describeFailure(error)}`, this.uri, error);
    }
  }

  private release(): void {
    this.controller?.abort();
    this.controller = null;
    this.body?.destroy();
    this.body = null;
    this.iterator = null;
  }
}
