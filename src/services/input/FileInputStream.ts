import { open, FileHandle } from 'fs/promises';
import { InputStream } from './InputStream';
import { TransportError } from '../../utils/errors';

export class FileInputStream implements InputStream {
  private position = 0;
  private eof = false;
  private closed = false;

  private constructor(
    readonly uri: string,
    private readonly handle: FileHandle,
    readonly size: number,
  ) {}

  static async open(path: string): Promise<FileInputStream> {
    let handle: FileHandle;
    try {
      handle = await open(path, 'r');
    } catch (error) {
      throw new TransportError(`Failed to open ${path}`, path, error);
    }

    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new TransportError(`Not a regular file: ${path}`, path);
      }
      return new FileInputStream(path, handle, stats.size);
    } catch (error) {
      await handle.close();
      if (error instanceof TransportError) throw error;
      throw new TransportError(`Failed to stat ${path}`, path, error);
    }
  }

  async waitReady(): Promise<void> {
    this.assertOpen();
  }

  getMimeType(): string | undefined {
    return undefined;
  }

  async read(size: number): Promise<Buffer> {
    this.assertOpen();
    if (this.eof) return Buffer.alloc(0);

    const buffer = Buffer.alloc(size);
    let bytesRead: number;
    try {
      ({ bytesRead } = await this.handle.read(buffer, 0, size, this.position));
    } catch (error) {
      throw new TransportError(`Read failed on ${this.uri}`, this.uri, error);
    }
    // close() while the read was pending
    this.assertOpen();

    if (bytesRead === 0) {
      this.eof = true;
    }
    this.position += bytesRead;
    return buffer.subarray(0, bytesRead);
  }

  isEof(): boolean {
    return this.eof;
  }

  async seek(offset: number): Promise<void> {
    this.assertOpen();
    if (offset < 0 || offset > this.size) {
      throw new TransportError(`Seek offset ${offset} out of range`, this.uri);
    }
    this.position = offset;
    this.eof = false;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new TransportError(`Stream closed: ${this.uri}`, this.uri);
    }
  }
}
