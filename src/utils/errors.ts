/** Open or read failure on an input stream, including a read that stops short of EOF. */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly uri: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** Malformed or truncated playlist document. */
export class PlaylistParseError extends Error {
  constructor(
    message: string,
    public readonly uri?: string,
  ) {
    super(message);
    this.name = 'PlaylistParseError';
  }
}
