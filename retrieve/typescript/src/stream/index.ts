/**
 * Push-back buffering over a raw byte connection.
 *
 * The response parser reads more than it can use whenever a token (a status
 * line, a header line, a chunk-size line) straddles a read boundary. It hands
 * the unused bytes back with `push()`, and the next `read()` replays them
 * before touching the connection again.
 */

import { RetrieveError } from '../errors';
import { Logger, NoopLogger } from '../observability';

/** Largest single read issued while parsing a response (16 KiB). */
export const DEFAULT_CHUNK_SIZE = 16 * 1024;

/**
 * A raw, bidirectional byte connection.
 */
export interface ByteConnection {
  /**
   * Resolves with between 1 and `max` bytes, or with an empty buffer once the
   * peer has finished sending.
   */
  read(max: number): Promise<Buffer>;
  /** Writes bytes to the peer. */
  write(data: Uint8Array): Promise<void>;
  /** Flushes pending writes. */
  flush(): Promise<void>;
  /** Closes the connection. */
  close(): void;
  /** Whether the connection has been closed. */
  readonly closed: boolean;
  /**
   * Resolves true once data (or EOF) is available to read, or false if
   * `timeoutMs` elapses first. Consumes nothing.
   */
  waitReadable(timeoutMs: number): Promise<boolean>;
}

/**
 * Buffered stream with push-back semantics.
 */
export class BufferedStream {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly connection: ByteConnection;
  private readonly logger: Logger;

  constructor(connection: ByteConnection, logger: Logger = new NoopLogger()) {
    this.connection = connection;
    this.logger = logger;
  }

  /** Bytes pushed back and not yet re-read. */
  get bufferedLength(): number {
    return this.buffer.length;
  }

  /** Whether the underlying connection is closed. */
  get closed(): boolean {
    return this.connection.closed;
  }

  /**
   * Reads up to `n` bytes, buffered bytes first.
   *
   * With `partial` set, at most one read is issued against the connection, so
   * fewer than `n` bytes may come back. Without it, reads continue until `n`
   * bytes are collected or the connection reaches EOF.
   *
   * Resolves empty only when the buffer is empty and the connection was
   * already closed. If the connection had to be read and produced nothing,
   * the response ended early and an `UnexpectedEof` error is raised.
   */
  async read(n: number, partial = false): Promise<Buffer> {
    const parts: Buffer[] = [];
    let total = 0;

    const buffered = this.pop(n);
    if (buffered.length > 0) {
      parts.push(buffered);
      total += buffered.length;
    }

    let attempted = false;
    while (total < n && !this.connection.closed) {
      attempted = true;
      const chunk = await this.connection.read(n - total);
      if (chunk.length === 0) {
        this.close();
        break;
      }
      parts.push(chunk);
      total += chunk.length;
      if (partial) {
        break;
      }
    }

    if (attempted && total === 0) {
      throw RetrieveError.unexpectedEof();
    }

    return Buffer.concat(parts, total);
  }

  /**
   * Returns unconsumed bytes to the front of the buffer.
   */
  push(data: Uint8Array): void {
    if (data.length > 0) {
      this.buffer = Buffer.concat([data, this.buffer]);
    }
  }

  /**
   * Waits until a read can make progress, or `timeoutMs` passes.
   */
  async waitReadable(timeoutMs: number): Promise<boolean> {
    if (this.buffer.length > 0 || this.connection.closed) {
      return true;
    }
    return this.connection.waitReadable(timeoutMs);
  }

  async write(data: Uint8Array): Promise<void> {
    this.ensureOpen();
    await this.connection.write(data);
  }

  async flush(): Promise<void> {
    this.ensureOpen();
    await this.connection.flush();
  }

  /**
   * Closes the underlying connection. Safe to call more than once.
   */
  close(): void {
    if (this.connection.closed) {
      return;
    }
    try {
      this.connection.close();
    } catch (err) {
      this.logger.debug('Ignoring error while closing connection', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private pop(n: number): Buffer {
    const taken = this.buffer.subarray(0, n);
    this.buffer = this.buffer.subarray(taken.length);
    return taken;
  }

  private ensureOpen(): void {
    if (this.connection.closed) {
      throw RetrieveError.connectionClosed();
    }
  }
}
