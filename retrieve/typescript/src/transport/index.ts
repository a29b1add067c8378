/**
 * TCP transport and connection lifecycle.
 */

import * as net from 'net';
import { EventEmitter } from 'events';
import { RetrieveError, RetrieveErrorKind } from '../errors';
import { Logger, MetricsCollector, NoopLogger } from '../observability';
import { BufferedStream, ByteConnection } from '../stream';

/** Default port for the http scheme. */
export const HTTP_DEFAULT_PORT = 80;

/**
 * Opens raw byte connections.
 */
export interface Connector {
  /** Opens a connection, failing if it takes longer than `timeoutMs`. */
  connect(host: string, port: number, timeoutMs: number): Promise<ByteConnection>;
}

/**
 * Byte connection over a `net.Socket` held in paused mode.
 */
export class SocketConnection implements ByteConnection {
  private readonly socket: net.Socket;
  private ended = false;
  private failure: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: net.Socket) {
    this.socket = socket;
    socket.on('readable', this.wake);
    socket.on('end', () => {
      this.ended = true;
      this.wake();
    });
    socket.on('error', (err: Error) => {
      this.failure = err;
      this.wake();
    });
    socket.on('close', this.wake);
  }

  get closed(): boolean {
    return this.socket.destroyed;
  }

  async read(max: number): Promise<Buffer> {
    for (;;) {
      const chunk: unknown = this.socket.read();
      if (Buffer.isBuffer(chunk)) {
        if (chunk.length > max) {
          this.socket.unshift(chunk.subarray(max));
          return chunk.subarray(0, max);
        }
        return chunk;
      }
      if (this.failure) {
        throw new RetrieveError(RetrieveErrorKind.ConnectionReset, this.failure.message, {
          cause: this.failure,
        });
      }
      if (this.ended || this.socket.destroyed) {
        return Buffer.alloc(0);
      }
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  write(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(new RetrieveError(RetrieveErrorKind.ConnectionReset, err.message, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  // Each write callback already fires once the bytes are handed to the kernel.
  flush(): Promise<void> {
    return Promise.resolve();
  }

  close(): void {
    this.socket.destroy();
  }

  waitReadable(timeoutMs: number): Promise<boolean> {
    if (this.socket.readableLength > 0 || this.ended || this.failure || this.socket.destroyed) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const waiter = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(false);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  private readonly wake = (): void => {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  };
}

/**
 * Connector that opens plain TCP sockets.
 */
export class TcpConnector implements Connector {
  connect(host: string, port: number, timeoutMs: number): Promise<ByteConnection> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const timeout = setTimeout(() => {
        socket.destroy();
        reject(
          new RetrieveError(
            RetrieveErrorKind.ConnectTimeout,
            `Connection timeout after ${timeoutMs}ms`
          )
        );
      }, timeoutMs);

      const onError = (err: Error): void => {
        clearTimeout(timeout);
        reject(new RetrieveError(RetrieveErrorKind.ConnectionRefused, err.message, { cause: err }));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timeout);
        socket.removeListener('error', onError);
        socket.setNoDelay(true);
        resolve(new SocketConnection(socket));
      });
    });
  }
}

/**
 * Builds the pool key for a host and port.
 */
export function poolKey(host: string, port: number): string {
  return `${host}:${port}`;
}

/**
 * Open streams keyed by "host:port".
 *
 * Passing one pool to several opens keeps their connections alive between
 * requests. The pool is not synchronized: sharing it between opens that are
 * in flight at the same time is the caller's responsibility.
 *
 * Emits `added` and `removed` with the key.
 */
export class ConnectionPool extends EventEmitter {
  private readonly entries: Map<string, BufferedStream> = new Map();

  get(key: string): BufferedStream | undefined {
    return this.entries.get(key);
  }

  set(key: string, stream: BufferedStream): void {
    this.entries.set(key, stream);
    this.emit('added', key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    const removed = this.entries.delete(key);
    if (removed) {
      this.emit('removed', key);
    }
    return removed;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Closes every stream and empties the pool.
   *
   * @returns the number of streams that were still open
   */
  closeAll(): number {
    let closed = 0;
    for (const key of this.keys()) {
      const stream = this.entries.get(key);
      if (stream && !stream.closed) {
        stream.close();
        closed++;
      }
      this.delete(key);
    }
    return closed;
  }
}

/**
 * Options for a connection manager.
 */
export interface ConnectionManagerOptions {
  /** Caller-supplied pool. Without one the manager keeps a private pool. */
  pool?: ConnectionPool;
  /** Opens new connections. */
  connector?: Connector;
  /** Connect timeout in milliseconds. */
  timeout: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Hands out streams for one top-level open, reusing pooled ones.
 */
export class ConnectionManager {
  readonly pool: ConnectionPool;
  /** Whether the pool belongs to the caller. */
  readonly shared: boolean;
  private readonly connector: Connector;
  private readonly timeout: number;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: ConnectionManagerOptions) {
    this.shared = options.pool !== undefined;
    this.pool = options.pool ?? new ConnectionPool();
    this.connector = options.connector ?? new TcpConnector();
    this.timeout = options.timeout;
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics;
  }

  /**
   * Returns an open stream to `host:port`.
   *
   * An open pooled stream is reused. A closed one is reopened and replaced.
   */
  async acquire(host: string, port: number): Promise<BufferedStream> {
    const key = poolKey(host, port);
    const existing = this.pool.get(key);

    if (existing && !existing.closed) {
      this.logger.debug(`Using open connection to ${host} port ${port}`);
      this.metrics?.recordConnectionReused();
      return existing;
    }

    if (existing) {
      this.logger.debug('Socket was closed. Reopening.', { key });
    } else {
      this.logger.debug(`About to connect to ${host} port ${port}`);
    }

    const connection = await this.connector.connect(host, port, this.timeout);
    const stream = new BufferedStream(connection, this.logger);
    this.pool.set(key, stream);
    this.metrics?.recordConnectionOpened();
    this.logger.debug(`Connected to ${host} port ${port}`);
    return stream;
  }

  /**
   * Closes the stream to `host:port` and drops it from the pool.
   */
  evict(host: string, port: number): void {
    const key = poolKey(host, port);
    const stream = this.pool.get(key);
    if (!stream) {
      return;
    }
    if (!stream.closed) {
      this.logger.debug(`Closing connection to ${host} port ${port}`);
      stream.close();
      this.metrics?.recordConnectionClosed();
    }
    this.pool.delete(key);
  }

  /**
   * Ends the top-level open. A private pool is closed. A caller pool is left
   * as it is.
   */
  release(): void {
    if (this.shared) {
      this.logger.debug('No connections closed. Connections must be closed manually.');
      return;
    }
    for (const key of this.pool.keys()) {
      this.logger.debug(`Closing connection to ${key}`);
    }
    const closed = this.pool.closeAll();
    for (let i = 0; i < closed; i++) {
      this.metrics?.recordConnectionClosed();
    }
  }
}
