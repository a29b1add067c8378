/**
 * Mock implementations for testing.
 */

import { RetrieveError, RetrieveErrorKind } from '../errors';
import type { ByteConnection } from '../stream';
import { Connector, poolKey } from '../transport';

/**
 * Mock connection configuration.
 */
export interface MockConnectionConfig {
  /**
   * Scripted responses. Each flush of a request makes the next one readable.
   */
  responses?: Array<string | Uint8Array>;
  /** Deliver readable bytes at most this many at a time. */
  sliceSize?: number;
  /** Signal EOF once the last response has been read. Default true. */
  closeAfterLast?: boolean;
  /** Never send anything and never signal EOF. */
  unresponsive?: boolean;
  /** Error to throw on connect. */
  connectError?: Error;
}

/**
 * Scripted in-memory byte connection.
 */
export class MockConnection implements ByteConnection {
  private readonly config: MockConnectionConfig;
  private readonly scripted: Buffer[];
  private pending: Buffer = Buffer.alloc(0);
  private written: Buffer[] = [];
  private readonly recorded: string[] = [];
  private waiters: Array<() => void> = [];
  private isClosed = false;
  private closeCalls = 0;

  constructor(config: MockConnectionConfig = {}) {
    this.config = config;
    this.scripted = (config.responses ?? []).map((r) =>
      typeof r === 'string' ? Buffer.from(r, 'latin1') : Buffer.from(r)
    );
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Requests flushed so far, decoded as UTF-8. */
  get requests(): string[] {
    return [...this.recorded];
  }

  /** Number of times `close` was called. */
  get closeCount(): number {
    return this.closeCalls;
  }

  async read(max: number): Promise<Buffer> {
    for (;;) {
      if (this.isClosed) {
        return Buffer.alloc(0);
      }
      if (this.pending.length > 0) {
        const size = Math.min(max, this.config.sliceSize ?? max, this.pending.length);
        const chunk = this.pending.subarray(0, size);
        this.pending = this.pending.subarray(size);
        return chunk;
      }
      if (this.atEof()) {
        return Buffer.alloc(0);
      }
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.isClosed) {
      throw RetrieveError.connectionClosed();
    }
    this.written.push(Buffer.from(data));
  }

  async flush(): Promise<void> {
    if (this.isClosed) {
      throw RetrieveError.connectionClosed();
    }
    if (this.written.length === 0) {
      return;
    }
    this.recorded.push(Buffer.concat(this.written).toString('utf8'));
    this.written = [];

    if (!this.config.unresponsive) {
      const next = this.scripted.shift();
      if (next) {
        this.pending = Buffer.concat([this.pending, next]);
      }
    }
    this.wake();
  }

  close(): void {
    this.closeCalls++;
    this.isClosed = true;
    this.wake();
  }

  waitReadable(timeoutMs: number): Promise<boolean> {
    if (this.pending.length > 0 || this.isClosed || this.atEof()) {
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

  private atEof(): boolean {
    if (this.config.unresponsive) {
      return false;
    }
    return (
      this.recorded.length > 0 &&
      this.scripted.length === 0 &&
      (this.config.closeAfterLast ?? true)
    );
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

/**
 * Recorded connect call.
 */
export interface RecordedConnect {
  host: string;
  port: number;
  timeoutMs: number;
}

/**
 * Connector handing out scripted connections per "host:port".
 */
export class MockConnector implements Connector {
  private readonly scripts: Map<string, MockConnectionConfig[]> = new Map();
  private readonly opened: Array<{ key: string; connection: MockConnection }> = [];
  private readonly recordedConnects: RecordedConnect[] = [];

  /**
   * Queues connections for `host:port`. Each connect takes the next one.
   */
  script(host: string, port: number, ...configs: MockConnectionConfig[]): this {
    const key = poolKey(host, port);
    this.scripts.set(key, [...(this.scripts.get(key) ?? []), ...configs]);
    return this;
  }

  /**
   * Queues one connection that answers with `responses` in order.
   */
  respond(host: string, port: number, ...responses: Array<string | Uint8Array>): this {
    return this.script(host, port, { responses });
  }

  async connect(host: string, port: number, timeoutMs: number): Promise<ByteConnection> {
    this.recordedConnects.push({ host, port, timeoutMs });
    const key = poolKey(host, port);
    const config = this.scripts.get(key)?.shift();
    if (!config) {
      throw new RetrieveError(
        RetrieveErrorKind.ConnectionRefused,
        `No mock connection scripted for ${key}`
      );
    }
    if (config.connectError) {
      throw config.connectError;
    }
    const connection = new MockConnection(config);
    this.opened.push({ key, connection });
    return connection;
  }

  /** Connect calls in order. */
  get connects(): RecordedConnect[] {
    return [...this.recordedConnects];
  }

  /** Every connection handed out, in order. */
  get connections(): MockConnection[] {
    return this.opened.map((entry) => entry.connection);
  }

  /** Connections handed out for one host and port. */
  connectionsTo(host: string, port: number): MockConnection[] {
    const key = poolKey(host, port);
    return this.opened.filter((entry) => entry.key === key).map((entry) => entry.connection);
  }
}

/**
 * Sample responses.
 */
export const TestResponses = {
  contentLength: 'HTTP/1.1 200 OK\r\nContent-Length: 17\r\n\r\nExample response.\r\n\r\n',
  chunked:
    'HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n' +
    'A  \r\nThis is a \r\n11\r\nchunked response.\r\n0    \r\n\r\n',
  noLength: 'HTTP/1.1 200 OK\r\n\r\nExample response.\r\n\r\n',
  noHeaders: 'HTTP/1.1 200 OK\r\n\r\n',
  redirect: (status: string, location: string): string =>
    `HTTP/1.1 ${status} Redirect\r\nLocation: ${location}\r\nContent-Length: 0\r\n\r\n`,
  ok: (body: string, headers: Record<string, string> = {}): string => {
    const lines = Object.entries(headers).map(([name, value]) => `${name}: ${value}\r\n`);
    return `HTTP/1.1 200 OK\r\n${lines.join('')}Content-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`;
  },
} as const;

/**
 * Creates a mock connector.
 */
export function createMockConnector(): MockConnector {
  return new MockConnector();
}
