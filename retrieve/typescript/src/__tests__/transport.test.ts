/**
 * Tests for connections, pools and the connection manager.
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import { RetrieveErrorKind } from '../errors';
import { MockConnector, createMockConnector } from '../mocks';
import { MetricsCollector } from '../observability';
import { BufferedStream } from '../stream';
import { ConnectionManager, ConnectionPool, TcpConnector, poolKey } from '../transport';

describe('ConnectionPool', () => {
  it('should emit added and removed with the key', async () => {
    const pool = new ConnectionPool();
    const events: string[] = [];
    pool.on('added', (key: string) => events.push(`added ${key}`));
    pool.on('removed', (key: string) => events.push(`removed ${key}`));
    const connector = new MockConnector().respond('example.com', 80);
    const manager = new ConnectionManager({ pool, connector, timeout: 100 });

    await manager.acquire('example.com', 80);
    manager.evict('example.com', 80);

    expect(events).toEqual(['added example.com:80', 'removed example.com:80']);
    expect(connector.connections[0]?.closed).toBe(true);
  });

  it('should close open streams and count them', async () => {
    const connector = new MockConnector().respond('a.example', 80).respond('b.example', 80);
    const pool = new ConnectionPool();
    const manager = new ConnectionManager({ pool, connector, timeout: 100 });
    await manager.acquire('a.example', 80);
    const second = await manager.acquire('b.example', 80);
    second.close();

    expect(pool.closeAll()).toBe(1);
    expect(pool.size).toBe(0);
    expect(connector.connections.map((c) => c.closeCount)).toEqual([1, 1]);
  });

  it('should key by host and port', () => {
    expect(poolKey('example.com', 8080)).toBe('example.com:8080');
  });
});

describe('ConnectionManager', () => {
  it('should reuse an open pooled stream', async () => {
    const connector = new MockConnector().respond('example.com', 80);
    const metrics = new MetricsCollector();
    const manager = new ConnectionManager({ connector, timeout: 100, metrics });

    const first = await manager.acquire('example.com', 80);
    const second = await manager.acquire('example.com', 80);

    expect(second).toBe(first);
    expect(connector.connects.length).toBe(1);
    expect(metrics.getMetrics().connectionsReused).toBe(1);
  });

  it('should replace a closed pooled stream', async () => {
    const connector = new MockConnector().respond('example.com', 80).respond('example.com', 80);
    const manager = new ConnectionManager({ connector, timeout: 100 });

    const first = await manager.acquire('example.com', 80);
    first.close();
    const second = await manager.acquire('example.com', 80);

    expect(second).not.toBe(first);
    expect(manager.pool.get('example.com:80')).toBe(second);
    expect(connector.connects.length).toBe(2);
  });

  it('should close a private pool on release', async () => {
    const connector = new MockConnector().respond('example.com', 80);
    const metrics = new MetricsCollector();
    const manager = new ConnectionManager({ connector, timeout: 100, metrics });
    await manager.acquire('example.com', 80);

    manager.release();

    expect(manager.shared).toBe(false);
    expect(manager.pool.size).toBe(0);
    expect(connector.connections[0]?.closed).toBe(true);
    expect(metrics.getMetrics().connectionsClosed).toBe(1);
  });

  it('should leave a shared pool alone on release', async () => {
    const connector = new MockConnector().respond('example.com', 80);
    const pool = new ConnectionPool();
    const manager = new ConnectionManager({ pool, connector, timeout: 100 });
    await manager.acquire('example.com', 80);

    manager.release();

    expect(manager.shared).toBe(true);
    expect(pool.size).toBe(1);
    expect(connector.connections[0]?.closed).toBe(false);
    pool.closeAll();
  });

  it('should pass the timeout to the connector', async () => {
    const connector = createMockConnector().respond('example.com', 80);
    const manager = new ConnectionManager({ connector, timeout: 1234 });
    await manager.acquire('example.com', 80);

    expect(connector.connects).toEqual([{ host: 'example.com', port: 80, timeoutMs: 1234 }]);
  });
});

describe('TcpConnector', () => {
  let server: net.Server | undefined;

  afterEach(async () => {
    const running = server;
    server = undefined;
    if (running?.listening) {
      await new Promise<void>((resolve) => running.close(() => resolve()));
    }
  });

  function listen(handler: (socket: net.Socket) => void): Promise<number> {
    const created = net.createServer(handler);
    server = created;
    return new Promise((resolve, reject) => {
      created.once('error', reject);
      created.listen(0, '127.0.0.1', () => {
        const address = created.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Expected a TCP address'));
          return;
        }
        resolve(address.port);
      });
    });
  }

  it('should exchange bytes with a loopback server', async () => {
    const port = await listen((socket) => {
      socket.once('data', () => {
        socket.end('HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok');
      });
    });

    const connection = await new TcpConnector().connect('127.0.0.1', port, 1000);
    const stream = new BufferedStream(connection);
    await stream.write(Buffer.from('GET / HTTP/1.1\r\n\r\n'));
    await stream.flush();

    expect(await stream.waitReadable(1000)).toBe(true);
    expect((await stream.read(100)).toString()).toBe(
      'HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok'
    );
    expect(stream.closed).toBe(true);
  });

  it('should report a refused connection', async () => {
    const port = await listen(() => undefined);
    const running = server;
    server = undefined;
    await new Promise<void>((resolve) => running?.close(() => resolve()));

    await expect(new TcpConnector().connect('127.0.0.1', port, 1000)).rejects.toMatchObject({
      kind: RetrieveErrorKind.ConnectionRefused,
    });
  });
});
