/**
 * Tests for the buffered stream.
 */

import { describe, it, expect, vi } from 'vitest';
import { RetrieveError, RetrieveErrorKind } from '../errors';
import { MockConnection } from '../mocks';
import { BufferedStream, ByteConnection } from '../stream';

async function primed(response: string, sliceSize?: number): Promise<BufferedStream> {
  const connection = new MockConnection({ responses: [response], sliceSize });
  const stream = new BufferedStream(connection);
  await stream.write(Buffer.from('ping'));
  await stream.flush();
  return stream;
}

describe('BufferedStream', () => {
  it('should replay pushed bytes before reading the connection', async () => {
    const stream = await primed('world');
    stream.push(Buffer.from('hello '));

    expect(stream.bufferedLength).toBe(6);
    const data = await stream.read(11);
    expect(data.toString()).toBe('hello world');
    expect(stream.bufferedLength).toBe(0);
  });

  it('should put pushed bytes in front of bytes already buffered', async () => {
    const stream = await primed('');
    stream.push(Buffer.from('cd'));
    stream.push(Buffer.from('ab'));

    expect((await stream.read(4)).toString()).toBe('abcd');
  });

  it('should issue a single underlying read when partial', async () => {
    const stream = await primed('abcdef', 2);

    expect((await stream.read(6, true)).toString()).toBe('ab');
    expect((await stream.read(6)).toString()).toBe('cdef');
  });

  it('should not touch the connection when the buffer satisfies the read', async () => {
    const connection = new MockConnection();
    const read = vi.spyOn(connection, 'read');
    const stream = new BufferedStream(connection);
    stream.push(Buffer.from('abc'));

    expect((await stream.read(2)).toString()).toBe('ab');
    expect(read).not.toHaveBeenCalled();
  });

  it('should return a short read at EOF and close the connection', async () => {
    const stream = await primed('abc');

    expect((await stream.read(10)).toString()).toBe('abc');
    expect(stream.closed).toBe(true);
  });

  it('should raise when the connection is read and yields nothing', async () => {
    const empty = await primed('');

    await expect(empty.read(1)).rejects.toMatchObject({
      kind: RetrieveErrorKind.UnexpectedEof,
      message: 'Server returned empty response.',
    });
    expect(empty.closed).toBe(true);
  });

  it('should return buffered bytes once the connection is closed', async () => {
    const stream = await primed('abc');
    stream.close();
    stream.push(Buffer.from('xy'));

    expect((await stream.read(10)).toString()).toBe('xy');
    expect((await stream.read(10)).length).toBe(0);
  });

  it('should refuse writes after close', async () => {
    const stream = await primed('abc');
    stream.close();

    await expect(stream.write(Buffer.from('x'))).rejects.toMatchObject({
      kind: RetrieveErrorKind.ConnectionClosed,
    });
    await expect(stream.flush()).rejects.toBeInstanceOf(RetrieveError);
  });

  it('should close idempotently and ignore close errors', () => {
    let closed = false;
    const connection: ByteConnection = {
      read: async () => Buffer.alloc(0),
      write: async () => undefined,
      flush: async () => undefined,
      close: () => {
        closed = true;
        throw new Error('close failed');
      },
      get closed() {
        return closed;
      },
      waitReadable: async () => true,
    };
    const stream = new BufferedStream(connection);

    expect(() => stream.close()).not.toThrow();
    expect(() => stream.close()).not.toThrow();
    expect(stream.closed).toBe(true);
  });

  it('should report readiness from the buffer without waiting', async () => {
    const connection = new MockConnection({ unresponsive: true });
    const stream = new BufferedStream(connection);

    expect(await stream.waitReadable(5)).toBe(false);
    stream.push(Buffer.from('x'));
    expect(await stream.waitReadable(5)).toBe(true);
  });
});
