/**
 * Tests for the file client.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { constants } from 'fs';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { ClientRegistry } from '../client';
import { RetrieveErrorKind } from '../errors';
import { FileClient, modeFlags } from '../file';
import { Resource } from '../resource';

describe('FileClient', () => {
  let dir: string;
  let registry: ClientRegistry;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'retrieve-'));
    registry = new ClientRegistry().register(FileClient.scheme, FileClient);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function resourceAt(name: string): Resource {
    return new Resource(pathToFileURL(path.join(dir, name)), { registry });
  }

  it('should read a file in pieces', async () => {
    await fs.writeFile(path.join(dir, 'hello.txt'), 'Hello, file.');
    const resource = resourceAt('hello.txt');
    await resource.open();

    expect((await resource.read(5)).toString()).toBe('Hello');
    expect((await resource.read()).toString()).toBe(', file.');
    expect((await resource.read()).length).toBe(0);
    await resource.close();
  });

  it('should record stat metadata on first read', async () => {
    await fs.writeFile(path.join(dir, 'hello.txt'), 'Hello, file.');
    const resource = resourceAt('hello.txt');
    await resource.open();

    expect(resource.metadata).toEqual({});
    await resource.read(1);

    const stats = await fs.stat(path.join(dir, 'hello.txt'));
    expect(resource.metadata.fileType).toBe('file');
    expect(resource.metadata.fileMode).toBe(stats.mode);
    expect(resource.metadata.userId).toBe(stats.uid);
    expect(resource.metadata.modifiedTime).toBeInstanceOf(Date);
    expect(resource.response).toBeUndefined();
    await resource.close();
  });

  it('should create and write a file', async () => {
    const resource = resourceAt('todo.txt');
    await resource.open({ mode: ['write', 'create'] });

    expect(await resource.write('Write some code.')).toBe(16);
    await resource.close();
    expect(await fs.readFile(path.join(dir, 'todo.txt'), 'utf8')).toBe('Write some code.');
  });

  it('should append to a file', async () => {
    await fs.writeFile(path.join(dir, 'log.txt'), 'one');
    const resource = resourceAt('log.txt');
    await resource.open({ mode: ['write', 'append'] });

    await resource.write(Buffer.from(' two'));
    await resource.close();
    expect(await fs.readFile(path.join(dir, 'log.txt'), 'utf8')).toBe('one two');
  });

  it('should create files with the given permissions', async () => {
    const resource = resourceAt('secret.txt');
    await resource.open({ mode: ['write', 'create'], permissions: 0o600 });
    await resource.close();

    const stats = await fs.stat(path.join(dir, 'secret.txt'));
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it('should propagate file system errors', async () => {
    await fs.writeFile(path.join(dir, 'taken.txt'), '');

    await expect(resourceAt('missing.txt').open()).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(
      resourceAt('taken.txt').open({ mode: ['write', 'create', 'exclusive'] })
    ).rejects.toMatchObject({ code: 'EEXIST' });
  });

  it('should reject unknown modes', async () => {
    await expect(resourceAt('hello.txt').open({ mode: 'truncate' })).rejects.toMatchObject({
      kind: RetrieveErrorKind.InvalidOption,
    });
  });

  it('should refuse to read, write or close without an open file', async () => {
    const resource = resourceAt('hello.txt');

    await expect(resource.read()).rejects.toMatchObject({
      kind: RetrieveErrorKind.MissingStream,
      message: 'Missing stream.',
    });
    await expect(resource.write('x')).rejects.toMatchObject({ message: 'Missing stream.' });
    await expect(resource.close()).rejects.toMatchObject({ message: 'Missing stream.' });
  });

  it('should reject URIs with a host or query', () => {
    const withQuery = new Resource('file:///tmp/x?y=1', { registry });
    const withHost = new Resource('file://remote.example/x', { registry });

    expect(() => withQuery.client).toThrow("Resource cannot be handled by client: 'file:///tmp/x?y=1'");
    expect(() => withHost.client).toThrow(
      expect.objectContaining({ kind: RetrieveErrorKind.InvalidResource })
    );
  });

  it('should offer the write capability', () => {
    expect(resourceAt('hello.txt').supports('write')).toBe(true);
  });
});

describe('modeFlags', () => {
  it('should combine flags', () => {
    expect(modeFlags(['read'])).toBe(constants.O_RDONLY);
    expect(modeFlags(['write', 'create'])).toBe(constants.O_WRONLY | constants.O_CREAT);
  });
});
