/**
 * Client for the file scheme.
 */

import { constants, Stats } from 'fs';
import * as fs from 'fs/promises';
import { fileURLToPath } from 'url';
import type { OpenOptions, ResourceClient } from '../client';
import { FileMode, createFileOpenConfig } from '../config';
import { RetrieveError, RetrieveErrorKind } from '../errors';
import { Logger, NoopLogger } from '../observability';
import type { Resource } from '../resource';
import type { FileMetadata, FileType, RequestBody } from '../types';

const READ_SIZE = 64 * 1024;

const MODE_FLAGS: Record<FileMode, number> = {
  read: constants.O_RDONLY,
  write: constants.O_WRONLY,
  readWrite: constants.O_RDWR,
  append: constants.O_APPEND,
  create: constants.O_CREAT,
  exclusive: constants.O_EXCL,
};

/**
 * Combines mode flags into `open(2)` flags.
 */
export function modeFlags(modes: readonly FileMode[]): number {
  return modes.reduce((flags, mode) => flags | MODE_FLAGS[mode], 0);
}

function fileType(stats: Stats): FileType | undefined {
  if (stats.isFile()) return 'file';
  if (stats.isDirectory()) return 'directory';
  if (stats.isCharacterDevice()) return 'characterSpecial';
  if (stats.isBlockDevice()) return 'blockSpecial';
  if (stats.isFIFO()) return 'fifo';
  if (stats.isSymbolicLink()) return 'link';
  if (stats.isSocket()) return 'socket';
  return undefined;
}

/**
 * File client.
 *
 * @example
 * ```typescript
 * const resource = new Resource('file:///tmp/todo.txt', { registry });
 * await resource.open({ mode: ['write', 'create'] });
 * await resource.write('Write some code.');
 * await resource.close();
 * ```
 */
export class FileClient implements ResourceClient {
  static readonly scheme = 'file';

  readonly resource: Resource;
  private handle: fs.FileHandle | null = null;
  private metadataLoaded = false;
  private logger: Logger = new NoopLogger();

  constructor(resource: Resource) {
    if (resource.uri.search !== '' || resource.uri.host !== '') {
      throw new RetrieveError(
        RetrieveErrorKind.InvalidResource,
        `Resource cannot be handled by client: '${resource.uri.href}'`
      );
    }
    this.resource = resource;
  }

  /** Local path of the resource. */
  get path(): string {
    return fileURLToPath(this.resource.uri);
  }

  async open(options: OpenOptions = {}): Promise<Resource> {
    const config = createFileOpenConfig(options);
    this.logger = config.logger;
    this.logger.debug('Opening file', { path: this.path, modes: config.modes });
    this.handle = await fs.open(this.path, modeFlags(config.modes), config.permissions);
    this.metadataLoaded = false;
    return this.resource;
  }

  /**
   * Reads `n` bytes, or the rest of the file.
   */
  async read(n?: number): Promise<Buffer> {
    const handle = this.requireHandle();
    await this.loadMetadata(handle);

    const parts: Buffer[] = [];
    let total = 0;
    for (;;) {
      const want = n === undefined ? READ_SIZE : n - total;
      if (want <= 0) {
        break;
      }
      const buffer = Buffer.alloc(want);
      const { bytesRead } = await handle.read(buffer, 0, want, null);
      if (bytesRead === 0) {
        break;
      }
      parts.push(buffer.subarray(0, bytesRead));
      total += bytesRead;
    }
    return Buffer.concat(parts, total);
  }

  /**
   * Writes at the current position and resolves with the bytes written.
   */
  async write(data: RequestBody): Promise<number> {
    const handle = this.requireHandle();
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    const { bytesWritten } = await handle.write(bytes, 0, bytes.length, null);
    return bytesWritten;
  }

  async close(): Promise<void> {
    const handle = this.requireHandle();
    this.handle = null;
    await handle.close();
    this.logger.debug('Closed file', { path: this.path });
  }

  private requireHandle(): fs.FileHandle {
    if (!this.handle) {
      throw RetrieveError.missingStream('Missing stream.');
    }
    return this.handle;
  }

  private async loadMetadata(handle: fs.FileHandle): Promise<void> {
    if (this.metadataLoaded) {
      return;
    }
    const stats = await handle.stat();
    const metadata: FileMetadata = {
      accessTime: stats.atime,
      changeTime: stats.ctime,
      modifiedTime: stats.mtime,
      fileType: fileType(stats),
      fileMode: stats.mode,
      userId: stats.uid,
      groupId: stats.gid,
    };
    this.resource.writeMetadata({ ...metadata });
    this.metadataLoaded = true;
  }
}
