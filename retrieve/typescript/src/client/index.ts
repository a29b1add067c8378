/**
 * Client dispatch by URI scheme.
 *
 * A client handles every resource of one scheme. Clients are registered on a
 * `ClientRegistry` explicitly; nothing registers itself.
 */

import { RetrieveError, RetrieveErrorKind } from '../errors';
import type { Resource } from '../resource';
import type { RequestBody } from '../types';

/**
 * Options passed through to a client's `open`. Each client validates its own.
 */
export type OpenOptions = Readonly<Record<string, unknown>>;

/**
 * What a client can do for its resource.
 *
 * `open`, `read` and `close` are required. `write` is an optional capability.
 */
export interface ResourceClient {
  /** The resource this client serves. */
  readonly resource: Resource;
  /** Opens the resource and resolves with it. */
  open(options?: OpenOptions): Promise<Resource>;
  /** Reads `n` bytes, or everything left when `n` is omitted. */
  read(n?: number): Promise<Buffer>;
  /** Closes the resource. */
  close(): Promise<void>;
  /** Writes to the resource and resolves with the number of bytes written. */
  write?(data: RequestBody): Promise<number>;
}

/**
 * A client class: constructed with a resource and tagged with its scheme.
 */
export interface ClientConstructor {
  readonly scheme: string;
  new (resource: Resource): ResourceClient;
}

const SCHEME = /^[^:/?#]+$/;

const REQUIRED_METHODS = ['open', 'read', 'close'] as const;

function normalizeScheme(scheme: string): string {
  return (scheme.endsWith(':') ? scheme.slice(0, -1) : scheme).toLowerCase();
}

function hasMethod(target: unknown, name: string): boolean {
  return (
    typeof target === 'object' &&
    target !== null &&
    typeof Reflect.get(target, name) === 'function'
  );
}

interface RegistryEntry {
  scheme: string;
  client: ClientConstructor;
}

/**
 * Registry of scheme → client.
 *
 * Entries are only ever added. Lookup scans them in registration order.
 */
export class ClientRegistry {
  private readonly entries: RegistryEntry[] = [];

  /**
   * Registers a client for a scheme.
   *
   * Registering the same client twice is a no-op. Registering a different
   * client for a taken scheme fails.
   */
  register(scheme: string, client: ClientConstructor): this {
    if (!SCHEME.test(scheme)) {
      throw new RetrieveError(RetrieveErrorKind.InvalidScheme, `Invalid scheme: '${scheme}'`);
    }
    if (typeof client.scheme !== 'string' || client.scheme !== scheme) {
      throw new RetrieveError(
        RetrieveErrorKind.InvalidClient,
        `Client declares scheme '${String(client.scheme)}', expected '${scheme}'`
      );
    }
    const prototype: unknown = Reflect.get(client, 'prototype');
    for (const method of REQUIRED_METHODS) {
      if (!hasMethod(prototype, method)) {
        throw new RetrieveError(
          RetrieveErrorKind.InvalidClient,
          `Client instance must respond to '${method}'`
        );
      }
    }

    const existing = this.resolve(scheme);
    if (existing === client) {
      return this;
    }
    if (existing) {
      throw new RetrieveError(
        RetrieveErrorKind.DuplicateScheme,
        `A client is already registered for scheme '${scheme}'`
      );
    }

    this.entries.push({ scheme: normalizeScheme(scheme), client });
    return this;
  }

  /**
   * Finds the client for a scheme. A trailing ":" is ignored, so
   * `url.protocol` can be passed as is.
   */
  resolve(scheme: string): ClientConstructor | undefined {
    const wanted = normalizeScheme(scheme);
    return this.entries.find((entry) => entry.scheme === wanted)?.client;
  }

  has(scheme: string): boolean {
    return this.resolve(scheme) !== undefined;
  }

  /** Registered schemes in registration order. */
  schemes(): string[] {
    return this.entries.map((entry) => entry.scheme);
  }
}

/**
 * Registry used when a resource is created without one.
 */
export const defaultRegistry = new ClientRegistry();
