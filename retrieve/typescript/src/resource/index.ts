/**
 * Resources: a URI bound to the client for its scheme.
 */

import { ClientRegistry, OpenOptions, ResourceClient, defaultRegistry } from '../client';
import { RetrieveError, RetrieveErrorKind } from '../errors';
import { HeaderMap } from '../headers';
import type { Capability, HttpMetadata, RequestBody, ResourceMetadata } from '../types';

/**
 * Options for creating a resource.
 */
export interface ResourceOptions {
  /** Registry to find the client in. Defaults to the shared registry. */
  registry?: ClientRegistry;
}

function parseUri(uri: string | URL): URL {
  if (uri instanceof URL) {
    return new URL(uri.href);
  }
  try {
    return new URL(uri);
  } catch (err) {
    throw new RetrieveError(RetrieveErrorKind.InvalidUri, `Invalid URI: '${uri}'`, {
      cause: err instanceof Error ? err : undefined,
    });
  }
}

/**
 * A resource identified by a URI.
 *
 * The URI follows redirects. The permanent URI only follows 301s. Metadata
 * is written by the bound client and read through `metadata`.
 *
 * @example
 * ```typescript
 * const resource = new Resource('http://example.com/');
 * const text = await resource.open({}, async (res) => (await res.read()).toString());
 * ```
 */
export class Resource {
  private currentUri: URL;
  private permanent: URL;
  private readonly registry: ClientRegistry;
  private boundClient?: ResourceClient;
  private data: ResourceMetadata = {};

  constructor(uri: string | URL, options: ResourceOptions = {}) {
    this.currentUri = parseUri(uri);
    this.permanent = this.currentUri;
    this.registry = options.registry ?? defaultRegistry;
  }

  /** Current URI. */
  get uri(): URL {
    return this.currentUri;
  }

  /** URI to use for future requests, moved only by permanent redirects. */
  get permanentUri(): URL {
    return this.permanent;
  }

  /**
   * The client for this resource's scheme, created on first use.
   */
  get client(): ResourceClient {
    if (!this.boundClient) {
      const client = this.registry.resolve(this.currentUri.protocol);
      if (!client) {
        throw new RetrieveError(
          RetrieveErrorKind.NoClient,
          `No client registered for scheme '${this.currentUri.protocol.replace(/:$/, '')}'`
        );
      }
      this.boundClient = new client(this);
    }
    return this.boundClient;
  }

  /**
   * Read-only view of the metadata.
   */
  get metadata(): Readonly<ResourceMetadata> {
    const view: ResourceMetadata = {};
    for (const [key, value] of Object.entries(this.data)) {
      view[key] = value instanceof HeaderMap ? new HeaderMap(value) : value;
    }
    return Object.freeze(view);
  }

  /**
   * HTTP metadata, when an HTTP client has written it.
   */
  get response(): HttpMetadata | undefined {
    const { httpVersion, status, reason, headers } = this.data;
    if (
      typeof httpVersion === 'string' &&
      typeof status === 'string' &&
      typeof reason === 'string' &&
      headers instanceof HeaderMap
    ) {
      return { httpVersion, status, reason, headers: new HeaderMap(headers) };
    }
    return undefined;
  }

  /**
   * Opens the resource.
   *
   * With a callback, runs it with the opened resource and closes the resource
   * afterwards, whether or not the callback throws.
   */
  open(options?: OpenOptions): Promise<Resource>;
  open<T>(options: OpenOptions, fn: (resource: Resource) => T | Promise<T>): Promise<T>;
  async open<T>(
    options: OpenOptions = {},
    fn?: (resource: Resource) => T | Promise<T>
  ): Promise<Resource | T> {
    await this.client.open(options);
    if (!fn) {
      return this;
    }
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  read(n?: number): Promise<Buffer> {
    return this.client.read(n);
  }

  close(): Promise<void> {
    return this.client.close();
  }

  /**
   * Writes through the client's write capability.
   */
  async write(data: RequestBody): Promise<number> {
    const client = this.client;
    if (!client.write) {
      throw new RetrieveError(
        RetrieveErrorKind.UnsupportedOperation,
        `Undefined method 'write' for ${this.toString()}`
      );
    }
    return client.write(data);
  }

  /**
   * Whether the bound client offers a capability.
   */
  supports(capability: Capability): boolean {
    if (capability === 'write') {
      return typeof this.client.write === 'function';
    }
    return true;
  }

  // The methods below are for the bound client.

  /** Moves the current URI, as a redirect does. */
  updateUri(uri: URL): void {
    this.currentUri = uri;
  }

  /** Moves the permanent URI. */
  updatePermanentUri(uri: URL): void {
    this.permanent = uri;
  }

  /** Merges values into the metadata. */
  writeMetadata(values: ResourceMetadata): void {
    this.data = { ...this.data, ...values };
  }

  toString(): string {
    return `#<Resource URI:${this.currentUri.href}>`;
  }
}
