/**
 * Client for the http scheme.
 */

import type { OpenOptions, ResourceClient } from '../client';
import { HttpOpenConfig, USER_AGENT, createHttpOpenConfig } from '../config';
import { RetrieveError, RetrieveErrorKind } from '../errors';
import { HeaderMap } from '../headers';
import { Logger, Timer, createRequestContext } from '../observability';
import {
  CRLF,
  HttpRequest,
  ResponseReader,
  encodeRequest,
  encodeRequestHead,
} from '../protocol';
import {
  RedirectAction,
  RedirectChain,
  isRedirect,
  isSuccess,
  redirectAction,
  resolveLocation,
  shouldFollow,
} from '../redirect';
import type { Resource } from '../resource';
import type { BufferedStream } from '../stream';
import { ConnectionManager, HTTP_DEFAULT_PORT } from '../transport';
import type { HttpMetadata, HttpResponse, RequestBody } from '../types';

/**
 * State shared by the requests of one open.
 */
interface Exchange {
  config: HttpOpenConfig;
  logger: Logger;
  manager: ConnectionManager;
  chain: RedirectChain;
}

function hostOf(uri: URL): string {
  // IPv6 literals keep their brackets in `hostname`.
  return uri.hostname.replace(/^\[(.*)\]$/, '$1');
}

function portOf(uri: URL): number {
  return uri.port === '' ? HTTP_DEFAULT_PORT : Number(uri.port);
}

/**
 * HTTP/1.1 client.
 *
 * `open` sends the request, follows redirects as the policy allows, and
 * buffers the final body for `read`.
 *
 * @example
 * ```typescript
 * const resource = new Resource('http://example.com/', { registry });
 * await resource.open({ cookies: { session: 'test-session' } });
 * const body = await resource.read();
 * await resource.close();
 * ```
 */
export class HttpClient implements ResourceClient {
  static readonly scheme = 'http';

  readonly resource: Resource;
  private response: HttpResponse | null = null;
  private body: Buffer = Buffer.alloc(0);
  private offset = 0;
  private stream: BufferedStream | null = null;
  private streamShared = false;

  constructor(resource: Resource) {
    if (resource.uri.host === '') {
      throw new RetrieveError(
        RetrieveErrorKind.InvalidResource,
        `Resource cannot be handled by client: '${resource.uri.href}'`
      );
    }
    this.resource = resource;
  }

  /**
   * Sends the request and reads the response, following redirects.
   */
  async open(options: OpenOptions = {}): Promise<Resource> {
    const config = createHttpOpenConfig(options);
    const context = createRequestContext('open', { uri: this.resource.uri.href });
    const logger = config.logger.withContext(context);
    const timer = Timer.start();
    const exchange: Exchange = {
      config,
      logger,
      manager: new ConnectionManager({
        pool: config.connections,
        connector: config.connector,
        timeout: config.timeout,
        logger,
        metrics: config.metrics,
      }),
      chain: new RedirectChain(config.maxRedirects),
    };

    try {
      const response = await this.follow(exchange);
      this.response = response;
      this.body = response.body;
      this.offset = 0;
      config.metrics?.recordOpen(timer.elapsed());
      return this.resource;
    } catch (err) {
      config.metrics?.recordFailure();
      logger.error('Open failed', err instanceof Error ? err : undefined, {
        uri: this.resource.uri.href,
      });
      throw err;
    } finally {
      exchange.manager.release();
    }
  }

  /**
   * Returns the next `n` body bytes, or the rest of the body.
   */
  async read(n?: number): Promise<Buffer> {
    if (!this.response) {
      throw RetrieveError.missingStream('No response available.');
    }
    const end = n === undefined ? this.body.length : Math.min(this.offset + n, this.body.length);
    const chunk = this.body.subarray(this.offset, end);
    this.offset = end;
    return chunk;
  }

  /**
   * Releases the connection and clears the response.
   *
   * A connection held in a caller's pool stays open there.
   */
  async close(): Promise<void> {
    if (!this.response) {
      throw RetrieveError.missingStream('No stream to close.');
    }
    if (this.stream && !this.streamShared) {
      this.stream.close();
    }
    this.stream = null;
    this.response = null;
    this.body = Buffer.alloc(0);
    this.offset = 0;
  }

  private async follow(exchange: Exchange): Promise<HttpResponse> {
    let method = exchange.config.method;
    let body = exchange.config.body;

    for (;;) {
      const uri = this.resource.uri;
      const response = await this.send(exchange, uri, method, body);

      if (isSuccess(response.status)) {
        this.resource.updatePermanentUri(
          exchange.chain.resolvePermanentUri(this.resource.permanentUri)
        );
      } else if (isRedirect(response.status)) {
        const action = await this.redirect(exchange, uri, response);
        if (action.follow) {
          if (action.forceGet) {
            method = 'GET';
            body = undefined;
          }
          continue;
        }
      }

      return response;
    }
  }

  /**
   * Records a redirect and moves the resource if it is to be followed.
   */
  private async redirect(
    exchange: Exchange,
    uri: URL,
    response: HttpResponse
  ): Promise<RedirectAction> {
    const { chain, config, logger } = exchange;
    chain.append(uri, response);

    if (!(await shouldFollow(config.redirect, response))) {
      return { follow: false };
    }
    const action = redirectAction(response.status);
    if (!action.follow) {
      return action;
    }

    const target = resolveLocation(uri, response);
    if (target === undefined) {
      logger.warn('Redirect without Location header. Not following.', { status: response.status });
      return { follow: false };
    }
    if (target.protocol !== uri.protocol) {
      logger.warn('Redirect to another scheme. Not following.', {
        status: response.status,
        location: target.href,
      });
      return { follow: false };
    }

    chain.recordFollow(response.status);
    config.metrics?.recordRedirect();
    logger.debug(`Following ${response.status} redirect to ${target.href}`);
    this.resource.updateUri(target);
    return action;
  }

  /**
   * Sends one request and reads its response.
   */
  private async send(
    exchange: Exchange,
    uri: URL,
    method: string,
    body: RequestBody | undefined
  ): Promise<HttpResponse> {
    const { config, logger, manager } = exchange;
    const host = hostOf(uri);
    const port = portOf(uri);

    const stream = await manager.acquire(host, port);
    this.stream = stream;
    this.streamShared = manager.shared;

    const request: HttpRequest = {
      method,
      uri,
      headers: config.headers,
      cookies: config.cookies,
      body,
      userAgent: USER_AGENT,
      keepAlive: manager.shared,
    };
    for (const line of encodeRequestHead(request).split(CRLF)) {
      if (line !== '') {
        logger.debug(`> ${line}`);
      }
    }

    await stream.write(encodeRequest(request));
    await stream.flush();
    config.metrics?.recordRequestSent();

    const reader = new ResponseReader(stream, { method, timeout: config.timeout, logger });
    const head = await reader.readHead();
    const metadata: HttpMetadata = {
      httpVersion: head.httpVersion,
      status: head.status,
      reason: head.reason,
      headers: new HeaderMap(head.headers),
    };
    this.resource.writeMetadata({ ...metadata });
    config.metrics?.recordResponse(head.status);

    const responseBody = await reader.readBody(head);
    logger.debug(responseBody.length === 0 ? 'No response body.' : 'Response body omitted from log.');

    if ((head.headers.get('Connection') ?? '').toLowerCase() === 'close') {
      manager.evict(host, port);
    }

    return { ...head, body: responseBody };
  }
}
