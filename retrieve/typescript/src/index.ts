/**
 * Retrieve
 *
 * Opens resources by URI through a client chosen by scheme. The http client
 * speaks HTTP/1.1 over raw TCP with connection reuse, chunked decoding and
 * redirect following. The file client reads and writes local files.
 *
 * @example
 * ```typescript
 * import { open, ConnectionPool } from 'retrieve';
 *
 * const connections = new ConnectionPool();
 * const resource = await open('http://example.com/', { connections });
 * console.log(resource.response?.status);
 * console.log((await resource.read()).toString());
 * await resource.close();
 * connections.closeAll();
 * ```
 *
 * @packageDocumentation
 */

import { ClientRegistry, defaultRegistry } from './client';
import type { FileOpenOptions, HttpOpenOptions } from './config';
import { FileClient } from './file';
import { HttpClient } from './http';
import { Resource } from './resource';

// Re-export errors
export {
  RetrieveError,
  RetrieveErrorKind,
  ErrorCategory,
  isRetrieveError,
  isRetryableError,
} from './errors';

// Re-export config
export {
  VERSION,
  USER_AGENT,
  DEFAULT_METHOD,
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_REDIRECTS,
  FILE_MODES,
  httpOpenOptionsSchema,
  fileOpenOptionsSchema,
  createHttpOpenConfig,
  createFileOpenConfig,
  HttpOpenOptionsBuilder,
} from './config';
export type {
  HttpOpenOptions,
  HttpOpenConfig,
  FileOpenOptions,
  FileOpenConfig,
  FileMode,
} from './config';

// Re-export types
export type {
  HttpResponse,
  ResourceMetadata,
  HttpMetadata,
  FileMetadata,
  FileType,
  RedirectPredicate,
  RedirectPolicy,
  CookieValue,
  CookieMap,
  HeaderValues,
  RequestBody,
  Capability,
} from './types';

// Re-export headers
export { HeaderMap } from './headers';
export type { HeaderInit } from './headers';

// Re-export stream
export { BufferedStream, DEFAULT_CHUNK_SIZE } from './stream';
export type { ByteConnection } from './stream';

// Re-export transport
export {
  SocketConnection,
  TcpConnector,
  ConnectionPool,
  ConnectionManager,
  HTTP_DEFAULT_PORT,
  poolKey,
} from './transport';
export type { Connector, ConnectionManagerOptions } from './transport';

// Re-export protocol
export {
  encodeRequest,
  encodeRequestHead,
  requestHeaderLines,
  requestTarget,
  escapeCookie,
  parseStatusLine,
  parseHeaderLine,
  parseChunkSize,
  parseContentLength,
  hasBody,
  ResponseReader,
} from './protocol';
export type {
  HttpRequest,
  ParseResult,
  ParseStep,
  StatusLine,
  HeaderLine,
  ResponseHead,
  ResponseReaderOptions,
} from './protocol';

// Re-export redirect
export {
  RedirectChain,
  redirectAction,
  shouldFollow,
  resolveLocation,
  isRedirect,
  isSuccess,
} from './redirect';
export type { RedirectAction, RedirectEntry } from './redirect';

// Re-export observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  MetricsCollector,
  Timer,
  formatEntry,
  createRequestContext,
  createLogger,
  createNoopLogger,
  createMetricsCollector,
  createEmptyMetrics,
} from './observability';
export type { LogEntry, RequestContext, Logger, RetrieveMetrics } from './observability';

// Re-export dispatch
export { ClientRegistry, defaultRegistry } from './client';
export type { ClientConstructor, ResourceClient, OpenOptions } from './client';
export { Resource } from './resource';
export type { ResourceOptions } from './resource';

// Re-export clients
export { HttpClient } from './http';
export { FileClient, modeFlags } from './file';

// Re-export mocks
export {
  MockConnection,
  MockConnector,
  TestResponses,
  createMockConnector,
} from './mocks';
export type { MockConnectionConfig, RecordedConnect } from './mocks';

/**
 * Registers the built-in http and file clients.
 */
export function registerBuiltinClients(registry: ClientRegistry): ClientRegistry {
  return registry.register(HttpClient.scheme, HttpClient).register(FileClient.scheme, FileClient);
}

registerBuiltinClients(defaultRegistry);

/**
 * Opens a resource through the default registry.
 */
export function open(
  uri: string | URL,
  options: HttpOpenOptions | FileOpenOptions = {}
): Promise<Resource> {
  return new Resource(uri).open(options);
}
