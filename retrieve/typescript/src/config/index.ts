/**
 * Open options for the built-in clients.
 *
 * Options arrive as plain objects and are validated with zod before a client
 * acts on them. Validation failures raise a RetrieveError of kind
 * InvalidOption whose message names the offending option.
 */

import { z } from 'zod';
import { RetrieveError } from '../errors';
import { Logger, MetricsCollector, NoopLogger } from '../observability';
import { DEFAULT_MAX_REDIRECTS } from '../redirect';
import { ConnectionPool, Connector, TcpConnector } from '../transport';
import type {
  CookieMap,
  HeaderValues,
  RedirectPolicy,
  RedirectPredicate,
  RequestBody,
} from '../types';

/** Package version. */
export const VERSION = '0.1.0';

/** Default User-Agent sent with every request. */
export const USER_AGENT = `retrieve/${VERSION} (node ${process.versions.node})`;

/** Default method. */
export const DEFAULT_METHOD = 'GET';

/** Default read and connect timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 20000;

export { DEFAULT_MAX_REDIRECTS };

const HTTP_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    typeof value.debug === 'function' &&
    'info' in value &&
    typeof value.info === 'function' &&
    'warn' in value &&
    typeof value.warn === 'function' &&
    'error' in value &&
    typeof value.error === 'function' &&
    'withContext' in value &&
    typeof value.withContext === 'function'
  );
}

function isConnector(value: unknown): value is Connector {
  return (
    typeof value === 'object' &&
    value !== null &&
    'connect' in value &&
    typeof value.connect === 'function'
  );
}

function isRedirectPredicate(value: unknown): value is RedirectPredicate {
  return typeof value === 'function';
}

const headerValueSchema = z.union([z.string(), z.array(z.string())]);

/**
 * Zod schema for HTTP open options.
 */
export const httpOpenOptionsSchema = z.object({
  method: z
    .string()
    .regex(HTTP_TOKEN, 'Expected an HTTP method token')
    .optional(),
  headers: z.record(headerValueSchema).optional(),
  cookies: z.record(z.union([headerValueSchema, z.null(), z.undefined()])).optional(),
  cookieStore: z.record(z.unknown()).optional(),
  redirect: z
    .union([
      z.boolean(),
      z.custom<RedirectPredicate>(isRedirectPredicate, 'Expected a function'),
    ])
    .optional(),
  maxRedirects: z.number().int().min(0).optional(),
  connections: z.instanceof(ConnectionPool).optional(),
  timeout: z.number().positive().finite().optional(),
  body: z.union([z.string(), z.instanceof(Uint8Array)]).optional(),
  logger: z.custom<Logger>(isLogger, 'Expected a Logger').optional(),
  metrics: z.instanceof(MetricsCollector).optional(),
  connector: z.custom<Connector>(isConnector, 'Expected a Connector').optional(),
});

/**
 * Options accepted by the HTTP client's `open`.
 */
export type HttpOpenOptions = {
  /** Request method. Default GET. */
  method?: string;
  /** Extra request headers. A list sends one line per value. */
  headers?: HeaderValues;
  /** Cookies sent as `Cookie` lines. */
  cookies?: CookieMap;
  /** Cookie store. Accepted but not consulted. */
  cookieStore?: Record<string, unknown>;
  /** Redirect policy. Default true. */
  redirect?: RedirectPolicy;
  /** Redirects followed before giving up. Default 20. */
  maxRedirects?: number;
  /** Pool that keeps connections open across opens. */
  connections?: ConnectionPool;
  /** Read and connect timeout in milliseconds. Default 20000. */
  timeout?: number;
  /** Request entity. */
  body?: RequestBody;
  logger?: Logger;
  metrics?: MetricsCollector;
  connector?: Connector;
};

/**
 * HTTP open options with defaults applied.
 */
export interface HttpOpenConfig {
  method: string;
  headers: HeaderValues;
  cookies: CookieMap;
  cookieStore: Record<string, unknown>;
  redirect: RedirectPolicy;
  maxRedirects: number;
  connections?: ConnectionPool;
  timeout: number;
  body?: RequestBody;
  logger: Logger;
  metrics?: MetricsCollector;
  connector: Connector;
}

function invalidOptions(error: z.ZodError): RetrieveError {
  const issue = error.issues[0];
  const path = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
  const message = issue ? issue.message : 'Invalid options';
  return RetrieveError.invalidOption(`Invalid option '${path}': ${message}`);
}

/**
 * Validates HTTP open options and applies defaults.
 *
 * @example
 * ```typescript
 * const config = createHttpOpenConfig({ method: 'post', body: 'a=1' });
 * config.method; // 'POST'
 * config.timeout; // 20000
 * ```
 */
export function createHttpOpenConfig(options: unknown = {}): HttpOpenConfig {
  const result = httpOpenOptionsSchema.safeParse(options);
  if (!result.success) {
    throw invalidOptions(result.error);
  }
  const parsed = result.data;

  return {
    method: (parsed.method ?? DEFAULT_METHOD).toUpperCase(),
    headers: parsed.headers ?? {},
    cookies: parsed.cookies ?? {},
    cookieStore: parsed.cookieStore ?? {},
    redirect: parsed.redirect ?? true,
    maxRedirects: parsed.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
    connections: parsed.connections,
    timeout: parsed.timeout ?? DEFAULT_TIMEOUT,
    body: parsed.body,
    logger: parsed.logger ?? new NoopLogger(),
    metrics: parsed.metrics,
    connector: parsed.connector ?? new TcpConnector(),
  };
}

/**
 * Builder for HTTP open options.
 */
export class HttpOpenOptionsBuilder {
  private options: HttpOpenOptions = {};

  /** Sets the request method. */
  method(method: string): this {
    this.options.method = method;
    return this;
  }

  /** Adds a request header. Repeated calls for one name send several lines. */
  header(name: string, value: string): this {
    const headers = { ...this.options.headers };
    const existing = headers[name];
    headers[name] = existing === undefined ? value : [...toList(existing), value];
    this.options.headers = headers;
    return this;
  }

  /** Adds a cookie. Repeated calls for one name send several lines. */
  cookie(name: string, value: string): this {
    const cookies = { ...this.options.cookies };
    const existing = cookies[name];
    cookies[name] =
      existing === undefined || existing === null ? value : [...toList(existing), value];
    this.options.cookies = cookies;
    return this;
  }

  /** Sets the request body. */
  body(body: RequestBody): this {
    this.options.body = body;
    return this;
  }

  /** Sets the redirect policy. */
  redirect(policy: RedirectPolicy): this {
    this.options.redirect = policy;
    return this;
  }

  /** Stops following redirects. */
  noRedirect(): this {
    this.options.redirect = false;
    return this;
  }

  /** Sets the redirect cap. */
  maxRedirects(count: number): this {
    this.options.maxRedirects = count;
    return this;
  }

  /** Shares a connection pool. */
  connections(pool: ConnectionPool): this {
    this.options.connections = pool;
    return this;
  }

  /** Sets the timeout in milliseconds. */
  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  /** Sets the logger. */
  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /** Sets the metrics collector. */
  metrics(metrics: MetricsCollector): this {
    this.options.metrics = metrics;
    return this;
  }

  /** Sets the connector. */
  connector(connector: Connector): this {
    this.options.connector = connector;
    return this;
  }

  /** Returns the options, validated. */
  build(): HttpOpenOptions {
    createHttpOpenConfig(this.options);
    return { ...this.options };
  }
}

function toList(value: string | readonly string[]): string[] {
  return typeof value === 'string' ? [value] : [...value];
}

// ============================================================================
// File options
// ============================================================================

/**
 * Flags for opening a file.
 */
export const FILE_MODES = ['read', 'write', 'readWrite', 'append', 'create', 'exclusive'] as const;

export type FileMode = (typeof FILE_MODES)[number];

/**
 * Zod schema for file open options.
 */
export const fileOpenOptionsSchema = z.object({
  mode: z.union([z.enum(FILE_MODES), z.array(z.enum(FILE_MODES)).min(1)]).optional(),
  /** Permission bits for files created by the open. */
  permissions: z.number().int().min(0).max(0o7777).optional(),
  logger: z.custom<Logger>(isLogger, 'Expected a Logger').optional(),
});

/**
 * Options accepted by the file client's `open`.
 */
export type FileOpenOptions = {
  /** One flag or a list of flags. Default `read`. */
  mode?: FileMode | readonly FileMode[];
  /** Permission bits for created files. Default 0o666. */
  permissions?: number;
  logger?: Logger;
};

/**
 * File open options with defaults applied.
 */
export interface FileOpenConfig {
  modes: FileMode[];
  permissions: number;
  logger: Logger;
}

/**
 * Validates file open options and applies defaults.
 */
export function createFileOpenConfig(options: unknown = {}): FileOpenConfig {
  const result = fileOpenOptionsSchema.safeParse(options);
  if (!result.success) {
    throw invalidOptions(result.error);
  }
  const { mode, permissions, logger } = result.data;

  return {
    modes: mode === undefined ? ['read'] : typeof mode === 'string' ? [mode] : [...mode],
    permissions: permissions ?? 0o666,
    logger: logger ?? new NoopLogger(),
  };
}
