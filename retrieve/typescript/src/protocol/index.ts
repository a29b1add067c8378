/**
 * HTTP/1.1 wire codec.
 *
 * Requests are encoded in one pass. Responses are parsed incrementally: each
 * parse step is a pure function over the bytes available so far, and the
 * `ResponseReader` feeds it more input until it completes or fails.
 */

import { RetrieveError, RetrieveErrorKind } from '../errors';
import { HeaderMap } from '../headers';
import { Logger, NoopLogger } from '../observability';
import { BufferedStream, DEFAULT_CHUNK_SIZE } from '../stream';
import type { CookieMap, HeaderValues, HttpResponse, RequestBody } from '../types';

export const CRLF = '\r\n';

/** Protocol version sent on every request. */
export const HTTP_VERSION = '1.1';

const LEADING_BLANK_LINES = /^(?:\r?\n)*/;
const STATUS_LINE = /^HTTP\/(\d\.\d) (\d{3}) (.+?)\r\n/;
const HEADER_LINE = /^([^()<>@,;:\\"/[\]?={}\t \r\n]+):[ \t]*([^\r\n]*)\r\n/;
const CHUNK_SIZE_LINE = /^([0-9a-fA-F]+)[ \t]*\r\n/;
const CONTENT_LENGTH = /^\d+$/;
const COOKIE_SAFE_BYTE = /^[ a-zA-Z0-9_.-]$/;

/** Defaults a caller header of the same name replaces in place. */
const OVERRIDABLE_DEFAULTS = new Set(['user-agent', 'connection']);

/** Headers always computed from the request itself. */
const COMPUTED_HEADERS = new Set(['host', 'content-length']);

// ============================================================================
// Request encoding
// ============================================================================

/**
 * A request ready to be encoded.
 */
export interface HttpRequest {
  method: string;
  /** Absolute URI of the resource. */
  uri: URL;
  headers: HeaderValues;
  cookies: CookieMap;
  body?: RequestBody;
  userAgent: string;
  /** Adds `Connection: Keep-Alive` to the defaults. */
  keepAlive: boolean;
}

/**
 * Path and query of a URI, the target of the request line.
 */
export function requestTarget(uri: URL): string {
  return `${uri.pathname === '' ? '/' : uri.pathname}${uri.search}`;
}

/**
 * Escapes a cookie name or value.
 *
 * Each UTF-8 byte outside `[ a-zA-Z0-9_.-]` becomes `%XX`, then spaces
 * become `+`.
 */
export function escapeCookie(value: string): string {
  let escaped = '';
  for (const byte of Buffer.from(value, 'utf8')) {
    const char = String.fromCharCode(byte);
    escaped += COOKIE_SAFE_BYTE.test(char)
      ? char
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return escaped.replace(/ /g, '+');
}

function bodyBytes(body: RequestBody | undefined): Buffer {
  if (body === undefined) {
    return Buffer.alloc(0);
  }
  return typeof body === 'string' ? Buffer.from(body, 'utf8') : Buffer.from(body);
}

/**
 * Header lines of a request, in the order they are sent.
 */
export function requestHeaderLines(request: HttpRequest): Array<[string, string]> {
  const lines: Array<[string, string]> = [
    ['User-Agent', request.userAgent],
    ['Host', request.uri.host],
    ['Content-Length', String(bodyBytes(request.body).length)],
  ];
  if (request.keepAlive) {
    lines.push(['Connection', 'Keep-Alive']);
  }

  const replaceable = new Set(OVERRIDABLE_DEFAULTS);
  for (const [name, value] of Object.entries(request.headers)) {
    const key = name.toLowerCase();
    if (COMPUTED_HEADERS.has(key)) {
      continue;
    }
    const values: Array<[string, string]> = (typeof value === 'string' ? [value] : [...value]).map(
      (v) => [name, v]
    );
    const index = replaceable.has(key) ? lines.findIndex(([n]) => n.toLowerCase() === key) : -1;
    if (index >= 0) {
      lines.splice(index, 1, ...values);
      replaceable.delete(key);
    } else {
      lines.push(...values);
    }
  }

  for (const [name, value] of Object.entries(request.cookies)) {
    if (value === null || value === undefined) {
      continue;
    }
    for (const v of typeof value === 'string' ? [value] : value) {
      lines.push(['Cookie', `${escapeCookie(name)}=${escapeCookie(v)}`]);
    }
  }

  return lines;
}

/**
 * Encodes the request head: request line, headers and the blank line.
 */
export function encodeRequestHead(request: HttpRequest): string {
  let head = `${request.method.toUpperCase()} ${requestTarget(request.uri)} HTTP/${HTTP_VERSION}${CRLF}`;
  for (const [name, value] of requestHeaderLines(request)) {
    head += `${name}: ${value}${CRLF}`;
  }
  return head + CRLF;
}

/**
 * Encodes a complete request.
 */
export function encodeRequest(request: HttpRequest): Buffer {
  return Buffer.concat([Buffer.from(encodeRequestHead(request), 'utf8'), bodyBytes(request.body)]);
}

// ============================================================================
// Parse steps
// ============================================================================

/**
 * Outcome of a parse step.
 */
export type ParseResult<T> =
  | { state: 'incomplete' }
  | { state: 'complete'; value: T; rest: Buffer }
  | { state: 'error'; error: RetrieveError };

/**
 * A parse step over the bytes available so far.
 */
export type ParseStep<T> = (data: Buffer) => ParseResult<T>;

/**
 * Parsed status line.
 */
export interface StatusLine {
  httpVersion: string;
  status: string;
  reason: string;
}

/**
 * One step through the header section.
 */
export type HeaderLine = { done: false; name: string; value: string } | { done: true };

const INCOMPLETE = { state: 'incomplete' } as const;

function complete<T>(value: T, rest: Buffer): ParseResult<T> {
  return { state: 'complete', value, rest };
}

function failed<T>(kind: RetrieveErrorKind, message: string): ParseResult<T> {
  return { state: 'error', error: RetrieveError.parser(kind, message) };
}

/**
 * Parses the status line.
 *
 * Leading blank lines are waited through. The first non-blank line decides:
 * a start line after blank lines is misplaced, anything else is missing one.
 * Only whole lines are examined, so the outcome does not depend on how the
 * bytes were split.
 */
export function parseStatusLine(data: Buffer): ParseResult<StatusLine> {
  const text = data.toString('latin1');
  const skipped = LEADING_BLANK_LINES.exec(text)?.[0].length ?? 0;
  const remaining = text.slice(skipped);
  const lineEnd = remaining.indexOf('\n');

  if (lineEnd === -1) {
    return INCOMPLETE;
  }

  const match = STATUS_LINE.exec(remaining.slice(0, lineEnd + 1));
  if (!match) {
    return failed(RetrieveErrorKind.MissingStartLine, 'Response missing HTTP start line.');
  }
  if (skipped > 0) {
    return failed(RetrieveErrorKind.InvalidStartLine, 'HTTP start line was invalid.');
  }
  return complete(
    { httpVersion: match[1] ?? '', status: match[2] ?? '', reason: match[3] ?? '' },
    data.subarray(match[0].length)
  );
}

/**
 * Parses one header line, or the blank line that ends the section.
 *
 * Folded continuation lines are not supported.
 */
export function parseHeaderLine(data: Buffer): ParseResult<HeaderLine> {
  const text = data.toString('latin1');

  if (text.startsWith(CRLF)) {
    return complete({ done: true }, data.subarray(CRLF.length));
  }

  const match = HEADER_LINE.exec(text);
  if (match) {
    return complete(
      { done: false, name: match[1] ?? '', value: match[2] ?? '' },
      data.subarray(match[0].length)
    );
  }

  if (!text.includes(CRLF)) {
    return INCOMPLETE;
  }

  const line = text.slice(0, text.indexOf(CRLF));
  return failed(
    RetrieveErrorKind.InvalidHeader,
    `Expected HTTP header, got something else: ${JSON.stringify(line)}`
  );
}

/**
 * Parses a chunk-size line. Chunk extensions are not supported.
 */
export function parseChunkSize(data: Buffer): ParseResult<number> {
  const text = data.toString('latin1');
  const match = CHUNK_SIZE_LINE.exec(text);

  if (match) {
    return complete(parseInt(match[1] ?? '', 16), data.subarray(match[0].length));
  }
  if (!text.includes(CRLF)) {
    return INCOMPLETE;
  }
  return failed(RetrieveErrorKind.InvalidChunkSize, 'Could not determine chunk size.');
}

/**
 * Parses a Content-Length value.
 */
export function parseContentLength(value: string): number {
  const trimmed = value.trim();
  const length = Number(trimmed);
  if (!CONTENT_LENGTH.test(trimmed) || !Number.isSafeInteger(length)) {
    throw RetrieveError.parser(
      RetrieveErrorKind.InvalidContentLength,
      `Invalid Content-Length: ${JSON.stringify(value)}`
    );
  }
  return length;
}

/**
 * Whether a response to `method` with `status` carries a body.
 */
export function hasBody(method: string, status: string): boolean {
  if (method.toUpperCase() === 'HEAD') {
    return false;
  }
  return !(status.startsWith('1') || status === '204' || status === '304');
}

// ============================================================================
// Response reader
// ============================================================================

/**
 * Options for reading one response.
 */
export interface ResponseReaderOptions {
  /** Method of the request the response answers. */
  method: string;
  /** How long to wait for the first byte, in milliseconds. */
  timeout: number;
  logger?: Logger;
}

/**
 * Status line and headers of a response.
 */
export interface ResponseHead extends StatusLine {
  headers: HeaderMap;
}

/**
 * Reads one response off a buffered stream.
 */
export class ResponseReader {
  private readonly stream: BufferedStream;
  private readonly method: string;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(stream: BufferedStream, options: ResponseReaderOptions) {
    this.stream = stream;
    this.method = options.method;
    this.timeout = options.timeout;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Reads the whole response.
   */
  async read(): Promise<HttpResponse> {
    const head = await this.readHead();
    const body = await this.readBody(head);
    return { ...head, body };
  }

  /**
   * Waits for the server, then reads the status line and headers.
   */
  async readHead(): Promise<ResponseHead> {
    if (this.stream.bufferedLength === 0) {
      const ready = await this.stream.waitReadable(this.timeout);
      if (!ready) {
        throw new RetrieveError(
          RetrieveErrorKind.ReadTimeout,
          'Timeout waiting for the server to respond.'
        );
      }
    }

    const statusLine = await this.step(parseStatusLine, () =>
      RetrieveError.parser(RetrieveErrorKind.MissingStartLine, 'Response missing HTTP start line.')
    );
    this.logger.debug(`< HTTP/${statusLine.httpVersion} ${statusLine.status} ${statusLine.reason}`);

    const headers = new HeaderMap();
    for (;;) {
      const line = await this.step(parseHeaderLine, () => RetrieveError.connectionClosed());
      if (line.done) {
        break;
      }
      this.logger.debug(`< ${line.name}: ${line.value}`);
      headers.append(line.name, line.value);
    }

    return { ...statusLine, headers };
  }

  /**
   * Reads the body framed as the head describes.
   */
  async readBody(head: ResponseHead): Promise<Buffer> {
    if (!hasBody(this.method, head.status)) {
      return Buffer.alloc(0);
    }

    if (/chunked/i.test(head.headers.get('Transfer-Encoding') ?? '')) {
      return this.readChunked();
    }

    const contentLength = head.headers.get('Content-Length');
    if (contentLength !== undefined) {
      return this.readExactly(parseContentLength(contentLength));
    }

    return this.drain();
  }

  private async readChunked(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for (;;) {
      const size = await this.step(parseChunkSize, () => RetrieveError.connectionClosed());
      chunks.push(await this.readExactly(size));

      const terminator = await this.stream.read(CRLF.length);
      if (terminator.toString('latin1') !== CRLF) {
        const error = RetrieveError.parser(
          RetrieveErrorKind.MissingChunkTerminator,
          `Expected CRLF after chunk (size: ${size}), got: ${JSON.stringify(terminator.toString('latin1'))}`
        );
        this.logger.warn('Missing CRLF after chunk.', { size });
        throw error;
      }

      if (size === 0) {
        return Buffer.concat(chunks);
      }
    }
  }

  private async readExactly(length: number): Promise<Buffer> {
    const parts: Buffer[] = [];
    let remaining = length;
    while (remaining > 0) {
      const data = await this.stream.read(Math.min(remaining, DEFAULT_CHUNK_SIZE));
      if (data.length === 0) {
        throw RetrieveError.unexpectedEof();
      }
      parts.push(data);
      remaining -= data.length;
    }
    return Buffer.concat(parts, length);
  }

  /**
   * Reads until the server stops sending. Running off the end of the stream
   * is how this body ends, so EOF errors are not failures here.
   */
  private async drain(): Promise<Buffer> {
    const parts: Buffer[] = [];
    if (this.stream.bufferedLength > 0) {
      parts.push(await this.stream.read(this.stream.bufferedLength));
    }

    for (;;) {
      let data: Buffer;
      try {
        data = await this.stream.read(DEFAULT_CHUNK_SIZE, true);
      } catch (err) {
        if (
          err instanceof RetrieveError &&
          (err.kind === RetrieveErrorKind.UnexpectedEof ||
            err.kind === RetrieveErrorKind.ConnectionClosed)
        ) {
          break;
        }
        throw err;
      }
      if (data.length === 0) {
        break;
      }
      parts.push(data);
    }

    return Buffer.concat(parts);
  }

  /**
   * Runs a parse step until it completes. Buffered bytes are tried first, and
   * each incomplete result reads at least one more chunk.
   */
  private async step<T>(parse: ParseStep<T>, onEof: () => RetrieveError): Promise<T> {
    let needMore = this.stream.bufferedLength === 0;
    for (;;) {
      const data = needMore
        ? await this.stream.read(this.stream.bufferedLength + DEFAULT_CHUNK_SIZE, true)
        : await this.stream.read(this.stream.bufferedLength);
      const result = parse(data);

      switch (result.state) {
        case 'complete':
          this.stream.push(result.rest);
          return result.value;
        case 'error':
          this.logger.warn(result.error.message, { kind: result.error.kind });
          throw result.error;
        case 'incomplete':
          this.stream.push(data);
          if (this.stream.closed) {
            const error = onEof();
            this.logger.warn(error.message, { kind: error.kind });
            throw error;
          }
          needMore = true;
          break;
      }
    }
  }
}
