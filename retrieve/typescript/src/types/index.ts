/**
 * Shared types for the retrieve client.
 */

import { HeaderMap } from '../headers';

/**
 * A parsed HTTP response.
 *
 * The status is kept in its literal textual form ("200", "301").
 */
export interface HttpResponse {
  /** Protocol version, e.g. "1.1". */
  httpVersion: string;
  /** Three-digit status code as sent by the server. */
  status: string;
  /** Reason phrase. */
  reason: string;
  /** Response headers. */
  headers: HeaderMap;
  /** Fully assembled body. */
  body: Buffer;
}

/**
 * Metadata a client attaches to a resource.
 */
export type ResourceMetadata = Record<string, unknown>;

/**
 * Metadata written by the HTTP client.
 */
export interface HttpMetadata {
  httpVersion: string;
  status: string;
  reason: string;
  headers: HeaderMap;
}

/**
 * File type reported by the file client.
 */
export type FileType =
  | 'file'
  | 'directory'
  | 'characterSpecial'
  | 'blockSpecial'
  | 'fifo'
  | 'link'
  | 'socket';

/**
 * Metadata written by the file client.
 */
export interface FileMetadata {
  accessTime: Date;
  changeTime: Date;
  modifiedTime: Date;
  fileType?: FileType;
  fileMode: number;
  userId: number;
  groupId: number;
}

/**
 * Decides whether a redirect response should be followed.
 */
export type RedirectPredicate = (response: HttpResponse) => boolean | Promise<boolean>;

/**
 * Redirect policy: always, never, or per response.
 */
export type RedirectPolicy = boolean | RedirectPredicate;

/**
 * Cookie values sent with a request. A list sends one cookie line per value.
 */
export type CookieValue = string | readonly string[] | null | undefined;

/**
 * Cookies keyed by name.
 */
export type CookieMap = Record<string, CookieValue>;

/**
 * Request header values. A list sends one header line per value.
 */
export type HeaderValues = Record<string, string | readonly string[]>;

/**
 * Request entity.
 */
export type RequestBody = string | Uint8Array;

/**
 * Capabilities a client may offer beyond open/read/close.
 */
export type Capability = 'open' | 'read' | 'close' | 'write';
