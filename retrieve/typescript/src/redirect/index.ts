/**
 * Redirect handling and permanent-URI resolution.
 */

import { RetrieveError, RetrieveErrorKind } from '../errors';
import type { HttpResponse, RedirectPolicy } from '../types';

/** Default cap on redirects followed by one open. */
export const DEFAULT_MAX_REDIRECTS = 20;

/**
 * What to do with a redirect response once the policy allows following it.
 */
export type RedirectAction =
  | { follow: false }
  | { follow: true; permanent: boolean; forceGet: boolean };

/**
 * Maps a 3xx status to its action.
 *
 * 300 (multiple choices) and 305 (use proxy) are never followed, nor is any
 * status without a defined action.
 */
export function redirectAction(status: string): RedirectAction {
  switch (status) {
    case '301':
      return { follow: true, permanent: true, forceGet: false };
    case '302':
    case '307':
      return { follow: true, permanent: false, forceGet: false };
    case '303':
      return { follow: true, permanent: false, forceGet: true };
    default:
      return { follow: false };
  }
}

/**
 * Whether a status is a redirect (3xx).
 */
export function isRedirect(status: string): boolean {
  return /^3\d\d$/.test(status);
}

/**
 * Whether a status is a success (2xx).
 */
export function isSuccess(status: string): boolean {
  return /^2\d\d$/.test(status);
}

/**
 * Applies the redirect policy to a response.
 */
export async function shouldFollow(policy: RedirectPolicy, response: HttpResponse): Promise<boolean> {
  if (typeof policy === 'boolean') {
    return policy;
  }
  return (await policy(response)) === true;
}

/**
 * Resolves a response's Location header against the URI it answered.
 *
 * @returns undefined when there is no Location header
 */
export function resolveLocation(uri: URL, response: HttpResponse): URL | undefined {
  const location = response.headers.get('Location');
  if (location === undefined) {
    return undefined;
  }
  try {
    return new URL(location, uri);
  } catch (err) {
    throw new RetrieveError(RetrieveErrorKind.InvalidUri, `Invalid Location: ${location}`, {
      status: response.status,
      cause: err instanceof Error ? err : undefined,
    });
  }
}

/**
 * One redirect: the URI requested and the 3xx response it produced.
 */
export interface RedirectEntry {
  readonly uri: URL;
  readonly response: HttpResponse;
}

/**
 * Redirects seen during one logical open, in order.
 */
export class RedirectChain {
  private readonly entries: RedirectEntry[] = [];
  private followed = 0;
  private readonly maxRedirects: number;

  constructor(maxRedirects: number = DEFAULT_MAX_REDIRECTS) {
    this.maxRedirects = maxRedirects;
  }

  get length(): number {
    return this.entries.length;
  }

  /** Number of redirects followed so far. */
  get followedCount(): number {
    return this.followed;
  }

  append(uri: URL, response: HttpResponse): void {
    this.entries.push({ uri, response });
  }

  /**
   * Counts a followed redirect.
   *
   * @throws RetrieveError of kind TooManyRedirects once the cap is passed
   */
  recordFollow(status: string): void {
    this.followed++;
    if (this.followed > this.maxRedirects) {
      throw new RetrieveError(
        RetrieveErrorKind.TooManyRedirects,
        `Too many redirects (limit: ${this.maxRedirects})`,
        { status }
      );
    }
  }

  toArray(): RedirectEntry[] {
    return [...this.entries];
  }

  /**
   * Resolves the permanent URI.
   *
   * Only an unbroken run of 301s from the start of the chain moves it. Each
   * one moves it to that redirect's target.
   */
  resolvePermanentUri(initial: URL): URL {
    let permanent = initial;
    for (const entry of this.entries) {
      if (entry.response.status !== '301') {
        break;
      }
      const target = resolveLocation(entry.uri, entry.response);
      if (target === undefined) {
        break;
      }
      permanent = target;
    }
    return permanent;
  }
}
