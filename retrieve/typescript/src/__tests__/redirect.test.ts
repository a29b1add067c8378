/**
 * Tests for redirect handling.
 */

import { describe, it, expect } from 'vitest';
import { RetrieveError, RetrieveErrorKind } from '../errors';
import { HeaderMap } from '../headers';
import {
  DEFAULT_MAX_REDIRECTS,
  RedirectChain,
  isRedirect,
  isSuccess,
  redirectAction,
  resolveLocation,
  shouldFollow,
} from '../redirect';
import type { HttpResponse } from '../types';

function response(status: string, location?: string): HttpResponse {
  return {
    httpVersion: '1.1',
    status,
    reason: 'Redirect',
    headers: new HeaderMap(location === undefined ? {} : { Location: location }),
    body: Buffer.alloc(0),
  };
}

describe('redirectAction', () => {
  it('should map each followed status', () => {
    expect(redirectAction('301')).toEqual({ follow: true, permanent: true, forceGet: false });
    expect(redirectAction('302')).toEqual({ follow: true, permanent: false, forceGet: false });
    expect(redirectAction('303')).toEqual({ follow: true, permanent: false, forceGet: true });
    expect(redirectAction('307')).toEqual({ follow: true, permanent: false, forceGet: false });
  });

  it.each(['300', '304', '305', '308', '399'])('should not follow %s', (status) => {
    expect(redirectAction(status)).toEqual({ follow: false });
  });
});

describe('status classes', () => {
  it('should classify statuses by their literal form', () => {
    expect(isRedirect('302')).toBe(true);
    expect(isRedirect('200')).toBe(false);
    expect(isSuccess('204')).toBe(true);
    expect(isSuccess('2000')).toBe(false);
  });
});

describe('shouldFollow', () => {
  it('should apply boolean policies', async () => {
    expect(await shouldFollow(true, response('302', '/a'))).toBe(true);
    expect(await shouldFollow(false, response('302', '/a'))).toBe(false);
  });

  it('should ask predicates, sync or async', async () => {
    const toDocs = (r: HttpResponse): boolean => r.headers.get('Location') === '/docs';

    expect(await shouldFollow(toDocs, response('302', '/docs'))).toBe(true);
    expect(await shouldFollow(toDocs, response('302', '/other'))).toBe(false);
    expect(await shouldFollow(async () => true, response('301', '/'))).toBe(true);
  });
});

describe('resolveLocation', () => {
  const base = new URL('http://example.com/dir/page?x=1');

  it('should resolve relative locations against the request URI', () => {
    expect(resolveLocation(base, response('302', 'other'))?.href).toBe(
      'http://example.com/dir/other'
    );
    expect(resolveLocation(base, response('302', '/root'))?.href).toBe('http://example.com/root');
    expect(resolveLocation(base, response('302', 'http://other.example/'))?.href).toBe(
      'http://other.example/'
    );
  });

  it('should return undefined without Location', () => {
    expect(resolveLocation(base, response('302'))).toBeUndefined();
  });

  it('should reject an unparseable Location', () => {
    expect(() => resolveLocation(base, response('302', 'http://[bad'))).toThrow(
      expect.objectContaining({ kind: RetrieveErrorKind.InvalidUri, status: '302' })
    );
  });
});

describe('RedirectChain', () => {
  it('should default to twenty redirects', () => {
    const chain = new RedirectChain();
    for (let i = 0; i < DEFAULT_MAX_REDIRECTS; i++) {
      chain.recordFollow('302');
    }

    expect(chain.followedCount).toBe(20);
    expect(() => chain.recordFollow('302')).toThrow('Too many redirects (limit: 20)');
  });

  it('should raise TooManyRedirects with the status', () => {
    const chain = new RedirectChain(0);

    try {
      chain.recordFollow('301');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RetrieveError);
      expect(err).toMatchObject({ kind: RetrieveErrorKind.TooManyRedirects, status: '301' });
    }
  });

  it('should keep entries in order', () => {
    const chain = new RedirectChain();
    chain.append(new URL('http://example.com/'), response('302', '/a'));
    chain.append(new URL('http://example.com/a'), response('301', '/b'));

    expect(chain.length).toBe(2);
    expect(chain.toArray().map((entry) => entry.uri.pathname)).toEqual(['/', '/a']);
  });

  it('should move the permanent URI through leading 301s only', () => {
    const chain = new RedirectChain();
    chain.append(new URL('http://example.com/'), response('301', '/a'));
    chain.append(new URL('http://example.com/a'), response('301', 'http://other.example/b'));
    chain.append(new URL('http://other.example/b'), response('302', '/c'));
    chain.append(new URL('http://other.example/c'), response('301', '/d'));

    expect(chain.resolvePermanentUri(new URL('http://example.com/')).href).toBe(
      'http://other.example/b'
    );
  });

  it('should keep the initial URI when the chain starts with a temporary redirect', () => {
    const chain = new RedirectChain();
    chain.append(new URL('http://example.com/'), response('302', '/a'));
    chain.append(new URL('http://example.com/a'), response('301', '/b'));

    expect(chain.resolvePermanentUri(new URL('http://example.com/')).href).toBe(
      'http://example.com/'
    );
  });
});
