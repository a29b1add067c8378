/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCategory,
  RetrieveError,
  RetrieveErrorKind,
  isRetrieveError,
  isRetryableError,
} from '../errors';

describe('RetrieveError', () => {
  it('should categorize by kind', () => {
    expect(new RetrieveError(RetrieveErrorKind.NoClient, 'x').category()).toBe(ErrorCategory.Input);
    expect(new RetrieveError(RetrieveErrorKind.InvalidHeader, 'x').category()).toBe(
      ErrorCategory.Protocol
    );
    expect(new RetrieveError(RetrieveErrorKind.ReadTimeout, 'x').category()).toBe(
      ErrorCategory.Transport
    );
    expect(new RetrieveError(RetrieveErrorKind.MissingStream, 'x').category()).toBe(
      ErrorCategory.Usage
    );
  });

  it('should mark only transport errors retryable', () => {
    expect(RetrieveError.unexpectedEof().isRetryable()).toBe(true);
    expect(RetrieveError.connectionClosed().isRetryable()).toBe(true);
    expect(RetrieveError.invalidOption('bad').isRetryable()).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('should carry the status and cause', () => {
    const cause = new Error('underlying');
    const error = new RetrieveError(RetrieveErrorKind.TooManyRedirects, 'Too many redirects', {
      status: '302',
      cause,
    });

    expect(error.status).toBe('302');
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('RetrieveError');
    expect(error).toBeInstanceOf(Error);
    expect(isRetrieveError(error)).toBe(true);
  });

  it('should build the fixed messages', () => {
    expect(RetrieveError.unexpectedEof().message).toBe('Server returned empty response.');
    expect(RetrieveError.connectionClosed().message).toBe('Socket closed.');
    expect(RetrieveError.missingStream('No stream to close.').kind).toBe(
      RetrieveErrorKind.MissingStream
    );
  });

  it('should serialize to JSON', () => {
    const error = new RetrieveError(RetrieveErrorKind.InvalidChunkSize, 'Could not determine chunk size.');

    expect(error.toJSON()).toEqual({
      name: 'RetrieveError',
      kind: 'invalid_chunk_size',
      category: 'protocol',
      message: 'Could not determine chunk size.',
      status: undefined,
    });
  });
});
