/**
 * Error types for the retrieve client.
 */

/**
 * Error kinds categorizing different failure modes.
 */
export enum RetrieveErrorKind {
  // Input errors
  InvalidUri = 'invalid_uri',
  NoClient = 'no_client',
  InvalidScheme = 'invalid_scheme',
  InvalidClient = 'invalid_client',
  DuplicateScheme = 'duplicate_scheme',
  InvalidOption = 'invalid_option',
  InvalidResource = 'invalid_resource',

  // Protocol errors
  MissingStartLine = 'missing_start_line',
  InvalidStartLine = 'invalid_start_line',
  InvalidHeader = 'invalid_header',
  InvalidContentLength = 'invalid_content_length',
  InvalidChunkSize = 'invalid_chunk_size',
  MissingChunkTerminator = 'missing_chunk_terminator',
  TooManyRedirects = 'too_many_redirects',

  // Transport errors
  ReadTimeout = 'read_timeout',
  ConnectTimeout = 'connect_timeout',
  ConnectionRefused = 'connection_refused',
  ConnectionReset = 'connection_reset',
  ConnectionClosed = 'connection_closed',
  UnexpectedEof = 'unexpected_eof',

  // Usage errors
  MissingStream = 'missing_stream',
  UnsupportedOperation = 'unsupported_operation',
}

/**
 * Broad error categories.
 */
export enum ErrorCategory {
  Input = 'input',
  Protocol = 'protocol',
  Transport = 'transport',
  Usage = 'usage',
}

const CATEGORY_BY_KIND: Record<RetrieveErrorKind, ErrorCategory> = {
  [RetrieveErrorKind.InvalidUri]: ErrorCategory.Input,
  [RetrieveErrorKind.NoClient]: ErrorCategory.Input,
  [RetrieveErrorKind.InvalidScheme]: ErrorCategory.Input,
  [RetrieveErrorKind.InvalidClient]: ErrorCategory.Input,
  [RetrieveErrorKind.DuplicateScheme]: ErrorCategory.Input,
  [RetrieveErrorKind.InvalidOption]: ErrorCategory.Input,
  [RetrieveErrorKind.InvalidResource]: ErrorCategory.Input,
  [RetrieveErrorKind.MissingStartLine]: ErrorCategory.Protocol,
  [RetrieveErrorKind.InvalidStartLine]: ErrorCategory.Protocol,
  [RetrieveErrorKind.InvalidHeader]: ErrorCategory.Protocol,
  [RetrieveErrorKind.InvalidContentLength]: ErrorCategory.Protocol,
  [RetrieveErrorKind.InvalidChunkSize]: ErrorCategory.Protocol,
  [RetrieveErrorKind.MissingChunkTerminator]: ErrorCategory.Protocol,
  [RetrieveErrorKind.TooManyRedirects]: ErrorCategory.Protocol,
  [RetrieveErrorKind.ReadTimeout]: ErrorCategory.Transport,
  [RetrieveErrorKind.ConnectTimeout]: ErrorCategory.Transport,
  [RetrieveErrorKind.ConnectionRefused]: ErrorCategory.Transport,
  [RetrieveErrorKind.ConnectionReset]: ErrorCategory.Transport,
  [RetrieveErrorKind.ConnectionClosed]: ErrorCategory.Transport,
  [RetrieveErrorKind.UnexpectedEof]: ErrorCategory.Transport,
  [RetrieveErrorKind.MissingStream]: ErrorCategory.Usage,
  [RetrieveErrorKind.UnsupportedOperation]: ErrorCategory.Usage,
};

/**
 * Retrieve error with detailed information.
 */
export class RetrieveError extends Error {
  /** Error kind. */
  readonly kind: RetrieveErrorKind;
  /** Literal HTTP status, when the error concerns a response. */
  readonly status?: string;
  /** Underlying cause. */
  readonly cause?: Error;

  constructor(
    kind: RetrieveErrorKind,
    message: string,
    options?: {
      status?: string;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'RetrieveError';
    this.kind = kind;
    this.status = options?.status;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RetrieveError);
    }
  }

  /**
   * Returns the category of this error.
   */
  category(): ErrorCategory {
    return CATEGORY_BY_KIND[this.kind];
  }

  /**
   * Returns true if a fresh request might succeed.
   *
   * Nothing in the client retries on its own; this is a hint for callers.
   */
  isRetryable(): boolean {
    return this.category() === ErrorCategory.Transport;
  }

  /**
   * Creates an invalid option error.
   */
  static invalidOption(message: string): RetrieveError {
    return new RetrieveError(RetrieveErrorKind.InvalidOption, message);
  }

  /**
   * Creates a usage error for an operation that needs an open stream.
   */
  static missingStream(message: string): RetrieveError {
    return new RetrieveError(RetrieveErrorKind.MissingStream, message);
  }

  /**
   * Creates a protocol error raised while parsing a response.
   */
  static parser(kind: RetrieveErrorKind, message: string): RetrieveError {
    return new RetrieveError(kind, message);
  }

  /**
   * Creates an error for a response that ended before it was complete.
   */
  static unexpectedEof(): RetrieveError {
    return new RetrieveError(RetrieveErrorKind.UnexpectedEof, 'Server returned empty response.');
  }

  /**
   * Creates a connection-closed error.
   */
  static connectionClosed(): RetrieveError {
    return new RetrieveError(RetrieveErrorKind.ConnectionClosed, 'Socket closed.');
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      category: this.category(),
      message: this.message,
      status: this.status,
    };
  }
}

/**
 * Type guard for RetrieveError.
 */
export function isRetrieveError(error: unknown): error is RetrieveError {
  return error instanceof RetrieveError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isRetrieveError(error)) {
    return error.isRetryable();
  }
  return false;
}
