export type HttpClientErrorKind =
  | 'encoding'
  | 'transport'
  | 'cancelled'
  | 'decoding'
  | 'url-composition';

export interface HttpClientErrorOptions {
  /** Parsed response body, if available. */
  data?: unknown;
  /** Response headers, if available. */
  headers?: Headers;
  /** Underlying error that triggered this one. */
  cause?: unknown;
}

/**
 * Base error class for HTTP client errors.
 * Every failure delivered to a caller is one of its subclasses, told apart
 * by `kind`.
 */
export class HttpClientError extends Error {
  public readonly kind: HttpClientErrorKind;
  public readonly statusCode?: number;
  /** Parsed response body from the failed request. */
  public readonly data?: unknown;
  /** Response headers from the failed request. */
  public readonly headers?: Headers;

  constructor(
    kind: HttpClientErrorKind,
    message: string,
    statusCode?: number,
    options?: HttpClientErrorOptions,
  ) {
    super(message, { cause: options?.cause });
    this.name = 'HttpClientError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.data = options?.data;
    this.headers = options?.headers;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Parameters or multipart parts could not be turned into a request. */
export class EncodingError extends HttpClientError {
  constructor(message: string, options?: HttpClientErrorOptions) {
    super('encoding', message, undefined, options);
    this.name = 'EncodingError';
  }
}

/**
 * The request failed on the wire or the server answered with a non-2xx
 * status. `statusCode` is set only when a response arrived.
 */
export class TransportError extends HttpClientError {
  constructor(
    message: string,
    statusCode?: number,
    options?: HttpClientErrorOptions,
  ) {
    super('transport', message, statusCode, options);
    this.name = 'TransportError';
  }
}

export class CancelledError extends HttpClientError {
  constructor(message = 'Request was cancelled', options?: HttpClientErrorOptions) {
    super('cancelled', message, undefined, options);
    this.name = 'CancelledError';
  }
}

/** The response body does not match the expected response type. */
export class DecodingError extends HttpClientError {
  constructor(
    message: string,
    statusCode?: number,
    options?: HttpClientErrorOptions,
  ) {
    super('decoding', message, statusCode, options);
    this.name = 'DecodingError';
  }
}

export class UrlCompositionError extends HttpClientError {
  constructor(message: string, options?: HttpClientErrorOptions) {
    super('url-composition', message, undefined, options);
    this.name = 'UrlCompositionError';
  }
}

export function isHttpClientError(value: unknown): value is HttpClientError {
  return value instanceof HttpClientError;
}
