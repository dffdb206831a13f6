export {
  HttpClientError,
  EncodingError,
  TransportError,
  CancelledError,
  DecodingError,
  UrlCompositionError,
  isHttpClientError,
} from './http-client-error.js';
export type {
  HttpClientErrorKind,
  HttpClientErrorOptions,
} from './http-client-error.js';
