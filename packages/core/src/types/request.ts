import type { HttpClientError } from '../errors/http-client-error.js';

export type HttpVerb = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Encoding strategy applied to request parameters. */
export type ParameterType =
  | 'none'
  | 'formURLEncoded'
  | 'json'
  | 'multipartFormData';

/** Decoding target for a fetched payload. */
export type ResponseType = 'json' | 'image' | 'data';

/**
 * Which cache tiers a response participates in.
 *
 * - `none`: bypass all caching
 * - `memory`: tier 1 only
 * - `memoryAndFile`: tier 1, then the disk tier; disk hits are promoted
 */
export type CachingPolicy = 'none' | 'memory' | 'memoryAndFile';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
  | JsonPrimitive
  | Array<JsonValue>
  | { [key: string]: JsonValue };

export interface DecodedImage {
  /** Image format as reported by the decoder, e.g. `png` or `jpg`. */
  format: string;
  width: number;
  height: number;
  /** The encoded image bytes as received. */
  data: Uint8Array;
}

export interface ResponseTypeMap {
  json: JsonValue;
  image: DecodedImage;
  data: Uint8Array;
}

export interface ResponseMetadata {
  url: string;
  statusCode: number;
  headers: Headers;
}

export interface SuccessResult<T> {
  ok: true;
  value: T;
  /** True when the value came from a cache tier and no request was made. */
  cached: boolean;
  response?: ResponseMetadata;
}

export interface FailureResult {
  ok: false;
  error: HttpClientError;
  response?: ResponseMetadata;
}

export type RequestResult<T> = SuccessResult<T> | FailureResult;

export type Completion<T> = (result: RequestResult<T>) => void;

/**
 * Handle returned synchronously by every dispatch. `result` settles exactly
 * once and never rejects.
 */
export interface RequestTask<T> {
  id: string;
  result: Promise<RequestResult<T>>;
}
