import type { FormDataPart } from '../encoding/form-data-part.js';
import type { ParameterMap, ParameterValue } from '../encoding/parameters.js';
import type {
  CachingPolicy,
  Completion,
  DecodedImage,
  JsonValue,
  ParameterType,
  RequestTask,
} from './request.js';

interface BaseRequestOptions {
  /** Extra headers for this request only. */
  headers?: Record<string, string>;
}

export interface GetOptions extends BaseRequestOptions {
  /** Percent-encoded into the query string. */
  parameters?: ParameterMap;
  cachingPolicy?: CachingPolicy;
  /** Key for the cached response, by default the path. */
  cacheName?: string;
}

export interface BodyRequestOptions extends BaseRequestOptions {
  /** Defaults to `json`. */
  parameterType?: ParameterType;
  parameters?: ParameterValue;
}

export interface PostOptions extends BodyRequestOptions {
  /** Non-empty parts force multipart/form-data encoding. */
  parts?: ReadonlyArray<FormDataPart>;
}

export interface DeleteOptions extends BaseRequestOptions {
  /** Percent-encoded into the query string. */
  parameters?: ParameterMap;
}

export interface DownloadOptions extends BaseRequestOptions {
  cacheName?: string;
  /** Defaults to `memoryAndFile`. */
  cachingPolicy?: CachingPolicy;
}

export interface HttpClientContract {
  get(
    path: string,
    options?: GetOptions,
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue>;
  post(
    path: string,
    options?: PostOptions,
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue>;
  put(
    path: string,
    options?: BodyRequestOptions,
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue>;
  patch(
    path: string,
    options?: BodyRequestOptions,
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue>;
  delete(
    path: string,
    options?: DeleteOptions,
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue>;

  /**
   * Each cancel method aborts the in-flight request for that verb and path,
   * which then completes with a `CancelledError`. Returns false when nothing
   * was in flight.
   */
  cancelGET(path: string): boolean;
  cancelPOST(path: string): boolean;
  cancelPUT(path: string): boolean;
  cancelPATCH(path: string): boolean;
  cancelDELETE(path: string): boolean;

  downloadImage(
    path: string,
    options?: DownloadOptions,
    completion?: Completion<DecodedImage>,
  ): RequestTask<DecodedImage>;
  downloadData(
    path: string,
    options?: DownloadOptions,
    completion?: Completion<Uint8Array>,
  ): RequestTask<Uint8Array>;
  /** Reads the cache tiers only; never touches the network. */
  imageFromCache(path: string, cacheName?: string): DecodedImage | undefined;
  /** Reads the cache tiers only; never touches the network. */
  dataFromCache(path: string, cacheName?: string): Uint8Array | undefined;
}
