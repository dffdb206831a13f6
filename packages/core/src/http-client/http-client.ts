import type { Logger } from 'pino';
import {
  createResponseCodecs,
  type ResponseCodecs,
} from '../cache/codecs.js';
import { TieredCacheStore } from '../cache/tiered-cache-store.js';
import {
  validateClientOptions,
  type HttpClientOptions,
} from '../config/client-options.js';
import { createLogger } from '../logging/logger.js';
import {
  identifierFor,
  RequestRegistry,
} from '../registry/request-registry.js';
import type { CacheTiers } from '../stores/cache-tier.js';
import { FetchTransport } from '../transport/fetch-transport.js';
import type {
  BodyRequestOptions,
  DeleteOptions,
  DownloadOptions,
  GetOptions,
  HttpClientContract,
  PostOptions,
} from '../types/http-client.js';
import type {
  Completion,
  DecodedImage,
  HttpVerb,
  JsonValue,
  RequestTask,
} from '../types/request.js';
import { composeUrl } from '../url/compose-url.js';
import { Dispatcher } from './dispatcher.js';

/**
 * HTTP client with per-verb entry points, cancellation by verb and path,
 * and a two-tier (memory, disk) response cache.
 *
 * The client owns its request registry and cache tiers; `dispose()` tears
 * them down together.
 *
 * @example
 * ```ts
 * const client = new HttpClient({
 *   baseUrl: 'https://api.example.com',
 *   stores: { memory: new InMemoryCacheStore() },
 * });
 * const { result } = client.get('/users', { cachingPolicy: 'memory' });
 * const outcome = await result;
 * if (outcome.ok) console.log(outcome.value);
 * ```
 */
export class HttpClient implements HttpClientContract {
  readonly baseUrl: string;
  readonly stores: CacheTiers;
  readonly registry = new RequestRegistry();
  readonly cache: TieredCacheStore;
  private readonly codecs: ResponseCodecs;
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions) {
    const validated = validateClientOptions(options);

    this.baseUrl = validated.baseUrl;
    this.stores = validated.stores;
    this.logger = validated.logger ?? createLogger();
    this.codecs = createResponseCodecs(validated.imageDecoder);
    this.cache = new TieredCacheStore(this.stores, this.logger);
    this.dispatcher = new Dispatcher({
      baseUrl: validated.baseUrl,
      headers: validated.headers,
      transport: validated.transport ?? new FetchTransport(),
      cache: this.cache,
      registry: this.registry,
      schedule: validated.schedule ?? queueMicrotask,
      logger: this.logger,
    });
  }

  get(
    path: string,
    options: GetOptions = {},
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue> {
    return this.dispatcher.dispatch(
      {
        verb: 'GET',
        path,
        parameterType: 'formURLEncoded',
        parameters: options.parameters,
        codec: this.codecs.json,
        cachingPolicy: options.cachingPolicy ?? 'none',
        cacheName: options.cacheName,
        headers: options.headers,
      },
      completion,
    );
  }

  post(
    path: string,
    options: PostOptions = {},
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue> {
    return this.dispatcher.dispatch(
      {
        verb: 'POST',
        path,
        parameterType: options.parameterType ?? 'json',
        parameters: options.parameters,
        parts: options.parts,
        codec: this.codecs.json,
        cachingPolicy: 'none',
        headers: options.headers,
      },
      completion,
    );
  }

  put(
    path: string,
    options: BodyRequestOptions = {},
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue> {
    return this.sendBody('PUT', path, options, completion);
  }

  patch(
    path: string,
    options: BodyRequestOptions = {},
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue> {
    return this.sendBody('PATCH', path, options, completion);
  }

  delete(
    path: string,
    options: DeleteOptions = {},
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue> {
    return this.dispatcher.dispatch(
      {
        verb: 'DELETE',
        path,
        parameterType: 'formURLEncoded',
        parameters: options.parameters,
        codec: this.codecs.json,
        cachingPolicy: 'none',
        headers: options.headers,
      },
      completion,
    );
  }

  cancelGET(path: string): boolean {
    return this.cancelRequest('GET', path);
  }

  cancelPOST(path: string): boolean {
    return this.cancelRequest('POST', path);
  }

  cancelPUT(path: string): boolean {
    return this.cancelRequest('PUT', path);
  }

  cancelPATCH(path: string): boolean {
    return this.cancelRequest('PATCH', path);
  }

  cancelDELETE(path: string): boolean {
    return this.cancelRequest('DELETE', path);
  }

  downloadImage(
    path: string,
    options: DownloadOptions = {},
    completion?: Completion<DecodedImage>,
  ): RequestTask<DecodedImage> {
    return this.dispatcher.dispatch(
      {
        verb: 'GET',
        path,
        parameterType: 'none',
        codec: this.codecs.image,
        cachingPolicy: options.cachingPolicy ?? 'memoryAndFile',
        cacheName: options.cacheName,
        headers: options.headers,
      },
      completion,
    );
  }

  /** Downloads share their identifier with GETs to the same path. */
  cancelImageDownload(path: string): boolean {
    return this.cancelRequest('GET', path);
  }

  imageFromCache(path: string, cacheName?: string): DecodedImage | undefined {
    return this.cache.get(cacheName ?? path, this.codecs.image);
  }

  downloadData(
    path: string,
    options: DownloadOptions = {},
    completion?: Completion<Uint8Array>,
  ): RequestTask<Uint8Array> {
    return this.dispatcher.dispatch(
      {
        verb: 'GET',
        path,
        parameterType: 'none',
        codec: this.codecs.data,
        cachingPolicy: options.cachingPolicy ?? 'memoryAndFile',
        cacheName: options.cacheName,
        headers: options.headers,
      },
      completion,
    );
  }

  cancelDataDownload(path: string): boolean {
    return this.cancelRequest('GET', path);
  }

  dataFromCache(path: string, cacheName?: string): Uint8Array | undefined {
    return this.cache.get(cacheName ?? path, this.codecs.data);
  }

  /** Cancel by the identifier a dispatch returned. */
  cancel(id: string): boolean {
    return this.dispatcher.cancel(id);
  }

  cancelAllRequests(): number {
    return this.dispatcher.cancelAll();
  }

  /** Drop every cached response type stored under the path or cache name. */
  removeFromCache(path: string, cacheName?: string): void {
    this.cache.invalidate(cacheName ?? path);
  }

  clearCache(): void {
    this.cache.clear();
  }

  dispose(): void {
    this.dispatcher.dispose();
  }

  private sendBody(
    verb: HttpVerb,
    path: string,
    options: BodyRequestOptions,
    completion?: Completion<JsonValue>,
  ): RequestTask<JsonValue> {
    return this.dispatcher.dispatch(
      {
        verb,
        path,
        parameterType: options.parameterType ?? 'json',
        parameters: options.parameters,
        codec: this.codecs.json,
        cachingPolicy: 'none',
        headers: options.headers,
      },
      completion,
    );
  }

  private cancelRequest(verb: HttpVerb, path: string): boolean {
    let url: URL;
    try {
      url = composeUrl(this.baseUrl, path);
    } catch (error) {
      this.logger.debug({ err: error, path }, 'cannot cancel malformed path');
      return false;
    }
    return this.dispatcher.cancel(identifierFor(verb, url));
  }
}
