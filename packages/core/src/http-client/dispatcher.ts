import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type { ResponseCodec } from '../cache/codecs.js';
import type { TieredCacheStore } from '../cache/tiered-cache-store.js';
import type { Scheduler } from '../config/client-options.js';
import {
  appendQuery,
  encodeParameters,
  type EncodedRequest,
} from '../encoding/parameter-encoder.js';
import type { FormDataPart } from '../encoding/form-data-part.js';
import type { ParameterValue } from '../encoding/parameters.js';
import {
  CancelledError,
  DecodingError,
  HttpClientError,
  TransportError,
} from '../errors/http-client-error.js';
import {
  identifierFor,
  type RegistryLease,
  type RequestRegistry,
} from '../registry/request-registry.js';
import type { Transport, TransportResponse } from '../transport/transport.js';
import type {
  CachingPolicy,
  Completion,
  FailureResult,
  HttpVerb,
  ParameterType,
  RequestResult,
  RequestTask,
  ResponseMetadata,
  ResponseType,
} from '../types/request.js';
import { composeUrl } from '../url/compose-url.js';

const ACCEPT_HEADERS: Record<ResponseType, string> = {
  json: 'application/json',
  image: 'image/*',
  data: '*/*',
};

/**
 * Everything needed to run one request. Built by the client facade and not
 * modified afterwards.
 */
export interface RequestDescriptor<T> {
  readonly verb: HttpVerb;
  readonly path: string;
  readonly parameterType: ParameterType;
  readonly parameters?: ParameterValue;
  readonly parts?: ReadonlyArray<FormDataPart>;
  readonly codec: ResponseCodec<T>;
  readonly cachingPolicy: CachingPolicy;
  /** Defaults to `path`. */
  readonly cacheName?: string;
  readonly headers?: Readonly<Record<string, string>>;
}

export interface DispatcherOptions {
  baseUrl: string;
  headers: Record<string, string>;
  transport: Transport;
  cache: TieredCacheStore;
  registry: RequestRegistry;
  schedule: Scheduler;
  logger: Logger;
}

/**
 * Parts force multipart encoding, and a GET or DELETE without parameters
 * never carries a body or query.
 */
export function resolveParameterType(
  verb: HttpVerb,
  parameterType: ParameterType,
  parameters: ParameterValue | undefined,
  parts: ReadonlyArray<FormDataPart> | undefined,
): ParameterType {
  if (parts && parts.length > 0) return 'multipartFormData';
  if ((verb === 'GET' || verb === 'DELETE') && parameters === undefined) {
    return 'none';
  }
  return parameterType;
}

function mergeHeaders(
  ...sources: Array<Readonly<Record<string, string>> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const source of sources) {
    if (!source) continue;
    for (const [name, value] of Object.entries(source)) {
      merged[name.toLowerCase()] = value;
    }
  }
  return merged;
}

function parseErrorBody(bytes: Uint8Array): unknown {
  if (bytes.length === 0) return undefined;
  const text = new TextDecoder().decode(bytes);
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Runs requests: cache lookup, encoding, registration, transport, decoding,
 * cache write, and delivery of exactly one result per dispatch.
 */
export class Dispatcher {
  private disposed = false;

  constructor(private readonly options: DispatcherOptions) {}

  dispatch<T>(
    descriptor: RequestDescriptor<T>,
    completion?: Completion<T>,
  ): RequestTask<T> {
    const { cache, logger } = this.options;
    const { verb, path, codec, cachingPolicy } = descriptor;
    const cacheName = descriptor.cacheName ?? path;

    if (this.disposed) {
      const error = new CancelledError('Client has been disposed');
      return this.settled(randomUUID(), this.failure(error), completion);
    }

    // 1. Cache: a hit never reaches the registry or the transport
    const hit = cache.lookup(cacheName, codec, cachingPolicy);
    if (hit) {
      const id = randomUUID();
      logger.debug(
        {
          requestId: id,
          cacheName,
          responseType: codec.responseType,
          tier: hit.tier,
        },
        'cache hit',
      );
      return this.settled(
        id,
        { ok: true, value: hit.value, cached: true },
        completion,
      );
    }

    // 2. Compose and encode; failures here never reach the transport
    let url: URL;
    try {
      url = composeUrl(this.options.baseUrl, path);
    } catch (error) {
      return this.settled(randomUUID(), this.failure(error), completion);
    }
    const id = identifierFor(verb, url);

    let encoded: EncodedRequest;
    try {
      const parameterType = resolveParameterType(
        verb,
        descriptor.parameterType,
        descriptor.parameters,
        descriptor.parts,
      );
      encoded = encodeParameters(
        parameterType,
        descriptor.parameters,
        descriptor.parts,
      );
    } catch (error) {
      return this.settled(id, this.failure(error), completion);
    }

    // 3. Register and execute
    const lease = this.options.registry.register(id);
    const requestUrl = appendQuery(url, encoded.query);
    logger.debug(
      { requestId: id, method: verb, url: requestUrl.href },
      'dispatching request',
    );

    const result = this.execute(
      descriptor,
      lease,
      requestUrl,
      encoded,
      cacheName,
    ).catch((error: unknown) => {
      this.options.registry.deregister(lease);
      return this.failure(error);
    });
    return { id, result: this.deliver(result, completion) };
  }

  /** Cancel the in-flight entry for `id`. */
  cancel(id: string): boolean {
    const cancelled = this.options.registry.cancel(id, new CancelledError());
    this.options.logger.debug(
      { requestId: id, cancelled: cancelled ? 1 : 0 },
      'cancel',
    );
    return cancelled;
  }

  cancelAll(): number {
    const cancelled = this.options.registry.cancelAll(new CancelledError());
    this.options.logger.debug({ cancelled }, 'cancel all');
    return cancelled;
  }

  /**
   * Cancel everything in flight and release both cache tiers. Later
   * dispatches fail with `CancelledError`.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cancelAll();
    this.options.cache.close();
  }

  private async execute<T>(
    descriptor: RequestDescriptor<T>,
    lease: RegistryLease,
    url: URL,
    encoded: EncodedRequest,
    cacheName: string,
  ): Promise<RequestResult<T>> {
    const { registry, transport, cache } = this.options;
    const { codec } = descriptor;

    const headers = mergeHeaders(
      { accept: ACCEPT_HEADERS[codec.responseType] },
      this.options.headers,
      descriptor.headers,
      encoded.headers,
    );
    // fetch writes the multipart boundary into its own content-type
    if (encoded.body instanceof FormData) {
      delete headers['content-type'];
    }

    let response: TransportResponse;
    try {
      response = await transport.execute({
        method: descriptor.verb,
        url,
        headers,
        body: encoded.body,
        signal: lease.signal,
      });
    } catch (error) {
      registry.deregister(lease);
      if (lease.signal.aborted) {
        return this.failure(new CancelledError(undefined, { cause: error }));
      }
      return this.failure(
        new TransportError(errorMessage(error), undefined, { cause: error }),
      );
    }
    registry.deregister(lease);

    const metadata: ResponseMetadata = {
      url: response.url,
      statusCode: response.status,
      headers: response.headers,
    };

    // The entry may have been cancelled while the body was still arriving
    if (lease.signal.aborted) {
      return this.failure(new CancelledError(), metadata);
    }

    if (response.status < 200 || response.status >= 300) {
      const error = new TransportError(
        `Request failed with status ${response.status}`,
        response.status,
        { data: parseErrorBody(response.data), headers: response.headers },
      );
      return this.failure(error, metadata);
    }

    let value: T;
    try {
      value = codec.decode(response.data);
    } catch (error) {
      const decodingError = new DecodingError(
        errorMessage(error),
        response.status,
        {
          headers: response.headers,
          cause: error instanceof DecodingError ? error.cause : error,
        },
      );
      return this.failure(decodingError, metadata);
    }

    cache.put(cacheName, value, codec, descriptor.cachingPolicy);
    return { ok: true, value, cached: false, response: metadata };
  }

  private failure(error: unknown, response?: ResponseMetadata): FailureResult {
    const clientError =
      error instanceof HttpClientError
        ? error
        : new TransportError(errorMessage(error), undefined, { cause: error });
    return response
      ? { ok: false, error: clientError, response }
      : { ok: false, error: clientError };
  }

  private settled<T>(
    id: string,
    result: RequestResult<T>,
    completion?: Completion<T>,
  ): RequestTask<T> {
    return { id, result: this.deliver(Promise.resolve(result), completion) };
  }

  /**
   * Hands the result to `completion` once, on the delivery context. A
   * completion or scheduler that throws is logged and does not affect
   * `result`.
   */
  private deliver<T>(
    pending: Promise<RequestResult<T>>,
    completion?: Completion<T>,
  ): Promise<RequestResult<T>> {
    if (!completion) return pending;

    const { logger, schedule } = this.options;
    return pending.then((result) => {
      const run = () => {
        try {
          completion(result);
        } catch (error) {
          logger.warn({ err: error }, 'completion callback threw');
        }
      };
      try {
        schedule(run);
      } catch (error) {
        logger.warn({ err: error }, 'scheduling the completion failed');
      }
      return result;
    });
  }
}
