export { HttpClient } from './http-client/http-client.js';
export {
  Dispatcher,
  resolveParameterType,
} from './http-client/dispatcher.js';
export type {
  RequestDescriptor,
  DispatcherOptions,
} from './http-client/dispatcher.js';
export { validateClientOptions } from './config/client-options.js';
export type {
  HttpClientOptions,
  ValidatedHttpClientOptions,
  Scheduler,
} from './config/client-options.js';
export { RequestRegistry, identifierFor } from './registry/request-registry.js';
export type { RegistryLease } from './registry/request-registry.js';
export { composeUrl } from './url/compose-url.js';
export { decodeImage } from './decoders/image-decoder.js';
export type { ImageDecoder } from './decoders/image-decoder.js';
export { createLogger } from './logging/logger.js';
export type { CreateLoggerOptions, Logger } from './logging/logger.js';
export * from './cache/index.js';
export * from './encoding/index.js';
export * from './errors/index.js';
export * from './stores/index.js';
export * from './transport/index.js';
export * from './types/index.js';
