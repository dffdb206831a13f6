export type {
  HttpClientContract,
  GetOptions,
  BodyRequestOptions,
  PostOptions,
  DeleteOptions,
  DownloadOptions,
} from './http-client.js';
export type {
  HttpVerb,
  ParameterType,
  ResponseType,
  CachingPolicy,
  JsonPrimitive,
  JsonValue,
  DecodedImage,
  ResponseTypeMap,
  ResponseMetadata,
  SuccessResult,
  FailureResult,
  RequestResult,
  Completion,
  RequestTask,
} from './request.js';
