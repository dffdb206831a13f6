import { decodeImage, type ImageDecoder } from '../decoders/image-decoder.js';
import { DecodingError } from '../errors/http-client-error.js';
import type {
  DecodedImage,
  JsonValue,
  ResponseType,
  ResponseTypeMap,
} from '../types/request.js';

/**
 * Converts between the bytes a response (or the disk tier) carries and the
 * decoded object callers receive.
 */
export interface ResponseCodec<T> {
  readonly responseType: ResponseType;
  /** Recognises a decoded value read back from the memory tier. */
  is(value: unknown): value is T;
  /** Throws `DecodingError` when the bytes do not match the response type. */
  decode(bytes: Uint8Array): T;
  encode(value: T): Uint8Array;
}

export type ResponseCodecs = {
  [K in ResponseType]: ResponseCodec<ResponseTypeMap[K]>;
};

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object': {
      if (Array.isArray(value)) return true;
      const proto: unknown = Object.getPrototypeOf(value);
      return proto === Object.prototype || proto === null;
    }
    default:
      return false;
  }
}

function isDecodedImage(value: unknown): value is DecodedImage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'data' in value &&
    value.data instanceof Uint8Array &&
    'format' in value &&
    typeof value.format === 'string' &&
    'width' in value &&
    typeof value.width === 'number' &&
    'height' in value &&
    typeof value.height === 'number'
  );
}

export const jsonCodec: ResponseCodec<JsonValue> = {
  responseType: 'json',
  is: isJsonValue,
  decode(bytes) {
    if (bytes.length === 0) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(textDecoder.decode(bytes));
    } catch (error) {
      throw new DecodingError('Response body is not valid JSON', undefined, {
        cause: error,
      });
    }
    if (!isJsonValue(parsed)) {
      throw new DecodingError('Response body is not valid JSON');
    }
    return parsed;
  },
  encode(value) {
    return textEncoder.encode(JSON.stringify(value));
  },
};

export const dataCodec: ResponseCodec<Uint8Array> = {
  responseType: 'data',
  is: (value): value is Uint8Array => value instanceof Uint8Array,
  decode: (bytes) => bytes,
  encode: (value) => value,
};

export function createImageCodec(
  decoder: ImageDecoder = decodeImage,
): ResponseCodec<DecodedImage> {
  return {
    responseType: 'image',
    is: isDecodedImage,
    decode(bytes) {
      try {
        return decoder(bytes);
      } catch (error) {
        throw new DecodingError('Response body is not a decodable image', undefined, {
          cause: error,
        });
      }
    },
    encode: (value) => value.data,
  };
}

export function createResponseCodecs(
  imageDecoder: ImageDecoder = decodeImage,
): ResponseCodecs {
  return {
    json: jsonCodec,
    image: createImageCodec(imageDecoder),
    data: dataCodec,
  };
}
