import { imageSize } from 'image-size';
import type { DecodedImage } from '../types/request.js';

/**
 * Turns raw bytes into a `DecodedImage`. Throws when the bytes are not an
 * image the decoder understands.
 */
export type ImageDecoder = (bytes: Uint8Array) => DecodedImage;

export const decodeImage: ImageDecoder = (bytes) => {
  const { type, width, height } = imageSize(bytes);
  if (!type || !width || !height) {
    throw new Error('Image format or dimensions could not be determined');
  }
  return { format: type, width, height, data: bytes };
};
