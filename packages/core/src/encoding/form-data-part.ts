/**
 * One binary field of a multipart/form-data body.
 */
export interface FormDataPart {
  /** Form field name. */
  name: string;
  data: Uint8Array | string;
  /** Filename sent in the part's Content-Disposition. */
  filename?: string;
  contentType: string;
}

export function pngPart(
  name: string,
  data: Uint8Array,
  filename = `${name}.png`,
): FormDataPart {
  return { name, data, filename, contentType: 'image/png' };
}

export function jpegPart(
  name: string,
  data: Uint8Array,
  filename = `${name}.jpg`,
): FormDataPart {
  return { name, data, filename, contentType: 'image/jpeg' };
}

export function customPart(
  name: string,
  data: Uint8Array | string,
  contentType: string,
  filename?: string,
): FormDataPart {
  return { name, data, filename, contentType };
}
