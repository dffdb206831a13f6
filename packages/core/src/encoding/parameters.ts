import { z } from 'zod';

export type ParameterScalar = string | number | boolean | null;

/**
 * A loosely structured parameter bag: scalars, sequences, mappings, and raw
 * bytes. Bytes are only accepted by multipart encoding.
 */
export type ParameterValue =
  | ParameterScalar
  | Uint8Array
  | Array<ParameterValue>
  | { [key: string]: ParameterValue };

export type ParameterMap = { [key: string]: ParameterValue };

function isPlainObject(value: unknown): value is object {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export const parameterValueSchema: z.ZodType<
  ParameterValue,
  z.ZodTypeDef,
  unknown
> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.instanceof(Uint8Array),
    z.array(parameterValueSchema),
    z
      .custom<object>(isPlainObject, 'Expected a plain object')
      .pipe(z.record(parameterValueSchema)),
  ]),
);

export function isParameterMap(value: ParameterValue): value is ParameterMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

export function containsBinary(value: ParameterValue): boolean {
  if (value instanceof Uint8Array) return true;
  if (Array.isArray(value)) return value.some(containsBinary);
  if (isParameterMap(value)) return Object.values(value).some(containsBinary);
  return false;
}
