import { ZodIssueCode, type ZodIssue } from 'zod';
import { EncodingError } from '../errors/http-client-error.js';
import type { ParameterType } from '../types/request.js';
import type { FormDataPart } from './form-data-part.js';
import {
  containsBinary,
  isParameterMap,
  parameterValueSchema,
  type ParameterMap,
  type ParameterValue,
} from './parameters.js';

export interface EncodedRequest {
  /** Percent-encoded query string, without the leading `?`. */
  query?: string;
  body?: string | FormData;
  headers: Record<string, string>;
}

/** True when `value` reaches one of its own ancestors. */
function hasCycle(value: unknown, ancestors = new WeakSet<object>()): boolean {
  if (typeof value !== 'object' || value === null) return false;
  if (value instanceof Uint8Array) return false;
  if (ancestors.has(value)) return true;

  ancestors.add(value);
  const children: Array<unknown> = Array.isArray(value)
    ? value
    : Object.values(value);
  const cyclic = children.some((child) => hasCycle(child, ancestors));
  ancestors.delete(value);
  return cyclic;
}

/** The issue with the longest path, looking inside union branches. */
function deepestIssue(issues: ReadonlyArray<ZodIssue>): ZodIssue | undefined {
  let deepest: ZodIssue | undefined;
  for (const issue of issues) {
    const candidate =
      issue.code === ZodIssueCode.invalid_union
        ? (deepestIssue(issue.unionErrors.flatMap((error) => error.issues)) ??
          issue)
        : issue;
    if (!deepest || candidate.path.length > deepest.path.length) {
      deepest = candidate;
    }
  }
  return deepest;
}

function validateParameters(parameters: unknown): ParameterValue | undefined {
  if (parameters === undefined) return undefined;
  if (hasCycle(parameters)) {
    throw new EncodingError('Parameters contain a cycle');
  }

  const parsed = parameterValueSchema.safeParse(parameters);
  if (!parsed.success) {
    const issue = deepestIssue(parsed.error.issues);
    const where =
      issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new EncodingError(`Unsupported parameter value${where}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function requireMap(
  parameters: ParameterValue,
  parameterType: ParameterType,
): ParameterMap {
  if (!isParameterMap(parameters)) {
    throw new EncodingError(
      `${parameterType} parameters must be a key/value mapping`,
    );
  }
  return parameters;
}

/**
 * Flatten a mapping into ordered key/value pairs. Sequences repeat their key
 * and nested mappings use `key[sub]` notation.
 */
function flatten(
  prefix: string,
  value: ParameterValue,
  visit: (key: string, value: string | Uint8Array) => void,
): void {
  if (value === null) {
    visit(prefix, '');
  } else if (value instanceof Uint8Array) {
    visit(prefix, value);
  } else if (Array.isArray(value)) {
    for (const item of value) flatten(prefix, item, visit);
  } else if (typeof value === 'object') {
    for (const [key, nested] of Object.entries(value)) {
      flatten(`${prefix}[${key}]`, nested, visit);
    }
  } else {
    visit(prefix, String(value));
  }
}

function forEachField(
  map: ParameterMap,
  visit: (key: string, value: string | Uint8Array) => void,
): void {
  for (const [key, value] of Object.entries(map)) {
    flatten(key, value, visit);
  }
}

export function encodeQuery(map: ParameterMap): string {
  const search = new URLSearchParams();
  forEachField(map, (key, value) => {
    if (typeof value !== 'string') {
      throw new EncodingError(
        `Binary value for '${key}' cannot be form-url-encoded`,
      );
    }
    search.append(key, value);
  });
  return search.toString();
}

function encodeMultipart(
  parameters: ParameterValue | undefined,
  parts: ReadonlyArray<FormDataPart>,
): FormData {
  const form = new FormData();

  if (parameters !== undefined) {
    forEachField(requireMap(parameters, 'multipartFormData'), (key, value) => {
      if (typeof value === 'string') {
        form.append(key, value);
      } else {
        form.append(key, new Blob([value.slice()]), key);
      }
    });
  }

  for (const part of parts) {
    if (!part.name) {
      throw new EncodingError('Form data part is missing a field name');
    }
    if (part.data.length === 0) {
      throw new EncodingError(`Form data part '${part.name}' has no content`);
    }
    const content = typeof part.data === 'string' ? part.data : part.data.slice();
    form.append(
      part.name,
      new Blob([content], { type: part.contentType }),
      part.filename ?? part.name,
    );
  }

  return form;
}

/**
 * Turn a parameter bag into a transport-ready query string or body.
 *
 * Throws `EncodingError` for anything outside the supported value shapes so
 * that no transport attempt is made with a malformed request.
 */
export function encodeParameters(
  parameterType: ParameterType,
  parameters: unknown,
  parts: ReadonlyArray<FormDataPart> = [],
): EncodedRequest {
  const value = validateParameters(parameters);

  switch (parameterType) {
    case 'none':
      return { headers: {} };

    case 'formURLEncoded': {
      if (value === undefined) return { headers: {} };
      const query = encodeQuery(requireMap(value, parameterType));
      return query ? { query, headers: {} } : { headers: {} };
    }

    case 'json': {
      if (value === undefined) return { headers: {} };
      if (containsBinary(value)) {
        throw new EncodingError('Binary values cannot be JSON encoded');
      }
      return {
        body: JSON.stringify(value),
        headers: { 'content-type': 'application/json' },
      };
    }

    case 'multipartFormData':
      // fetch writes the boundary into the content-type header
      return { body: encodeMultipart(value, parts), headers: {} };
  }
}

export function appendQuery(url: URL, query: string | undefined): URL {
  if (!query) return url;
  const next = new URL(url.href);
  next.search = next.search ? `${next.search.slice(1)}&${query}` : query;
  return next;
}
