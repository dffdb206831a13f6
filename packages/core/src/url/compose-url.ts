import { UrlCompositionError } from '../errors/http-client-error.js';

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Join a base URL and a request path into an absolute URL.
 *
 * Paths that are already absolute http(s) URLs are used as-is, which lets
 * image and data downloads point at hosts other than the API host.
 */
export function composeUrl(baseUrl: string, path: string): URL {
  const target = ABSOLUTE_URL.test(path)
    ? path
    : `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;

  let url: URL;
  try {
    url = new URL(target);
  } catch (error) {
    throw new UrlCompositionError(
      `Cannot compose a URL from base '${baseUrl}' and path '${path}'`,
      { cause: error },
    );
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new UrlCompositionError(
      `Unsupported protocol '${url.protocol}' in '${url.href}'`,
    );
  }
  return url;
}
