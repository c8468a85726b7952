import type { TokenAttachment } from '../config/options';

/** Sets `token` as the `queryParam` query parameter on a copy of `url`. */
export function attachTokenToUrl(url: string | URL, token: string, queryParam: string): URL {
  const result = typeof url === 'string' ? new URL(url) : new URL(url.href);
  result.searchParams.set(queryParam, token);
  return result;
}

export interface AuthorizedTarget {
  url: URL;
  headers: Record<string, string>;
}

/** Applies the credential to the handshake the way `attachment` says. */
export function authorize(
  endpoint: URL,
  token: string | null,
  attachment: TokenAttachment,
  queryParam: string
): AuthorizedTarget {
  if (token === null || token === '') {
    return { url: new URL(endpoint.href), headers: {} };
  }
  const url = attachment === 'header' ? new URL(endpoint.href) : attachTokenToUrl(endpoint, token, queryParam);
  const headers: Record<string, string> =
    attachment === 'query' ? {} : { Authorization: `Bearer ${token}` };
  return { url, headers };
}

/** Endpoint for log lines, with the credential query parameter masked. */
export function redactUrl(url: URL, queryParam: string): string {
  if (!url.searchParams.has(queryParam)) return url.href;
  const copy = new URL(url.href);
  copy.searchParams.set(queryParam, '***');
  return copy.href;
}
