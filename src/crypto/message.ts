/**
 * Canonical signing string
 *
 * Each covered header becomes a `name: value` line; lines are joined with a
 * newline in the order the headers are listed.
 */

import { getHeaderLine, hasHeader, type MessageRequest } from './request.js';

export const REQUEST_TARGET = '(request-target)';

const ORIGIN_PATTERN = /^(?:[a-z][a-z0-9+.-]*:)?\/\/[^/?#]*/i;

/**
 * Strip scheme, user info, host and port from a URL.
 * Path, query and fragment are kept verbatim.
 *
 * @example
 * getPathAndQuery('https://user:pw@example.com:443/foos?a=1');
 * // Returns: "/foos?a=1"
 */
export function getPathAndQuery(url: string): string {
  const target = url.replace(ORIGIN_PATTERN, '');
  return target === '' || !target.startsWith('/') ? `/${target}` : target;
}

/**
 * Value of the (request-target) pseudo-header
 *
 * @example
 * getRequestTarget({ method: 'GET', url: 'https://example.com/foos?a=1', headers: {} });
 * // Returns: "get /foos?a=1"
 */
export function getRequestTarget(request: MessageRequest): string {
  return `${request.method.toLowerCase()} ${getPathAndQuery(request.url)}`;
}

/**
 * Build the message that is signed / verified.
 * A header that isn't present on the request gets an empty value.
 */
export function buildMessage(request: MessageRequest, headers: readonly string[]): string {
  return headers
    .map((header) => header.toLowerCase())
    .map((header) =>
      header === REQUEST_TARGET
        ? `${REQUEST_TARGET}: ${getRequestTarget(request)}`
        : `${header}: ${getHeaderLine(request, header) ?? ''}`
    )
    .join('\n');
}

/**
 * Use `x-date` instead of `date` when the request only has an X-Date header
 */
export function substituteDateHeader(request: MessageRequest, headers: readonly string[]): string[] {
  const useXDate = !hasHeader(request, 'date') && hasHeader(request, 'x-date');
  return headers.map((header) => (useXDate && header === 'date' ? 'x-date' : header));
}
