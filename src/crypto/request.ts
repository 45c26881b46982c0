/**
 * Minimal request / response shapes the engine works on.
 *
 * Header names are matched case-insensitively. Setting a header never touches
 * the original object; a copy with the new header is returned instead.
 */

export type HeaderValue = string | number | readonly string[] | undefined;

export type HeaderMap = Readonly<Record<string, HeaderValue>>;

export interface MessageRequest {
  method: string;
  url: string;
  headers: HeaderMap;
}

export interface MessageResponse {
  headers: HeaderMap;
}

function findHeaderName(headers: HeaderMap, name: string): string | undefined {
  const lower = name.toLowerCase();
  return Object.keys(headers).find(
    (key) => key.toLowerCase() === lower && headers[key] !== undefined
  );
}

export function hasHeader(message: { headers: HeaderMap }, name: string): boolean {
  return findHeaderName(message.headers, name) !== undefined;
}

/**
 * Get all values of a header as a single comma separated line
 */
export function getHeaderLine(
  message: { headers: HeaderMap },
  name: string
): string | undefined {
  const key = findHeaderName(message.headers, name);
  if (key === undefined) {
    return undefined;
  }

  return headerLine(message.headers[key]);
}

export function headerLine(value: HeaderValue): string {
  if (value === undefined) {
    return '';
  }

  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }

  return value.join(', ');
}

function withoutHeader(headers: HeaderMap, name: string): Record<string, HeaderValue> {
  const lower = name.toLowerCase();
  return Object.fromEntries(
    Object.entries(headers).filter(([key]) => key.toLowerCase() !== lower)
  );
}

/**
 * Copy of the message with the header replaced
 */
export function withHeader<T extends { headers: HeaderMap }>(
  message: T,
  name: string,
  value: string
): T {
  return { ...message, headers: { ...withoutHeader(message.headers, name), [name]: value } };
}

/**
 * Copy of the message with a value added to the header
 */
export function withAddedHeader<T extends { headers: HeaderMap }>(
  message: T,
  name: string,
  value: string
): T {
  const key = findHeaderName(message.headers, name);
  const current = key === undefined ? undefined : message.headers[key];

  let values: string[];
  if (current === undefined) {
    values = [value];
  } else if (typeof current === 'string' || typeof current === 'number') {
    values = [String(current), value];
  } else {
    values = [...current, value];
  }

  return { ...message, headers: { ...withoutHeader(message.headers, name), [key ?? name]: values } };
}
