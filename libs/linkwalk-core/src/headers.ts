import type { HeaderMap } from './types';

const TOKEN_PATTERN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/**
 * Parses one `field-name ":" OWS field-value OWS` line. Returns undefined
 * for anything else, e.g. the continuation line of obsolete line folding.
 */
export function parseHeaderLine(line: string): [string, string] | undefined {
  const colon = line.indexOf(':');
  if (colon <= 0) return undefined;
  const name = line.slice(0, colon);
  if (!TOKEN_PATTERN.test(name)) return undefined;
  const value = line.slice(colon + 1).replace(/^[ \t]+|[ \t]+$/g, '');
  return [name.toLowerCase(), value];
}

export function parseHeaderLines(lines: readonly string[]): HeaderMap {
  const grouped = new Map<string, string[]>();
  for (const line of lines) {
    const pair = parseHeaderLine(line);
    if (!pair) continue;
    const [name, value] = pair;
    const values = grouped.get(name);
    if (values) {
      values.push(value);
    } else {
      grouped.set(name, [value]);
    }
  }
  return Object.fromEntries(grouped);
}

export function getHeaderValues(headers: HeaderMap, name: string): string[] {
  const key = name.toLowerCase();
  return Object.prototype.hasOwnProperty.call(headers, key) ? headers[key] : [];
}

/** First value of a header, if present. */
export function getHeaderValue(headers: HeaderMap, name: string): string | undefined {
  return getHeaderValues(headers, name)[0];
}

export function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name.toLowerCase());
}
