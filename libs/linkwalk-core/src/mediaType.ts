import { InvalidOptionsError, UnknownExtensionError } from './errors';
import type { AcceptOption, MediaType } from './types';

const TOKEN = "[!#$%&'*+.^_`|~0-9A-Za-z-]+";
const TOKEN_PATTERN = new RegExp(`^${TOKEN}$`);
const BASE_PATTERN = new RegExp(`^[ \\t]*(${TOKEN})/(${TOKEN})[ \\t]*`);
const PARAM_PATTERN = new RegExp(`;[ \\t]*(${TOKEN})=("(?:[^"\\\\]|\\\\.)*"|${TOKEN})[ \\t]*`, 'y');

export const DEFAULT_ACCEPT = '*/*';

const EXTENSION_MEDIA_TYPES: Record<string, string> = {
  atom: 'application/atom+xml',
  csv: 'text/csv',
  gz: 'application/gzip',
  htm: 'text/html',
  html: 'text/html',
  jpeg: 'image/jpeg',
  jpg: 'image/jpeg',
  js: 'text/javascript',
  json: 'application/json',
  jsonld: 'application/ld+json',
  n3: 'text/n3',
  nq: 'application/n-quads',
  nt: 'application/n-triples',
  pdf: 'application/pdf',
  png: 'image/png',
  rdf: 'application/rdf+xml',
  svg: 'image/svg+xml',
  trig: 'application/trig',
  ttl: 'text/turtle',
  tsv: 'text/tab-separated-values',
  txt: 'text/plain',
  xml: 'application/xml',
  zip: 'application/zip',
};

/**
 * Parses a `Content-Type`-style value. Returns undefined when the value
 * does not follow the media type grammar.
 */
export function parseMediaType(value: string): MediaType | undefined {
  const base = BASE_PATTERN.exec(value);
  if (!base) return undefined;

  const parameters: Record<string, string> = {};
  let position = base[0].length;
  while (position < value.length) {
    PARAM_PATTERN.lastIndex = position;
    const match = PARAM_PATTERN.exec(value);
    if (!match) {
      // tolerate a dangling separator, as in `text/plain;`
      return /^[ \t;]*$/.test(value.slice(position)) ? build(base, parameters) : undefined;
    }
    parameters[match[1].toLowerCase()] = unquote(match[2]);
    position = PARAM_PATTERN.lastIndex;
  }
  return build(base, parameters);
}

function build(base: RegExpExecArray, parameters: Record<string, string>): MediaType {
  return { type: base[1].toLowerCase(), subtype: base[2].toLowerCase(), parameters };
}

function unquote(value: string): string {
  if (!value.startsWith('"')) return value;
  return value.slice(1, -1).replace(/\\(.)/g, '$1');
}

export function formatMediaType(mediaType: MediaType): string {
  const params = Object.entries(mediaType.parameters).map(([key, value]) => {
    const formatted = TOKEN_PATTERN.test(value) ? value : `"${value.replace(/(["\\])/g, '\\$1')}"`;
    return `;${key}=${formatted}`;
  });
  return `${mediaType.type}/${mediaType.subtype}${params.join('')}`;
}

export function mediaTypeForExtension(extension: string): MediaType | undefined {
  const key = extension.replace(/^\./, '').toLowerCase();
  const registered = Object.prototype.hasOwnProperty.call(EXTENSION_MEDIA_TYPES, key)
    ? EXTENSION_MEDIA_TYPES[key]
    : undefined;
  return registered ? parseMediaType(registered) : undefined;
}

/**
 * Builds an `Accept` value from media types ordered from most to least
 * preferred. The i-th of N entries gets weight i/N.
 */
export function buildAcceptValue(mediaTypes: readonly MediaType[]): string {
  if (mediaTypes.length === 0) {
    throw new InvalidOptionsError(['accept: at least one media type is required']);
  }
  const count = mediaTypes.length;
  return mediaTypes
    .map((mediaType, index) => `${formatMediaType(mediaType)};q=${((index + 1) / count).toFixed(3)}`)
    .join(', ');
}

function toMediaType(value: string | MediaType): MediaType {
  if (typeof value !== 'string') return value;
  const parsed = parseMediaType(value);
  if (!parsed) {
    throw new InvalidOptionsError([`accept: "${value}" is not a media type`]);
  }
  return parsed;
}

export function resolveAccept(option?: AcceptOption): string {
  if (option === undefined) return DEFAULT_ACCEPT;
  if (Array.isArray(option)) return buildAcceptValue(option.map(toMediaType));
  if (typeof option === 'string' && !option.includes('/')) {
    const mediaType = mediaTypeForExtension(option);
    if (!mediaType) throw new UnknownExtensionError(option);
    return buildAcceptValue([mediaType]);
  }
  return buildAcceptValue([toMediaType(option)]);
}
