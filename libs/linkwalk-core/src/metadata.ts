import { getHeaderValue, getHeaderValues } from './headers';
import { parseMediaType } from './mediaType';
import type { HeaderMap, HttpMetadata, MediaType } from './types';

export interface LinkValue {
  uri: string;
  /** Relation types, lower-cased. */
  rel: string[];
  params: Record<string, string>;
}

const LINK_VALUE_PATTERN = /<([^>]*)>([^<]*)/g;

function unquote(value: string): string {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
}

function parseParams(segment: string): Record<string, string> {
  const params: Record<string, string> = {};
  for (const raw of segment.split(';')) {
    const param = raw.trim();
    if (!param) continue;
    const eq = param.indexOf('=');
    const name = (eq === -1 ? param : param.slice(0, eq)).trim().toLowerCase();
    if (!name || Object.prototype.hasOwnProperty.call(params, name)) continue;
    params[name] = eq === -1 ? '' : unquote(param.slice(eq + 1).trim());
  }
  return params;
}

/**
 * Parses every link-value of one or more `Link` header values, in order.
 */
export function parseLinkHeader(values: string | readonly string[]): LinkValue[] {
  const links: LinkValue[] = [];
  for (const value of typeof values === 'string' ? [values] : values) {
    for (const match of value.matchAll(LINK_VALUE_PATTERN)) {
      const params = parseParams(match[2].replace(/[\s,]+$/, ''));
      const rel = (params.rel ?? '').toLowerCase().split(/\s+/).filter(Boolean);
      links.push({ uri: match[1].trim(), rel, params });
    }
  }
  return links;
}

export function findLink(headers: HeaderMap, relation: string): string | undefined {
  const wanted = relation.toLowerCase();
  return parseLinkHeader(getHeaderValues(headers, 'link')).find((link) => link.rel.includes(wanted))?.uri;
}

export function finalMetadata(metas: readonly HttpMetadata[]): HttpMetadata | undefined {
  return metas[metas.length - 1];
}

export function metadataLink(metas: readonly HttpMetadata[], relation: string): string | undefined {
  const meta = finalMetadata(metas);
  return meta ? findLink(meta.headers, relation) : undefined;
}

export function metadataContentType(metas: readonly HttpMetadata[]): MediaType | undefined {
  const meta = finalMetadata(metas);
  const value = meta ? getHeaderValue(meta.headers, 'content-type') : undefined;
  return value === undefined ? undefined : parseMediaType(value);
}

/**
 * File name from an `attachment; filename="..."` content disposition.
 */
export function metadataFileName(metas: readonly HttpMetadata[]): string | undefined {
  const meta = finalMetadata(metas);
  const value = meta ? getHeaderValue(meta.headers, 'content-disposition') : undefined;
  if (!value) return undefined;
  const [disposition, ...rest] = value.split(';');
  if (disposition.trim().toLowerCase() !== 'attachment') return undefined;
  const fileName = parseParams(rest.join(';')).filename;
  return fileName ? fileName : undefined;
}

export function metadataFinalUri(metas: readonly HttpMetadata[]): string | undefined {
  return finalMetadata(metas)?.uri;
}

export function metadataStatus(metas: readonly HttpMetadata[]): number | undefined {
  return finalMetadata(metas)?.status;
}

export function metadataLastModified(metas: readonly HttpMetadata[]): Date | undefined {
  const meta = finalMetadata(metas);
  const value = meta ? getHeaderValue(meta.headers, 'last-modified') : undefined;
  if (!value) return undefined;
  const time = Date.parse(value);
  return Number.isNaN(time) ? undefined : new Date(time);
}
