import path from 'node:path';
import { InvalidOptionsError } from '@linkwalk/core';

const UNSAFE_CHARACTERS = /[\\/:*?"<>|\x00-\x1f]/g;

/**
 * Local file for the content of `uri`: the last non-empty path segment,
 * or the host name when the path has none, inside `directory`.
 */
export function localFileForUri(uri: string, directory: string = process.cwd()): string {
  if (!URL.canParse(uri)) {
    throw new InvalidOptionsError([`uri: "${uri}" is not an absolute URI`]);
  }
  const url = new URL(uri);
  const segments = url.pathname.split('/').filter(Boolean);
  const last = segments[segments.length - 1];
  const name = last === undefined ? url.hostname : safeDecode(last);
  const fileName = name.replace(UNSAFE_CHARACTERS, '_');
  if (!fileName || fileName === '.' || fileName === '..') {
    throw new InvalidOptionsError([`uri: no local file name can be derived from "${uri}"`]);
  }
  return path.join(directory, fileName);
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
