import type { Readable } from 'node:stream';
import { HttpEngineError, HttpStatusError } from './errors';
import type { StatusClass } from './types';

export const DEFAULT_SUCCESS_STATUS = 200;
export const DEFAULT_FAILURE_STATUS = 400;
export const STATUS_BODY_EXCERPT_LENGTH = 1000;

export function classifyStatus(status: number): StatusClass {
  if (!Number.isInteger(status)) return 'unrecognized';
  if (status >= 200 && status <= 299) return 'success';
  if (status >= 300 && status <= 399) return 'redirect';
  if (status === 401) return 'auth';
  if (status >= 400 && status <= 599) return 'failure';
  return 'unrecognized';
}

export interface StatusPolicy {
  failure?: number;
}

export type StatusDecision = 'stream' | 'negative';

/**
 * Reads up to `limit` characters of a body and destroys the stream.
 */
export async function readExcerpt(body: Readable, limit = STATUS_BODY_EXCERPT_LENGTH): Promise<string> {
  let text = '';
  try {
    for await (const chunk of body) {
      text += typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');
      if (text.length >= limit) break;
    }
  } finally {
    body.destroy();
  }
  return text.slice(0, limit);
}

/**
 * Maps the final status of a logical request onto its outcome. The body
 * is closed for a negative outcome and for an error; otherwise it stays
 * open for the caller.
 */
export async function applyStatusPolicy(
  status: number,
  body: Readable,
  finalUri: string,
  policy: StatusPolicy = {},
): Promise<StatusDecision> {
  const failure = policy.failure ?? DEFAULT_FAILURE_STATUS;

  if (status >= 400 && status <= 599) {
    if (status === 401) return 'stream';
    if (status === failure) {
      body.destroy();
      return 'negative';
    }
    const excerpt = await readExcerpt(body);
    throw new HttpStatusError(status, excerpt, finalUri);
  }

  if (status >= 200 && status <= 299) {
    // the declared `success` code is validated upstream but never enforced here
    return 'stream';
  }

  body.destroy();
  throw new HttpEngineError('internal', `Status ${status} from ${finalUri} should have been resolved before the status policy`);
}
