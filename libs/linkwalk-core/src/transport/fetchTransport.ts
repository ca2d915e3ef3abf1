import { Readable } from 'node:stream';
import { TransportTimeoutError } from '../errors';
import type { HttpTransport, TransportRequest, TransportResponse } from '../types';

/**
 * Transport over the global fetch API with `redirect: 'manual'`.
 *
 * Fetch folds repeated headers into one comma-joined line (except
 * `set-cookie`), does not expose the protocol version, and always
 * verifies certificates; use {@link nodeTransport} when any of that matters.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest): Promise<TransportResponse> => {
  const init: RequestInit = {
    method: req.method,
    headers: req.headers,
    body: req.body,
    redirect: 'manual',
    signal: AbortSignal.timeout(req.timeoutMs),
  };

  let response: Response;
  try {
    response = await fetch(req.url, init);
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new TransportTimeoutError(req.url, req.timeoutMs);
    }
    throw error;
  }

  const headerLines: string[] = [];
  response.headers.forEach((value, key) => {
    if (key === 'set-cookie') return;
    headerLines.push(`${key}: ${value}`);
  });
  for (const cookie of response.headers.getSetCookie()) {
    headerLines.push(`set-cookie: ${cookie}`);
  }

  return {
    status: response.status,
    headerLines,
    version: { major: 1, minor: 1 },
    body: response.body ? Readable.fromWeb(response.body) : Readable.from([]),
  };
};
