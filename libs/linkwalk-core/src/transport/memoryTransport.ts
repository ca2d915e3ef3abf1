import { Readable } from 'node:stream';
import type { HttpTransport, HttpVersion, TransportRequest, TransportResponse } from '../types';

export interface MemoryResponse {
  status: number;
  /** Raw header lines, e.g. `Location: /next`. */
  headers?: string[];
  body?: string;
  version?: HttpVersion;
}

/**
 * A fixed response, a sequence served in order (the last one repeats), or
 * a function of the request.
 */
export type MemoryRoute = MemoryResponse | MemoryResponse[] | ((request: TransportRequest) => MemoryResponse);

export interface MemoryTransport extends HttpTransport {
  /** Every request received, in order. */
  readonly requests: TransportRequest[];
  /** Every body handed out, in order. */
  readonly bodies: Readable[];
}

export class NoRouteError extends Error {
  constructor(readonly url: string) {
    super(`No memory route for ${url}`);
    this.name = 'NoRouteError';
  }
}

/**
 * In-process transport serving scripted responses keyed by absolute URL.
 */
export function createMemoryTransport(routes: Record<string, MemoryRoute>): MemoryTransport {
  const requests: TransportRequest[] = [];
  const bodies: Readable[] = [];
  const served = new Map<string, number>();

  const pick = (request: TransportRequest): MemoryResponse => {
    const route = Object.prototype.hasOwnProperty.call(routes, request.url) ? routes[request.url] : undefined;
    if (route === undefined) throw new NoRouteError(request.url);
    if (typeof route === 'function') return route(request);
    if (!Array.isArray(route)) return route;
    const index = served.get(request.url) ?? 0;
    served.set(request.url, index + 1);
    return route[Math.min(index, route.length - 1)];
  };

  const transport = async (request: TransportRequest): Promise<TransportResponse> => {
    requests.push(request);
    const response = pick(request);
    const body = Readable.from(response.body ? [Buffer.from(response.body)] : []);
    bodies.push(body);
    return {
      status: response.status,
      headerLines: response.headers ?? [],
      version: response.version ?? { major: 1, minor: 1 },
      body,
    };
  };

  return Object.assign(transport, { requests, bodies });
}
