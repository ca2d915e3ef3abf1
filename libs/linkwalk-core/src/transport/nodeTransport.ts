import http from 'node:http';
import https from 'node:https';
import { TransportTimeoutError } from '../errors';
import type { HttpTransport, TransportRequest, TransportResponse } from '../types';

function toHeaderLines(rawHeaders: string[]): string[] {
  const lines: string[] = [];
  for (let index = 0; index + 1 < rawHeaders.length; index += 2) {
    lines.push(`${rawHeaders[index]}: ${rawHeaders[index + 1]}`);
  }
  return lines;
}

/**
 * Transport over `node:http` / `node:https`. Never follows redirects,
 * accepts any server certificate, and reports every header line as
 * received.
 */
export const nodeTransport: HttpTransport = (req: TransportRequest): Promise<TransportResponse> =>
  new Promise((resolve, reject) => {
    const url = new URL(req.url);
    const options: https.RequestOptions = {
      method: req.method,
      headers: req.headers,
      rejectUnauthorized: false,
    };
    const onResponse = (response: http.IncomingMessage) => {
      resolve({
        status: response.statusCode ?? 0,
        headerLines: toHeaderLines(response.rawHeaders),
        version: { major: response.httpVersionMajor, minor: response.httpVersionMinor },
        body: response,
      });
    };
    const request =
      url.protocol === 'https:' ? https.request(url, options, onResponse) : http.request(url, options, onResponse);

    request.setTimeout(req.timeoutMs, () => {
      request.destroy(new TransportTimeoutError(req.url, req.timeoutMs));
    });
    request.on('error', reject);

    if (req.body !== undefined) {
      request.end(req.body);
    } else {
      request.end();
    }
  });
