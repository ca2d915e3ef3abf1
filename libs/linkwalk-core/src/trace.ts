import { STATUS_CODES } from 'node:http';
import type { ResolvedTraceConfig } from './config';
import type { HttpMetadata, Logger, TraceConfig, TransportRequest } from './types';

/** Enables every trace category, like running the request through `curl -v`. */
export const CURL_TRACE: Readonly<Required<TraceConfig>> = { sendRequest: true, receiveReply: true };

export function traceRequest(logger: Logger | undefined, trace: ResolvedTraceConfig, request: TransportRequest): void {
  if (!logger || !trace.sendRequest) return;
  const meta = { category: 'send_request' };
  logger.debug(`> ${request.method} ${request.url}`, meta);
  for (const [name, value] of Object.entries(request.headers)) {
    logger.debug(`> ${name}: ${value}`, meta);
  }
  if (request.body !== undefined) {
    const body = typeof request.body === 'string' ? request.body : request.body.toString('utf8');
    logger.debug(`REQUEST BODY\n${body}`, meta);
  }
}

export function traceReply(logger: Logger | undefined, trace: ResolvedTraceConfig, metadata: HttpMetadata): void {
  if (!logger || !trace.receiveReply) return;
  const meta = { category: 'receive_reply' };
  logger.debug(`< ${metadata.status} (${STATUS_CODES[metadata.status] ?? 'Unknown'})`, meta);
  for (const [name, values] of Object.entries(metadata.headers)) {
    for (const value of values) {
      logger.debug(`< ${name}: ${value}`, meta);
    }
  }
}
