import { HttpEngine } from './HttpEngine';
import { nodeTransport } from './transport/nodeTransport';
import type { HttpEngineConfig, Logger, LoggerMeta } from './types';

/**
 * Logs to console.debug, console.info, console.warn and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta);
  }
}

/**
 * Creates an HttpEngine with the node transport and a console logger.
 *
 * Defaults applied:
 * - Transport: `node:http` / `node:https` (via nodeTransport)
 * - Redirects: at most 5 hops
 * - Retries: counter cap of 1, so no retry
 * - Timeout: 60s per attempt
 * - Tracing: off
 *
 * @example
 * ```typescript
 * const engine = createDefaultHttpEngine({ trace: CURL_TRACE });
 * const result = await engine.open('https://example.org/data', { accept: 'json' });
 * ```
 */
export function createDefaultHttpEngine(config: HttpEngineConfig = {}): HttpEngine {
  return new HttpEngine({
    ...config,
    transport: config.transport ?? nodeTransport,
    logger: config.logger ?? new ConsoleLogger(),
    interceptors: config.interceptors ?? [],
  });
}
