export * from './types';
export * from './errors';
export { HttpEngine } from './HttpEngine';
export { ConsoleLogger, createDefaultHttpEngine } from './factories';
export * from './interceptors';
export {
  DEFAULT_NUMBER_OF_HOPS,
  DEFAULT_NUMBER_OF_RETRIES,
  DEFAULT_TIMEOUT_MS,
  resolveEngineDefaults,
  parseOpenOptions,
  parseWith,
} from './config';
export type { ParsedOpenOptions, ResolvedEngineDefaults, ResolvedTraceConfig } from './config';
export * from './headers';
export * from './mediaType';
export * from './metadata';
export * from './status';
export { CURL_TRACE } from './trace';
export * from './transport/nodeTransport';
export * from './transport/fetchTransport';
export * from './transport/memoryTransport';
