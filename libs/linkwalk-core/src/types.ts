import type { Readable } from 'node:stream';

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Outgoing request headers. */
export type HttpHeaders = Record<string, string>;

/**
 * Normalized response headers: lower-cased header name to every value
 * received for it, in the order the lines arrived.
 */
export type HeaderMap = Record<string, string[]>;

export interface HttpVersion {
  major: number;
  minor: number;
}

export interface AttemptTimestamp {
  start: Date;
  end: Date;
}

/**
 * Description of one physical request/response exchange.
 */
export interface HttpMetadata {
  uri: string;
  status: number;
  headers: HeaderMap;
  timestamp: AttemptTimestamp;
  version: HttpVersion;
}

export interface MediaType {
  type: string;
  subtype: string;
  parameters: Record<string, string>;
}

/**
 * A media type string (`text/html`), a parsed media type, a registered
 * file extension (`json`), or a ranked list of media types, most
 * preferred first.
 */
export type AcceptOption = string | MediaType | Array<string | MediaType>;

export type RequestBody = string | Buffer;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * cURL-like protocol tracing. Trace lines go to the engine's logger at
 * debug level.
 */
export interface TraceConfig {
  /** Request line, request headers and request body. */
  sendRequest?: boolean;
  /** Status line and every response header. */
  receiveReply?: boolean;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: RequestBody;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  /** One `Name: value` string per received header line. */
  headerLines: string[];
  version: HttpVersion;
  body: Readable;
}

/**
 * Performs exactly one exchange. Implementations never follow redirects,
 * accept any server certificate, and enforce `timeoutMs` themselves.
 */
export interface HttpTransport {
  (request: TransportRequest): Promise<TransportResponse>;
}

export interface BeforeSendContext {
  request: TransportRequest;
  attempt: number;
}

export interface AfterResponseContext {
  request: TransportRequest;
  attempt: number;
  metadata: HttpMetadata;
}

/**
 * Runs once per physical attempt, redirects and retries included.
 *
 * `beforeSend` hooks run in registration order and may mutate the request;
 * a throwing hook aborts the logical request. `afterResponse` hooks run in
 * reverse registration order and only observe; their failures are logged.
 */
export interface HttpAttemptInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;
  afterResponse?(ctx: AfterResponseContext): Promise<void> | void;
}

export interface EngineDefaults {
  numberOfHops?: number;
  numberOfRetries?: number;
  timeoutMs?: number;
}

export interface HttpEngineConfig {
  transport?: HttpTransport;
  logger?: Logger;
  trace?: TraceConfig;
  defaultHeaders?: HttpHeaders;
  defaults?: EngineDefaults;
  interceptors?: HttpAttemptInterceptor[];
}

export interface HttpOpenOptions {
  method?: HttpMethod;
  headers?: HttpHeaders;
  body?: RequestBody;
  accept?: AcceptOption;
  /** Maximum number of redirects followed. Default 5. */
  numberOfHops?: number;
  /**
   * Cap on the retry counter. The counter starts at 1 for the first
   * attempt, so the default of 1 performs no retry.
   */
  numberOfRetries?: number;
  /** Status mapped onto success. Default 200. */
  success?: number;
  /** Status mapped onto a negative outcome. Default 400. */
  failure?: number;
  /** Hand over the final stream whatever its status. */
  statusPassthrough?: boolean;
  timeoutMs?: number;
}

export interface HttpOpenResultBase {
  status: number;
  finalUri: string;
  /** Oldest attempt first; the last record describes the final response. */
  metadata: HttpMetadata[];
  /** URI advertised with `rel="next"` by the final response. */
  next?: string;
}

export interface HttpStreamResult extends HttpOpenResultBase {
  kind: 'stream';
  body: Readable;
}

export interface HttpNegativeResult extends HttpOpenResultBase {
  kind: 'negative';
}

export type HttpOpenResult = HttpStreamResult | HttpNegativeResult;

/** Outcome of a HEAD request; any body has already been closed. */
export interface HttpHeadResult extends HttpOpenResultBase {
  kind: HttpOpenResult['kind'];
}

export type StatusClass = 'success' | 'redirect' | 'auth' | 'failure' | 'unrecognized';
