import { Readable } from 'node:stream';
import { parseOpenOptions, resolveEngineDefaults, parseWith, traceConfigSchema } from './config';
import type { ParsedOpenOptions, ResolvedEngineDefaults, ResolvedTraceConfig } from './config';
import {
  MaxRedirectError,
  RedirectLocationError,
  RedirectLoopError,
  UnrecognizedStatusError,
} from './errors';
import { getHeaderValue, hasHeader, parseHeaderLines } from './headers';
import { resolveAccept } from './mediaType';
import { metadataContentType, metadataLastModified, metadataLink } from './metadata';
import { applyStatusPolicy, classifyStatus } from './status';
import { traceReply, traceRequest } from './trace';
import { nodeTransport } from './transport/nodeTransport';
import type {
  HttpAttemptInterceptor,
  HttpEngineConfig,
  HttpHeadResult,
  HttpHeaders,
  HttpMetadata,
  HttpOpenOptions,
  HttpOpenResult,
  HttpTransport,
  Logger,
  TransportRequest,
  TransportResponse,
} from './types';

interface RequestState {
  /** Oldest first; the last entry is the URI of the current attempt. */
  visited: string[];
  maxHops: number;
  maxRetries: number;
  retries: number;
  attempt: number;
  metadata: HttpMetadata[];
}

interface FinalAttempt {
  uri: string;
  response: TransportResponse;
}

const resolveUri = (reference: string, base: string): string | undefined =>
  URL.canParse(reference, base) ? new URL(reference, base).href : undefined;

/**
 * Reads the first chunk of a body to find out whether it is empty. A
 * non-empty body is handed back as a fresh stream that replays that chunk.
 */
async function peekBody(body: Readable): Promise<{ empty: boolean; body: Readable }> {
  const iterator = body[Symbol.asyncIterator]();
  const first = await iterator.next();
  if (first.done) {
    return { empty: true, body: Readable.from([]) };
  }
  async function* replay() {
    try {
      yield first.value;
      for (;;) {
        const next = await iterator.next();
        if (next.done) return;
        yield next.value;
      }
    } finally {
      await iterator.return?.();
    }
  }
  return { empty: false, body: Readable.from(replay()) };
}

export class HttpEngine {
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly trace: ResolvedTraceConfig;
  private readonly defaults: ResolvedEngineDefaults;
  private readonly defaultHeaders: HttpHeaders;
  private readonly interceptors: HttpAttemptInterceptor[];

  constructor(config: HttpEngineConfig = {}) {
    this.transport = config.transport ?? nodeTransport;
    this.logger = config.logger;
    this.trace = parseWith(traceConfigSchema, config.trace ?? {});
    this.defaults = resolveEngineDefaults(config.defaults);
    this.defaultHeaders = { ...config.defaultHeaders };
    this.interceptors = [...(config.interceptors ?? [])];
  }

  /**
   * Opens `uri`, following redirects and retrying failure statuses, and
   * maps the final status onto a stream, a negative outcome or an error.
   *
   * A `stream` result hands its body to the caller, who must consume or
   * destroy it.
   */
  async open(uri: string, options: HttpOpenOptions = {}): Promise<HttpOpenResult> {
    const parsed = parseOpenOptions(options);
    const headers = this.buildHeaders(options);
    const state: RequestState = {
      visited: [uri],
      maxHops: parsed.numberOfHops ?? this.defaults.numberOfHops,
      maxRetries: parsed.numberOfRetries ?? this.defaults.numberOfRetries,
      retries: 1,
      attempt: 0,
      metadata: [],
    };

    const final = await this.run(state, parsed, headers, options);
    const { uri: finalUri, response } = final;
    const next = this.nextLink(state.metadata, finalUri);
    const base = { status: response.status, finalUri, metadata: state.metadata, ...(next ? { next } : {}) };

    if (parsed.statusPassthrough) {
      return { kind: 'stream', body: response.body, ...base };
    }

    const decision = await applyStatusPolicy(response.status, response.body, finalUri, { failure: parsed.failure });
    if (decision === 'negative') {
      this.logger?.info('http.response.negative', { uri: finalUri, status: response.status });
      return { kind: 'negative', ...base };
    }
    return { kind: 'stream', body: response.body, ...base };
  }

  /**
   * Sends a HEAD request. The body, if any, is closed before returning.
   */
  async head(uri: string, options: Omit<HttpOpenOptions, 'method' | 'body'> = {}): Promise<HttpHeadResult> {
    const result = await this.open(uri, { ...options, method: 'HEAD' });
    if (result.kind === 'stream') {
      result.body.destroy();
    }
    const { kind, status, finalUri, metadata, next } = result;
    return { kind, status, finalUri, metadata, ...(next ? { next } : {}) };
  }

  /**
   * Last modification time reported by a HEAD request, when the final
   * status is 200 and the header parses.
   */
  async lastModified(uri: string, options: Omit<HttpOpenOptions, 'method' | 'body'> = {}): Promise<Date | undefined> {
    const result = await this.head(uri, { ...options, statusPassthrough: true });
    return result.status === 200 ? metadataLastModified(result.metadata) : undefined;
  }

  private buildHeaders(options: HttpOpenOptions): HttpHeaders {
    const headers: HttpHeaders = { ...this.defaultHeaders, ...options.headers };
    if (options.accept !== undefined) {
      for (const name of Object.keys(headers)) {
        if (name.toLowerCase() === 'accept') delete headers[name];
      }
      headers.Accept = resolveAccept(options.accept);
    } else if (!hasHeader(headers, 'accept')) {
      headers.Accept = resolveAccept();
    }
    return headers;
  }

  private async run(
    state: RequestState,
    parsed: ParsedOpenOptions,
    headers: HttpHeaders,
    options: HttpOpenOptions,
  ): Promise<FinalAttempt> {
    for (;;) {
      const uri = state.visited[state.visited.length - 1];
      const response = await this.attempt(state, {
        method: parsed.method,
        url: uri,
        headers: { ...headers },
        ...(options.body !== undefined ? { body: options.body } : {}),
        timeoutMs: parsed.timeoutMs ?? this.defaults.timeoutMs,
      });

      switch (classifyStatus(response.status)) {
        case 'success': {
          if (parsed.method === 'HEAD' || metadataContentType(state.metadata)) {
            return { uri, response };
          }
          const peeked = await peekBody(response.body);
          if (!peeked.empty) {
            this.logger?.warn('http.response.no_content_type', { uri, status: response.status });
          }
          return { uri, response: { ...response, body: peeked.body } };
        }

        case 'redirect': {
          response.body.destroy();
          this.followRedirect(state, uri, response);
          break;
        }

        case 'auth':
          return { uri, response };

        case 'failure': {
          state.retries += 1;
          if (state.retries >= state.maxRetries) {
            return { uri, response };
          }
          response.body.destroy();
          this.logger?.info('http.request.retry', {
            uri,
            status: response.status,
            retries: state.retries,
            maxRetries: state.maxRetries,
          });
          break;
        }

        case 'unrecognized':
          response.body.destroy();
          throw new UnrecognizedStatusError(response.status, uri);
      }
    }
  }

  private followRedirect(state: RequestState, uri: string, response: TransportResponse): void {
    const metadata = state.metadata[state.metadata.length - 1];
    const location = getHeaderValue(metadata.headers, 'location');
    const target = location === undefined ? undefined : resolveUri(location, uri);
    if (target === undefined) {
      throw new RedirectLocationError(uri, response.status);
    }

    const seen = state.visited.includes(target);
    state.visited.push(target);
    const hops = state.visited.length - 1;
    if (state.visited.length > state.maxHops) {
      const chain = [...state.visited];
      throw seen ? new RedirectLoopError(chain) : new MaxRedirectError(state.maxHops, chain);
    }

    this.logger?.debug('http.request.redirect', { from: uri, to: target, status: response.status, hops });
  }

  private async attempt(state: RequestState, request: TransportRequest): Promise<TransportResponse> {
    state.attempt += 1;
    const attempt = state.attempt;

    for (const interceptor of this.interceptors) {
      await interceptor.beforeSend?.({ request, attempt });
    }
    traceRequest(this.logger, this.trace, request);

    const start = new Date();
    let response: TransportResponse;
    try {
      response = await this.transport(request);
    } catch (error) {
      this.logger?.warn('http.request.error', {
        method: request.method,
        uri: request.url,
        attempt,
        error: error instanceof Error ? error.message : error,
      });
      throw error;
    }
    const end = new Date();

    const metadata: HttpMetadata = {
      uri: request.url,
      status: response.status,
      headers: parseHeaderLines(response.headerLines),
      timestamp: { start, end },
      version: response.version,
    };
    state.metadata.push(metadata);
    traceReply(this.logger, this.trace, metadata);

    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.afterResponse) continue;
      try {
        await interceptor.afterResponse({ request, attempt, metadata });
      } catch (error) {
        this.logger?.warn('http.interceptor.after_response.error', {
          uri: request.url,
          attempt,
          error: error instanceof Error ? error.message : error,
        });
      }
    }

    this.logger?.debug('http.request.attempt', {
      method: request.method,
      uri: request.url,
      status: response.status,
      attempt,
      durationMs: end.getTime() - start.getTime(),
    });
    return response;
  }

  private nextLink(metadata: HttpMetadata[], finalUri: string): string | undefined {
    const link = metadataLink(metadata, 'next');
    return link === undefined ? undefined : resolveUri(link, finalUri);
  }
}
