export type HttpEngineErrorCode =
  | 'redirect_loop'
  | 'max_redirect'
  | 'missing_location'
  | 'cyclic_link_header'
  | 'unrecognized_status'
  | 'status'
  | 'unknown_extension'
  | 'invalid_options'
  | 'timeout'
  | 'internal';

export class HttpEngineError extends Error {
  readonly code: HttpEngineErrorCode;

  constructor(code: HttpEngineErrorCode, message: string) {
    super(message);
    this.name = 'HttpEngineError';
    this.code = code;
  }
}

/**
 * A redirect target that was already visited, once the hop cap is reached.
 * `chain` lists every URI of the logical request, oldest first.
 */
export class RedirectLoopError extends HttpEngineError {
  readonly chain: string[];

  constructor(chain: string[]) {
    super('redirect_loop', `Redirect loop: ${chain.join(' -> ')}`);
    this.name = 'RedirectLoopError';
    this.chain = chain;
  }
}

export class MaxRedirectError extends HttpEngineError {
  readonly hops: number;
  readonly chain: string[];

  constructor(hops: number, chain: string[]) {
    super('max_redirect', `Maximum number of redirects (${hops}) exceeded: ${chain.join(' -> ')}`);
    this.name = 'MaxRedirectError';
    this.hops = hops;
    this.chain = chain;
  }
}

export class RedirectLocationError extends HttpEngineError {
  readonly uri: string;
  readonly status: number;

  constructor(uri: string, status: number) {
    super('missing_location', `HTTP ${status} from ${uri} has no Location header`);
    this.name = 'RedirectLocationError';
    this.uri = uri;
    this.status = status;
  }
}

export class CyclicLinkHeaderError extends HttpEngineError {
  readonly uri: string;

  constructor(uri: string) {
    super('cyclic_link_header', `Link header of ${uri} points back at itself`);
    this.name = 'CyclicLinkHeaderError';
    this.uri = uri;
  }
}

export class UnrecognizedStatusError extends HttpEngineError {
  readonly status: number;
  readonly uri: string;

  constructor(status: number, uri: string) {
    super('unrecognized_status', `Unrecognized HTTP status ${status} from ${uri}`);
    this.name = 'UnrecognizedStatusError';
    this.status = status;
    this.uri = uri;
  }
}

/**
 * A failure status other than the caller's designated `failure` code.
 * `body` holds at most the first 1000 characters of the response.
 */
export class HttpStatusError extends HttpEngineError {
  readonly status: number;
  readonly body: string;
  readonly finalUri: string;

  constructor(status: number, body: string, finalUri: string) {
    super('status', `HTTP ${status} from ${finalUri}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.body = body;
    this.finalUri = finalUri;
  }
}

export class UnknownExtensionError extends HttpEngineError {
  readonly extension: string;

  constructor(extension: string) {
    super('unknown_extension', `No media type registered for extension "${extension}"`);
    this.name = 'UnknownExtensionError';
    this.extension = extension;
  }
}

export class InvalidOptionsError extends HttpEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('invalid_options', `Invalid options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}

export class TransportTimeoutError extends HttpEngineError {
  readonly uri: string;
  readonly timeoutMs: number;

  constructor(uri: string, timeoutMs: number) {
    super('timeout', `Request to ${uri} timed out after ${timeoutMs}ms`);
    this.name = 'TransportTimeoutError';
    this.uri = uri;
    this.timeoutMs = timeoutMs;
  }
}
