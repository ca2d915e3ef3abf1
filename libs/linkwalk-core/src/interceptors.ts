import type { BeforeSendContext, HttpAttemptInterceptor } from './types';

export interface AuthInterceptorOptions {
  getToken: () => Promise<string | null> | string | null;
  headerName?: string; // default: "Authorization"
  formatToken?: (token: string) => string; // default: (t) => `Bearer ${t}`
}

/**
 * Adds an authorization header to every attempt, redirects and retries
 * included. No header is sent while `getToken` yields nothing.
 *
 * @example
 * ```typescript
 * const engine = new HttpEngine({
 *   interceptors: [createAuthInterceptor({ getToken: () => process.env.API_TOKEN ?? null })],
 * });
 * ```
 */
export function createAuthInterceptor(opts: AuthInterceptorOptions): HttpAttemptInterceptor {
  const headerName = opts.headerName ?? 'Authorization';
  const formatToken = opts.formatToken ?? ((t: string) => `Bearer ${t}`);

  return {
    beforeSend: async (ctx: BeforeSendContext) => {
      const token = await opts.getToken();
      if (token) {
        ctx.request.headers[headerName] = formatToken(token);
      }
    },
  };
}

/**
 * Sets a fixed header on every attempt unless the request already carries
 * it (case-insensitive).
 */
export function createDefaultHeaderInterceptor(name: string, value: string): HttpAttemptInterceptor {
  return {
    beforeSend: (ctx: BeforeSendContext) => {
      const present = Object.keys(ctx.request.headers).some((key) => key.toLowerCase() === name.toLowerCase());
      if (!present) {
        ctx.request.headers[name] = value;
      }
    },
  };
}
