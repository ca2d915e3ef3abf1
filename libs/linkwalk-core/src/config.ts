import { z } from 'zod';
import { InvalidOptionsError } from './errors';
import type { EngineDefaults, HttpOpenOptions } from './types';

export const DEFAULT_NUMBER_OF_HOPS = 5;
export const DEFAULT_NUMBER_OF_RETRIES = 1;
export const DEFAULT_TIMEOUT_MS = 60_000;

const methodSchema = z.enum(['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'PATCH', 'DELETE']);

export const engineDefaultsSchema = z
  .object({
    numberOfHops: z.number().int().nonnegative().default(DEFAULT_NUMBER_OF_HOPS),
    numberOfRetries: z.number().int().nonnegative().default(DEFAULT_NUMBER_OF_RETRIES),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  })
  .strict();

export type ResolvedEngineDefaults = z.infer<typeof engineDefaultsSchema>;

export const traceConfigSchema = z
  .object({
    sendRequest: z.boolean().default(false),
    receiveReply: z.boolean().default(false),
  })
  .strict();

export type ResolvedTraceConfig = z.infer<typeof traceConfigSchema>;

/**
 * Scalar request options. `headers`, `body` and `accept` are checked by
 * their own consumers.
 */
export const openOptionsSchema = z.object({
  method: methodSchema.default('GET'),
  numberOfHops: z.number().int().nonnegative().optional(),
  numberOfRetries: z.number().int().nonnegative().optional(),
  success: z.number().int().min(200).max(299).optional(),
  failure: z.number().int().min(400).max(599).optional(),
  statusPassthrough: z.boolean().default(false),
  timeoutMs: z.number().int().positive().optional(),
});

export type ParsedOpenOptions = z.infer<typeof openOptionsSchema>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
}

export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidOptionsError(issuesOf(result.error));
  }
  return result.data;
}

export function resolveEngineDefaults(defaults: EngineDefaults = {}): ResolvedEngineDefaults {
  return parseWith(engineDefaultsSchema, defaults);
}

export function parseOpenOptions(options: HttpOpenOptions): ParsedOpenOptions {
  return parseWith(openOptionsSchema, {
    method: options.method,
    numberOfHops: options.numberOfHops,
    numberOfRetries: options.numberOfRetries,
    success: options.success,
    failure: options.failure,
    statusPassthrough: options.statusPassthrough,
    timeoutMs: options.timeoutMs,
  });
}
