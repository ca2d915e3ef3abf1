import type { Readable } from 'node:stream';
import { z } from 'zod';
import {
  CyclicLinkHeaderError,
  parseWith,
  type HttpEngine,
  type HttpNegativeResult,
  type HttpOpenOptions,
  type HttpStreamResult,
} from '@linkwalk/core';

export interface PageContext {
  /** Zero-based position of the page in the sequence. */
  index: number;
  /** URI requested for this page. */
  uri: string;
  /** The open result; `result.body` is the stream also passed as the first argument. */
  result: HttpStreamResult;
}

export type PageConsumer<T> = (body: Readable, page: PageContext) => Promise<T> | T;

export interface PaginationLimits {
  maxPages?: number;
}

export interface HttpCallOptions extends HttpOpenOptions, PaginationLimits {}

const limitsSchema = z.object({
  maxPages: z.number().int().positive().optional(),
});

/**
 * How a page sequence ended: `negative` holds the outcome that stopped it,
 * `truncated` is set when `maxPages` cut it short.
 */
export interface PaginationSummary {
  pageCount: number;
  truncated: boolean;
  negative?: HttpNegativeResult;
}

function parseLimits(options: HttpCallOptions): PaginationLimits {
  return parseWith(limitsSchema, { maxPages: options.maxPages });
}

function openOptionsOf(options: HttpCallOptions): HttpOpenOptions {
  const { maxPages: _maxPages, ...openOptions } = options;
  return openOptions;
}

/**
 * Opens `uri` and every page it links to with `rel="next"`, runs `consumer`
 * on each page body and yields its result.
 *
 * Each page is a separate logical request. A page body is closed before the
 * next page is requested, and when iteration stops early. A negative outcome
 * ends the sequence; a `next` link pointing back at the page that carries it
 * raises {@link CyclicLinkHeaderError} before the consumer runs. The
 * generator returns a {@link PaginationSummary}.
 */
export async function* httpCallStream<T>(
  engine: HttpEngine,
  uri: string,
  consumer: PageConsumer<T>,
  options: HttpCallOptions = {},
): AsyncGenerator<T, PaginationSummary, void> {
  const { maxPages } = parseLimits(options);
  const openOptions = openOptionsOf(options);
  let current: string | undefined = uri;
  let index = 0;

  while (current !== undefined) {
    if (maxPages !== undefined && index >= maxPages) {
      return { pageCount: index, truncated: true };
    }

    const result = await engine.open(current, openOptions);
    if (result.kind === 'negative') {
      return { pageCount: index, truncated: false, negative: result };
    }

    const { body, next } = result;
    try {
      if (next !== undefined && (next === current || next === result.finalUri)) {
        throw new CyclicLinkHeaderError(current);
      }
      yield await consumer(body, { index, uri: current, result });
    } finally {
      body.destroy();
    }

    current = next;
    index += 1;
  }
  return { pageCount: index, truncated: false };
}

/**
 * Drains {@link httpCallStream} and returns the consumer results of every
 * page in order.
 */
export async function httpCall<T>(
  engine: HttpEngine,
  uri: string,
  consumer: PageConsumer<T>,
  options: HttpCallOptions = {},
): Promise<T[]> {
  const results: T[] = [];
  for await (const value of httpCallStream(engine, uri, consumer, options)) {
    results.push(value);
  }
  return results;
}
