import type { Readable } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import {
  CyclicLinkHeaderError,
  HttpEngine,
  InvalidOptionsError,
  createMemoryTransport,
  type MemoryRoute,
} from '@linkwalk/core';
import { httpCall, httpCallStream, type PageContext } from '../index';

const A = 'https://example.test/items';
const B = 'https://example.test/items?page=2';
const C = 'https://example.test/items?page=3';

const readText = async (body: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
};

const page = (body: string, next?: string): MemoryRoute => ({
  status: 200,
  headers: ['Content-Type: text/plain', ...(next ? [`Link: <${next}>; rel="next"`] : [])],
  body,
});

const setup = (routes: Record<string, MemoryRoute>) => {
  const transport = createMemoryTransport(routes);
  const engine = new HttpEngine({ transport });
  return { engine, transport };
};

describe('httpCall', () => {
  it('follows next links and returns every consumer result in order', async () => {
    const { engine, transport } = setup({ [A]: page('one', '/items?page=2'), [B]: page('two', C), [C]: page('three') });

    const results = await httpCall(engine, A, readText);

    expect(results).toEqual(['one', 'two', 'three']);
    expect(transport.requests.map((request) => request.url)).toEqual([A, B, C]);
  });

  it('closes each page before requesting the next one', async () => {
    const { engine, transport } = setup({ [A]: page('one', B), [B]: page('two') });
    const previousClosed: boolean[] = [];

    await httpCall(engine, A, async (body, { index }) => {
      if (index > 0) previousClosed.push(transport.bodies[index - 1].destroyed);
      return readText(body);
    });

    expect(previousClosed).toEqual([true]);
    expect(transport.bodies[1].destroyed).toBe(true);
  });

  it('passes the page context to the consumer', async () => {
    const { engine } = setup({ [A]: page('one', B), [B]: page('two') });
    const contexts: Array<Pick<PageContext, 'index' | 'uri'> & { next?: string }> = [];

    await httpCall(engine, A, (body, context) => {
      contexts.push({ index: context.index, uri: context.uri, next: context.result.next });
      body.destroy();
    });

    expect(contexts).toEqual([
      { index: 0, uri: A, next: B },
      { index: 1, uri: B, next: undefined },
    ]);
  });

  it('raises CyclicLinkHeaderError before consuming a page that links to itself', async () => {
    const { engine, transport } = setup({ [A]: page('one', A) });
    const consumer = vi.fn(readText);

    const error = await httpCall(engine, A, consumer).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CyclicLinkHeaderError);
    expect(error).toMatchObject({ code: 'cyclic_link_header', uri: A });
    expect(consumer).not.toHaveBeenCalled();
    expect(transport.bodies[0].destroyed).toBe(true);
  });

  it('ends the sequence at a negative outcome', async () => {
    const { engine } = setup({ [A]: page('one', B), [B]: { status: 400, body: 'no more' } });

    await expect(httpCall(engine, A, readText)).resolves.toEqual(['one']);
  });

  it('yields nothing when the first page is negative', async () => {
    const { engine } = setup({ [A]: { status: 404 } });

    await expect(httpCall(engine, A, readText, { failure: 404 })).resolves.toEqual([]);
  });

  it('stops after maxPages pages', async () => {
    const { engine, transport } = setup({ [A]: page('one', B), [B]: page('two', C), [C]: page('three') });

    const results = await httpCall(engine, A, readText, { maxPages: 2 });

    expect(results).toEqual(['one', 'two']);
    expect(transport.requests).toHaveLength(2);
  });

  it('hands the open options to every page request', async () => {
    const { engine, transport } = setup({ [A]: page('one', B), [B]: page('two') });

    await httpCall(engine, A, readText, { accept: 'json', headers: { 'X-Test': 'yes' } });

    expect(transport.requests.map((request) => request.headers)).toEqual([
      { 'X-Test': 'yes', Accept: 'application/json;q=1.000' },
      { 'X-Test': 'yes', Accept: 'application/json;q=1.000' },
    ]);
  });

  it('rejects a non-positive maxPages', async () => {
    const { engine } = setup({ [A]: page('one') });

    const error = await httpCall(engine, A, readText, { maxPages: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidOptionsError);
    expect(error).toMatchObject({ issues: ['maxPages: Number must be greater than 0'] });
  });
});

describe('httpCallStream', () => {
  const drain = async <T, R>(pages: AsyncGenerator<T, R, void>): Promise<R> => {
    let step = await pages.next();
    while (!step.done) step = await pages.next();
    return step.value;
  };

  it('returns the page count of a complete sequence', async () => {
    const { engine } = setup({ [A]: page('one', B), [B]: page('two') });

    await expect(drain(httpCallStream(engine, A, readText))).resolves.toEqual({ pageCount: 2, truncated: false });
  });

  it('returns the negative outcome that ended the sequence', async () => {
    const { engine } = setup({ [A]: page('one', B), [B]: { status: 400 } });

    const summary = await drain(httpCallStream(engine, A, readText));

    expect(summary).toMatchObject({ pageCount: 1, truncated: false, negative: { kind: 'negative', status: 400, finalUri: B } });
  });

  it('marks a sequence cut short by maxPages', async () => {
    const { engine } = setup({ [A]: page('one', B), [B]: page('two') });

    await expect(drain(httpCallStream(engine, A, readText, { maxPages: 1 }))).resolves.toEqual({
      pageCount: 1,
      truncated: true,
    });
  });

  it('leaves nothing open when iteration stops early', async () => {
    const { engine, transport } = setup({ [A]: page('one', B), [B]: page('two') });
    const seen: string[] = [];

    for await (const text of httpCallStream(engine, A, readText)) {
      seen.push(text);
      break;
    }

    expect(seen).toEqual(['one']);
    expect(transport.requests).toHaveLength(1);
    expect(transport.bodies[0].destroyed).toBe(true);
  });
});
