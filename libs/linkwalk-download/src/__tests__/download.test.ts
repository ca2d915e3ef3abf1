import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpEngine, HttpStatusError, createMemoryTransport, type Logger, type MemoryRoute } from '@linkwalk/core';
import { httpDownload, httpSync } from '../download';

const REPORT = 'https://example.test/data/report.csv';
const REPORT_2 = 'https://example.test/data/report.csv?page=2';

const csv = (body: string, next?: string): MemoryRoute => ({
  status: 200,
  headers: ['Content-Type: text/csv', ...(next ? [`Link: <${next}>; rel="next"`] : [])],
  body,
});

describe('httpDownload', () => {
  let directory: string;
  let logger: Logger;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'linkwalk-download-'));
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const setup = (routes: Record<string, MemoryRoute>) => {
    const transport = createMemoryTransport(routes);
    return { engine: new HttpEngine({ transport }), transport };
  };

  it('concatenates every page into the file named after the URI', async () => {
    const { engine } = setup({ [REPORT]: csv('a,b\n', REPORT_2), [REPORT_2]: csv('c,d\n') });

    const file = await httpDownload(engine, REPORT, undefined, { directory, logger });

    expect(file).toBe(path.join(directory, 'report.csv'));
    await expect(readFile(path.join(directory, 'report.csv'), 'utf8')).resolves.toBe('a,b\nc,d\n');
    await expect(readdir(directory)).resolves.toEqual(['report.csv']);
    expect(logger.info).toHaveBeenCalledWith('http.download.complete', {
      uri: REPORT,
      file: path.join(directory, 'report.csv'),
      pages: 2,
    });
  });

  it('writes to an explicit file, creating its directory', async () => {
    const { engine } = setup({ [REPORT]: csv('a,b\n') });
    const target = path.join(directory, 'nested', 'out.csv');

    await expect(httpDownload(engine, REPORT, target)).resolves.toBe(target);
    await expect(readFile(target, 'utf8')).resolves.toBe('a,b\n');
  });

  it('leaves nothing behind for a negative outcome', async () => {
    const { engine } = setup({ [REPORT]: { status: 404 } });

    await expect(httpDownload(engine, REPORT, undefined, { directory, failure: 404 })).resolves.toBeUndefined();
    await expect(readdir(directory)).resolves.toEqual([]);
  });

  it('removes the temporary file when a later page fails', async () => {
    const { engine } = setup({ [REPORT]: csv('a,b\n', REPORT_2), [REPORT_2]: { status: 500, body: 'boom' } });

    const error = await httpDownload(engine, REPORT, undefined, { directory }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    await expect(readdir(directory)).resolves.toEqual([]);
  });

  it('discards the pages already written when a later page is negative', async () => {
    const { engine } = setup({ [REPORT]: csv('a,b\n', REPORT_2), [REPORT_2]: { status: 400 } });

    await expect(httpDownload(engine, REPORT, undefined, { directory, logger })).resolves.toBeUndefined();
    await expect(readdir(directory)).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('http.download.incomplete', {
      uri: REPORT,
      file: path.join(directory, 'report.csv'),
      pages: 1,
      status: 400,
      finalUri: REPORT_2,
    });
  });

  it('rejects when the temporary file cannot be created and leaves what was there', async () => {
    const { engine } = setup({ [REPORT]: csv('a,b\n') });
    const target = path.join(directory, 'out.csv');
    await mkdir(`${target}.tmp`);

    const error = await httpDownload(engine, REPORT, target).catch((e: unknown) => e);

    expect(error).toMatchObject({ code: 'EISDIR' });
    await expect(readdir(directory)).resolves.toEqual(['out.csv.tmp']);
  });
});

describe('httpSync', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'linkwalk-sync-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('does not download a file that already exists', async () => {
    const transport = createMemoryTransport({ [REPORT]: csv('fresh\n') });
    const engine = new HttpEngine({ transport });
    const target = path.join(directory, 'report.csv');
    await writeFile(target, 'cached\n');

    await expect(httpSync(engine, REPORT, undefined, { directory })).resolves.toBe(target);
    await expect(readFile(target, 'utf8')).resolves.toBe('cached\n');
    expect(transport.requests).toHaveLength(0);
  });

  it('downloads a missing file', async () => {
    const transport = createMemoryTransport({ [REPORT]: csv('fresh\n') });
    const engine = new HttpEngine({ transport });

    await expect(httpSync(engine, REPORT, undefined, { directory })).resolves.toBe(path.join(directory, 'report.csv'));
    await expect(readFile(path.join(directory, 'report.csv'), 'utf8')).resolves.toBe('fresh\n');
  });
});
