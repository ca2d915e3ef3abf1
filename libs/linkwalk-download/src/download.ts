import { once } from 'node:events';
import { createWriteStream, type WriteStream } from 'node:fs';
import { access, mkdir, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { finished, pipeline } from 'node:stream/promises';
import type { HttpEngine, Logger } from '@linkwalk/core';
import { httpCallStream, type HttpCallOptions, type PaginationSummary } from '@linkwalk/pagination';
import { localFileForUri } from './localFile';

export interface HttpDownloadOptions extends HttpCallOptions {
  /** Directory for a file name derived from the URI. Default: the working directory. */
  directory?: string;
  logger?: Logger;
}

export const TEMPORARY_EXTENSION = '.tmp';

function targetFile(uri: string, file: string | undefined, options: HttpDownloadOptions): string {
  return file ?? localFileForUri(uri, options.directory);
}

function callOptionsOf(options: HttpDownloadOptions): HttpCallOptions {
  const { directory: _directory, logger: _logger, ...callOptions } = options;
  return callOptions;
}

/**
 * The `<file>.tmp` a download is written to. The file is only created by
 * the first write; `discard` removes nothing it did not create.
 */
class TemporaryFile {
  private out?: WriteStream;

  constructor(readonly file: string) {}

  async write(body: Readable): Promise<void> {
    const out = await this.open();
    await pipeline(body, out, { end: false });
  }

  async commit(target: string): Promise<void> {
    const out = await this.open();
    out.end();
    await finished(out);
    await rename(this.file, target);
  }

  async discard(): Promise<void> {
    if (!this.out) return;
    this.out.destroy();
    this.out = undefined;
    await rm(this.file, { force: true });
  }

  private async open(): Promise<WriteStream> {
    if (this.out) return this.out;
    const out = createWriteStream(this.file);
    await once(out, 'open');
    this.out = out;
    return out;
  }
}

/**
 * Writes the bodies of `uri` and every page linked from it with
 * `rel="next"` to `file`, by way of `<file>.tmp`.
 *
 * Resolves with the written file, or with undefined when any page has a
 * negative outcome, in which case nothing is left on disk.
 */
export async function httpDownload(
  engine: HttpEngine,
  uri: string,
  file?: string,
  options: HttpDownloadOptions = {},
): Promise<string | undefined> {
  const target = targetFile(uri, file, options);
  await mkdir(path.dirname(target), { recursive: true });

  const temporary = new TemporaryFile(`${target}${TEMPORARY_EXTENSION}`);
  let summary: PaginationSummary;
  try {
    const pages = httpCallStream(engine, uri, (body: Readable) => temporary.write(body), callOptionsOf(options));
    let step = await pages.next();
    while (!step.done) {
      options.logger?.debug('http.download.page', { uri, file: target });
      step = await pages.next();
    }
    summary = step.value;
  } catch (error) {
    await temporary.discard();
    throw error;
  }

  if (summary.negative) {
    await temporary.discard();
    const meta = { uri, file: target, pages: summary.pageCount, status: summary.negative.status };
    if (summary.pageCount === 0) {
      options.logger?.info('http.download.negative', meta);
    } else {
      options.logger?.warn('http.download.incomplete', { ...meta, finalUri: summary.negative.finalUri });
    }
    return undefined;
  }

  try {
    await temporary.commit(target);
  } catch (error) {
    await temporary.discard();
    throw error;
  }
  options.logger?.info('http.download.complete', { uri, file: target, pages: summary.pageCount });
  return target;
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Like {@link httpDownload}, but leaves an existing `file` alone.
 */
export async function httpSync(
  engine: HttpEngine,
  uri: string,
  file?: string,
  options: HttpDownloadOptions = {},
): Promise<string | undefined> {
  const target = targetFile(uri, file, options);
  if (await exists(target)) {
    options.logger?.debug('http.sync.skip', { uri, file: target });
    return target;
  }
  return httpDownload(engine, uri, target, options);
}
