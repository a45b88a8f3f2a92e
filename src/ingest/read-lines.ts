/**
 * Line reader for compressed JSONL sources
 *
 * Opens a local file or an `s3://` object, decompresses it according to
 * its suffix and yields text lines lazily, in source order. Nothing beyond
 * the current stream chunk is held in memory.
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { PassThrough, pipeline, type Readable } from 'node:stream';
import { SourceUnavailableError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { isS3Path, parseS3Path } from '../storage/s3-path.js';
import { isNotFoundError } from '../storage/object-store.js';
import { createDecompressor, detectCompressionFromExtension } from './decompress.js';
import type { CompressionType, ReadLinesOptions, SourceLine } from './types.js';

const getLog = () => createLogger('ingest:reader');

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Open the raw (still compressed) byte stream of a source.
 *
 * @throws {SourceUnavailableError} If the source does not exist or cannot
 *   be opened
 */
export async function openSource(
  source: string,
  options: Pick<ReadLinesOptions, 'store'> = {}
): Promise<Readable> {
  if (isS3Path(source)) {
    const { bucket, key } = parseS3Path(source);
    if (!options.store) {
      throw new SourceUnavailableError(`No object store configured to read ${source}`, source);
    }
    getLog().info('Reading from S3', { source });
    try {
      return await options.store.getObjectStream(bucket, key);
    } catch (error) {
      const message = isNotFoundError(error)
        ? `Object not found: ${source}`
        : `Cannot read ${source}: ${reasonOf(error)}`;
      throw new SourceUnavailableError(message, source, { cause: error });
    }
  }

  try {
    const info = await stat(source);
    if (!info.isFile()) {
      throw new Error('not a regular file');
    }
  } catch (error) {
    throw new SourceUnavailableError(`Cannot read ${source}: ${reasonOf(error)}`, source, {
      cause: error,
    });
  }
  return createReadStream(source);
}

/**
 * Read a source line by line.
 *
 * Line endings (`\n` or `\r\n`) are removed and blank lines are skipped.
 * The source is opened eagerly on the first `next()` call, so a missing
 * source fails before any line is produced.
 *
 * @example
 * ```typescript
 * for await (const { text, lineNumber } of readLines('s3://bucket/docs.jsonl.bz2', { store })) {
 *   const record = parseRecordLine(text, lineNumber);
 * }
 * ```
 */
export async function* readLines(
  source: string,
  options: ReadLinesOptions = {}
): AsyncGenerator<SourceLine, void, unknown> {
  const input = await openSource(source, options);
  yield* readOpenedLines(input, source, options.compression);
}

/**
 * Split an already opened source into lines. `input` is destroyed when
 * iteration ends, including early exits.
 *
 * @param source - Locator of `input`, for suffix detection and logging
 */
export async function* readOpenedLines(
  input: Readable,
  source: string,
  compression: CompressionType = detectCompressionFromExtension(source)
): AsyncGenerator<SourceLine, void, unknown> {
  const decoded = new PassThrough();
  decoded.setEncoding('utf8');

  // pipeline destroys every stage with the first error, which makes the
  // iteration below reject with it
  pipeline(input, createDecompressor(compression), decoded, (error) => {
    if (error) {
      getLog().debug('Source stream closed with error', { source, error: error.message });
    }
  });

  let lineNumber = 0;
  let count = 0;
  let pending = '';

  try {
    for await (const chunk of decoded) {
      pending += typeof chunk === 'string' ? chunk : String(chunk);
      let start = 0;
      let newline = pending.indexOf('\n', start);
      while (newline !== -1) {
        lineNumber++;
        const text = stripCarriageReturn(pending.slice(start, newline));
        start = newline + 1;
        if (text.trim() !== '') {
          count++;
          yield { text, lineNumber };
        }
        newline = pending.indexOf('\n', start);
      }
      pending = pending.slice(start);
    }

    if (pending.trim() !== '') {
      lineNumber++;
      count++;
      yield { text: stripCarriageReturn(pending), lineNumber };
    }
  } finally {
    input.destroy();
  }

  getLog().info('Finished reading lines', { source, lines: count });
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
