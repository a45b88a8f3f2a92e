/**
 * JSONL writer for embedding results
 *
 * Writes one compact JSON object per line. The file is truncated when the
 * writer opens it and is gzip-compressed when its name ends in `.gz`.
 */

import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createLogger, type Logger } from '../lib/logger.js';
import { createCompressor } from '../ingest/decompress.js';
import { RunStatistics, STAT_KEYS } from './stats.js';
import type { ResultRecord } from './types.js';

const getLog = () => createLogger('embeddings:writer');

/** Options for {@link writeJsonLines} */
export interface WriteJsonLinesOptions {
  /** Statistics that receive the `records_written` counter */
  stats?: RunStatistics | undefined;
  logger?: Logger | undefined;
}

/** Serialize one record as a JSONL line, keeping non-ASCII characters as is */
export function serializeRecord(record: ResultRecord): string {
  return `${JSON.stringify(record)}\n`;
}

/**
 * Drain `records` into `path`. `null` entries (skipped input records) are
 * consumed without writing anything.
 *
 * @returns Number of records written
 */
export async function writeJsonLines(
  path: string,
  records: AsyncIterable<ResultRecord | null>,
  options: WriteJsonLinesOptions = {}
): Promise<number> {
  const log = options.logger ?? getLog();
  const compression = path.toLowerCase().endsWith('.gz') ? 'gzip' : 'none';
  let written = 0;

  async function* lines(): AsyncGenerator<string, void, unknown> {
    for await (const record of records) {
      if (record === null) {
        continue;
      }
      log.debug('Writing embedding', { id: record.id });
      written++;
      options.stats?.increment(STAT_KEYS.recordsWritten);
      yield serializeRecord(record);
    }
  }

  await mkdir(dirname(path), { recursive: true });
  log.info('Writing output', { path, compression });

  await pipeline(
    Readable.from(lines(), { objectMode: false }),
    createCompressor(compression),
    createWriteStream(path, { flags: 'w', encoding: 'utf8' })
  );

  log.info('Finished writing output', { path, records: written });
  return written;
}
