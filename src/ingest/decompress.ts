/**
 * Streaming decompression for gzip and bzip2 formats
 */

import { PassThrough, type Duplex } from 'node:stream';
import { createGunzip, createGzip } from 'node:zlib';
import unbzip2 from 'unbzip2-stream';
import type { CompressionType } from './types.js';

/**
 * Create a decompression stream.
 *
 * `none` returns a pass-through so callers can always pipe through the
 * result.
 *
 * @example
 * ```typescript
 * const decompressor = createDecompressor(detectCompressionFromExtension(path));
 * pipeline(createReadStream(path), decompressor, sink, done);
 * ```
 */
export function createDecompressor(type: CompressionType): NodeJS.ReadWriteStream {
  switch (type) {
    case 'gzip':
      return createGunzip();
    case 'bzip2':
      return unbzip2();
    case 'none':
      return new PassThrough();
  }
}

/**
 * Create a compression stream for written output.
 *
 * Only gzip can be produced; bzip2 output is not supported.
 */
export function createCompressor(type: Exclude<CompressionType, 'bzip2'>): Duplex {
  return type === 'gzip' ? createGzip() : new PassThrough();
}

/**
 * Detect compression type from file extension
 */
export function detectCompressionFromExtension(filename: string): CompressionType {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.gz') || lower.endsWith('.gzip')) {
    return 'gzip';
  }
  if (lower.endsWith('.bz2') || lower.endsWith('.bzip2')) {
    return 'bzip2';
  }
  return 'none';
}
