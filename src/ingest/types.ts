/**
 * Type definitions for reading line-oriented document streams
 */

import type { ObjectStore } from '../storage/object-store.js';

/** Compression types detected from a file suffix */
export type CompressionType = 'gzip' | 'bzip2' | 'none';

/** Options for {@link readLines} */
export interface ReadLinesOptions {
  /** Object store used for `s3://` sources */
  store?: ObjectStore | undefined;
  /** Compression of the source (default: detected from the suffix) */
  compression?: CompressionType | undefined;
}

/** One non-blank line of a source, with its 1-based position */
export interface SourceLine {
  text: string;
  lineNumber: number;
}

/**
 * One decoded input document.
 *
 * Only these fields are read; anything else in the line is ignored.
 */
export interface InputRecord {
  /** Opaque document identifier */
  id: unknown;
  /** Content-type tag */
  tp: string | null;
  /** Full text */
  ft: string;
  /** Language tag */
  lang: string | null;
}
