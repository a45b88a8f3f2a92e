/**
 * Type definitions for the embedding pipeline
 */

import type { UploadError } from '../lib/errors.js';

/**
 * One line of the output artifact.
 *
 * Property order is the order written to disk.
 */
export interface ResultRecord {
  /** Identifier copied from the input record */
  id: unknown;
  /** Completion time of the embedding, `YYYY-MM-DDTHH:MM:SSZ` */
  ts: string;
  /** `<model-name>@<revision>` */
  embedder: string;
  /** Character count of the source text */
  len: number;
  /** Source text, only when requested */
  text?: string;
  /** Vector with every coordinate rounded to 5 decimals */
  embedding: number[];
}

/** Outcome of an upload attempt */
export type UploadResult =
  | { status: 'uploaded'; bucket: string; key: string }
  | { status: 'skipped'; bucket: string; key: string }
  | { status: 'failed'; error: UploadError };
