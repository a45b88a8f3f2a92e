/**
 * Line-oriented document ingestion
 *
 * Streaming components to open, decompress and decode JSONL sources from
 * local disk or S3.
 *
 * @example
 * ```typescript
 * import { readLines, parseRecordLine } from 'textembed';
 *
 * for await (const { text, lineNumber } of readLines('docs.jsonl.bz2')) {
 *   const record = parseRecordLine(text, lineNumber);
 *   console.log(record.id, record.tp);
 * }
 * ```
 */

// Type exports
export type { CompressionType, InputRecord, ReadLinesOptions, SourceLine } from './types.js';

// Decompression
export {
  createDecompressor,
  createCompressor,
  detectCompressionFromExtension,
} from './decompress.js';

// Reading and decoding
export { openSource, readLines, readOpenedLines } from './read-lines.js';
export { parseRecordLine } from './parse-record.js';
