/**
 * Glossary of the messages and statistics an embedding run logs
 */

import { LOG_LEVELS, type LogLevel } from '../lib/logger.js';

const MESSAGES: Record<LogLevel, readonly string[]> = {
  debug: [
    'Computing embedding: an embedding is about to be computed for the record id.',
    'Computed embedding: the embedding for the record id is done.',
    'Writing embedding: a result record is written to the output file.',
  ],
  info: [
    'Arguments: the merged options of the run.',
    'Starting embedding run: processing of the input path begins.',
    'Reading from S3: the input is streamed from a bucket.',
    'Loading embedding model / Model loaded: the embedding backend is built on the first text that needs it.',
    'Processed N valid texts.: logged after every 100 valid texts.',
    'Finished reading lines: the input is exhausted; gives the number of lines read.',
    'Uploading FILE to s3://BUCKET/KEY: an upload is about to start.',
    'Successfully uploaded FILE to s3://BUCKET/KEY: the upload finished.',
    'Statistics: KEY: VALUE: one line per counter at the end of the run.',
  ],
  warn: [
    'The file s3://BUCKET/KEY already exists. Silently quitting: the remote output exists and --quit-if-s3-output-exists is set.',
    'The file s3://BUCKET/KEY already exists. Skipping upload.: an earlier run uploaded the output.',
    'Output path FILE exists and --no-overwrite is set.: nothing is processed.',
    'Embedding server hosts a different model: the server does not serve --model-name.',
  ],
  error: [
    'The file FILE was not found: the file to upload is missing locally.',
    'Credentials not available: no storage credentials are configured.',
    'Incomplete credentials provided: only one of SE_ACCESS_KEY and SE_SECRET_KEY is set.',
    'Failed to truncate FILE: the local output could not be replaced by a timestamp marker.',
  ],
};

const STATISTICS: readonly string[] = [
  'valid_texts: texts that passed the content-type and length filters and were embedded.',
  'short_texts: texts of the allowed content types that were empty or too short.',
  'total_time: seconds spent computing embeddings.',
  'records_written: lines written to the output file.',
  'lines_read: non-blank input lines.',
  'char_count_bucket_5k_N: valid texts whose length falls in the 5000-character bucket ending at N.',
  'valid_texts_lg_LANG: valid texts of language LANG.',
  'skipped_type_TYPE: records skipped because content type TYPE is not allowed, e.g. skipped_type_ad.',
  'Average time per valid text: total_time divided by valid_texts.',
];

/**
 * Lines describing every message at `level` or above, then the statistics
 */
export function formatLogHelp(level: LogLevel): string[] {
  const lines = [`Log message help for level ${level.toUpperCase()}:`];
  for (const current of LOG_LEVELS.slice(LOG_LEVELS.indexOf(level))) {
    lines.push(`Log level: ${current.toUpperCase()}`);
    for (const message of MESSAGES[current]) {
      lines.push(` - ${message}`);
    }
  }
  lines.push('Statistics:');
  for (const entry of STATISTICS) {
    lines.push(` - ${entry}`);
  }
  return lines;
}
