/**
 * Embedding job
 *
 * One run of the pipeline:
 *
 *   INIT -> (early exit if the output already exists and that was asked
 *   for) -> STREAMING (read, filter, embed, write in one pass) ->
 *   UPLOAD (optional) -> TRUNCATE (optional) -> DONE
 *
 * Nothing is resumable: a failed run starts over from the first line.
 */

import { existsSync } from 'node:fs';
import { ConfigurationError } from '../lib/errors.js';
import type { EmbedOptions } from '../lib/config-schema.js';
import { createLogger, generateRunId, withRunContext, type Logger } from '../lib/logger.js';
import { parseRecordLine } from '../ingest/parse-record.js';
import { openSource, readOpenedLines } from '../ingest/read-lines.js';
import { isS3Path, parseS3Path, formatS3Path } from '../storage/s3-path.js';
import type { ObjectStore } from '../storage/object-store.js';
import { createHttpBackendFactory, embedderName, type EmbeddingBackendFactory } from './backend.js';
import { RecordEmbedder } from './processor.js';
import { RunStatistics, STAT_KEYS } from './stats.js';
import { ExistenceGatedUploader } from './uploader.js';
import { writeJsonLines } from './writer.js';
import type { ResultRecord, UploadResult } from './types.js';

const getLog = () => createLogger('embeddings:job');

/** Collaborators of a run. Everything not given is built from the options. */
export interface EmbeddingJobDeps {
  /** Required when the input or the upload target is an `s3://` path */
  store?: ObjectStore | undefined;
  backendFactory?: EmbeddingBackendFactory | undefined;
  /** Clock, in epoch milliseconds (default: Date.now) */
  now?: (() => number) | undefined;
  /** Monotonic timer for embedding durations, in milliseconds (default: performance.now) */
  timer?: (() => number) | undefined;
  logger?: Logger | undefined;
}

/** Why a run has nothing to do */
export type AlreadySatisfiedReason = 'local-output-exists' | 'remote-output-exists';

/** Outcome of {@link prepareEmbeddingJob} */
export type PrepareResult =
  | { status: 'ready'; options: EmbedOptions }
  | { status: 'already-satisfied'; reason: AlreadySatisfiedReason };

/** Outcome of {@link runEmbeddingJob} */
export interface EmbeddingJobResult {
  /** Sorted copy of all counters */
  stats: Readonly<Record<string, number>>;
  /** Records written to the local output */
  recordsWritten: number;
  /** Upload outcome, absent when no upload was attempted */
  upload?: UploadResult | undefined;
  /** Whether the local output was replaced by a timestamped empty marker */
  truncated: boolean;
  /** Completion time of the last embedding, if any text was embedded */
  lastTimestamp?: Date | undefined;
}

/**
 * Drop flags that only make sense with a remote output path, warning about
 * each one.
 */
export function reconcileOptions(options: EmbedOptions, log: Logger = getLog()): EmbedOptions {
  if (options.s3OutputPath) {
    return options;
  }
  const effective = { ...options };
  if (options.keepTimestampOnly) {
    log.warn(
      'Will not replace output files with time stamp without S3 output path option --s3-output-path set. Option --keep-timestamp-only is ignored.'
    );
    effective.keepTimestampOnly = false;
  }
  if (options.quitIfS3OutputExists) {
    log.warn(
      'Option --quit-if-s3-output-exists is ignored without S3 output path option --s3-output-path set.'
    );
    effective.quitIfS3OutputExists = false;
  }
  return effective;
}

function requireStore(store: ObjectStore | undefined, purpose: string): ObjectStore {
  if (!store) {
    throw new ConfigurationError(`An object store is required to ${purpose}`);
  }
  return store;
}

/**
 * Decide whether a run has anything to do.
 *
 * Malformed `s3://` locators are rejected here, before any I/O.
 *
 * @throws {InvalidPathError} If a locator is malformed
 * @throws {RemoteProbeError} If the remote existence check fails
 */
export async function prepareEmbeddingJob(
  options: EmbedOptions,
  deps: EmbeddingJobDeps = {}
): Promise<PrepareResult> {
  const log = deps.logger ?? getLog();
  const effective = reconcileOptions(options, log);

  if (isS3Path(effective.inputPath)) {
    parseS3Path(effective.inputPath);
  }

  if (effective.noOverwrite && existsSync(effective.outputPath)) {
    log.warn(`Output path ${effective.outputPath} exists and --no-overwrite is set.`);
    return { status: 'already-satisfied', reason: 'local-output-exists' };
  }

  if (effective.s3OutputPath) {
    const { bucket, key } = parseS3Path(effective.s3OutputPath);
    if (effective.quitIfS3OutputExists) {
      const uploader = new ExistenceGatedUploader(
        requireStore(deps.store, 'check the S3 output path'),
        log
      );
      if (await uploader.exists(bucket, key)) {
        log.warn(
          `The file ${formatS3Path(bucket, key)} already exists. Silently quitting, as requested by the option --quit-if-s3-output-exists.`
        );
        return { status: 'already-satisfied', reason: 'remote-output-exists' };
      }
    }
  }

  return { status: 'ready', options: effective };
}

/**
 * Stream the input through the embedder into the output file, then upload
 * and truncate as configured.
 *
 * Options should come from a `ready` result of {@link prepareEmbeddingJob}.
 *
 * @throws {SourceUnavailableError} If the input cannot be read
 * @throws {JsonDecodeError} On the first malformed input line
 * @throws {EmbeddingBackendError} If the backend fails
 * @throws {RemoteProbeError} If the pre-upload existence check fails
 */
export async function runEmbeddingJob(
  options: EmbedOptions,
  deps: EmbeddingJobDeps = {}
): Promise<EmbeddingJobResult> {
  const runId = generateRunId();
  return withRunContext({ runId, fields: { input: options.inputPath } }, async () => {
    const log = deps.logger ?? getLog();
    const now = deps.now ?? Date.now;
    const stats = new RunStatistics();

    const embedder = new RecordEmbedder({
      backendFactory:
        deps.backendFactory ??
        createHttpBackendFactory({
          baseUrl: options.embeddingUrl,
          modelName: options.modelName,
          modelRevision: options.modelRevision,
        }),
      embedder: embedderName(options.modelName, options.modelRevision),
      contentTypes: options.contentTypes,
      minCharLength: options.minCharLength,
      normalize: options.normalizeEmbeddings,
      includeText: options.includeText,
      now,
      timer: deps.timer,
      stats,
    });

    log.info('Starting embedding run', {
      input: options.inputPath,
      output: options.outputPath,
      contentTypes: options.contentTypes,
      minCharLength: options.minCharLength,
    });

    // The source is opened before the output file is created, so an
    // unreadable input leaves an existing output untouched
    const input = await openSource(options.inputPath, { store: deps.store });

    async function* results(): AsyncGenerator<ResultRecord | null, void, unknown> {
      for await (const line of readOpenedLines(input, options.inputPath)) {
        stats.increment(STAT_KEYS.linesRead);
        yield await embedder.process(parseRecordLine(line.text, line.lineNumber));
      }
    }

    let recordsWritten: number;
    try {
      recordsWritten = await writeJsonLines(options.outputPath, results(), { stats });
    } finally {
      input.destroy();
    }

    let upload: UploadResult | undefined;
    let truncated = false;
    if (options.s3OutputPath) {
      if (options.s3OutputDryRun) {
        log.info(`Dry run: not uploading ${options.outputPath} to ${options.s3OutputPath}`);
      } else {
        const uploader = new ExistenceGatedUploader(
          requireStore(deps.store, 'upload the output'),
          log
        );
        upload = await uploader.upload(options.outputPath, options.s3OutputPath);
        // Only replace the local copy when the remote one is known to exist
        if (options.keepTimestampOnly && upload.status !== 'failed') {
          const timestamp = embedder.lastTimestamp ?? new Date(now());
          truncated = await uploader.truncateToMarker(options.outputPath, timestamp);
        }
      }
    }

    stats.logSummary(log);

    return {
      stats: stats.snapshot(),
      recordsWritten,
      upload,
      truncated,
      lastTimestamp: embedder.lastTimestamp,
    };
  });
}
