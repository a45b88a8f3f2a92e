/**
 * Embed Command
 *
 * Compute embeddings for the texts of a compressed JSONL file, locally or
 * from S3, and optionally upload the result.
 */

import { Command } from 'commander';
import {
  color,
  configureLogging,
  fatal,
  formatDuration,
  formatNumber,
  loadConfig,
  parseLogLevel,
} from './utils.js';
import { formatLogHelp } from './log-help.js';
import {
  formatValidationError,
  safeValidateEmbedOptions,
  validateStorageEnv,
  type CliConfig,
  type EmbedOptions,
  type EmbedOptionsInput,
} from '../lib/config-schema.js';
import { describeError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { isS3Path } from '../storage/s3-path.js';
import { S3ObjectStore, type ObjectStore } from '../storage/object-store.js';
import { prepareEmbeddingJob, runEmbeddingJob } from '../embeddings/job.js';

/** Embed command options as parsed by commander */
export interface EmbedCommandOptions {
  inputPath?: string;
  outputPath?: string;
  /** `false` when --no-overwrite is given */
  overwrite: boolean;
  s3OutputPath?: string;
  s3OutputDryRun: boolean;
  quitIfS3OutputExists: boolean;
  keepTimestampOnly: boolean;
  modelName?: string;
  modelRevision?: string;
  contentType?: [string, ...string[]];
  minCharLength?: string;
  normalizeEmbeddings: boolean;
  includeText: boolean;
  embeddingUrl?: string;
  level: string;
  logFile?: string;
  helpLogs: boolean;
}

/**
 * Merge command-line options over the loaded configuration and validate
 * the result. Flags win over the config file; schema defaults fill the rest.
 */
export function resolveEmbedOptions(
  options: EmbedCommandOptions,
  config: CliConfig
): ReturnType<typeof safeValidateEmbedOptions> {
  const input: EmbedOptionsInput = {
    inputPath: options.inputPath ?? '',
    outputPath: options.outputPath ?? '',
    noOverwrite: !options.overwrite,
    s3OutputPath: options.s3OutputPath,
    s3OutputDryRun: options.s3OutputDryRun,
    quitIfS3OutputExists: options.quitIfS3OutputExists,
    keepTimestampOnly: options.keepTimestampOnly,
    modelName: options.modelName ?? config.modelName,
    modelRevision: options.modelRevision ?? config.modelRevision,
    embeddingUrl: options.embeddingUrl ?? config.embeddingUrl,
    contentTypes: options.contentType ?? config.contentTypes,
    minCharLength:
      options.minCharLength !== undefined
        ? parseInt(options.minCharLength, 10)
        : config.minCharLength,
    normalizeEmbeddings: options.normalizeEmbeddings,
    includeText: options.includeText,
  };
  return safeValidateEmbedOptions(input);
}

function needsObjectStore(options: EmbedOptions): boolean {
  return isS3Path(options.inputPath) || options.s3OutputPath !== undefined;
}

function printLogHelp(level: string): void {
  let lines: string[];
  try {
    lines = formatLogHelp(parseLogLevel(level));
  } catch (error) {
    fatal(describeError(error));
  }
  for (const line of lines) {
    console.log(line);
  }
}

export const embedCommand = new Command('embed')
  .description('Generate embeddings for the texts of a compressed JSONL file')
  .option('-i, --input-path <path>', 'S3 path (s3://BUCKET/KEY) or local path of the JSONL input')
  .option('-o, --output-path <path>', 'Local output file (gzip-compressed if it ends in .gz)')
  .option('--no-overwrite', 'Do nothing, without error, if the output file exists')
  .option('--s3-output-path <path>', 'Upload the output file to this S3 path after processing')
  .option('--s3-output-dry-run', 'Never upload, even if --s3-output-path is set', false)
  .option('--quit-if-s3-output-exists', 'Quit before processing if the S3 output exists', false)
  .option(
    '--keep-timestamp-only',
    'After uploading, truncate the local output and keep only its timestamp',
    false
  )
  .option('-m, --model-name <name>', 'Embedding model name (default: Alibaba-NLP/gte-multilingual-base)')
  .option('--model-revision <revision>', 'Embedding model revision (default: main)')
  .option('-t, --content-type <types...>', 'Content types to embed (default: ar)')
  .option('--min-char-length <count>', 'Texts of this many characters or fewer are skipped (default: 400)')
  .option('--normalize-embeddings', 'Scale embeddings to unit length', false)
  .option('--include-text', 'Copy the source text into each output record', false)
  .option('--embedding-url <url>', 'Base URL of the embedding server (default: http://127.0.0.1:8080)')
  .option('--level <level>', 'Log level: debug, info, warning, error, critical', 'info')
  .option('--log-file <path>', 'Also write every log entry as a JSON line to this file')
  .option('--help-logs', 'Describe the log messages and statistics of a run, then exit', false)
  .action(async (options: EmbedCommandOptions) => {
    if (options.helpLogs) {
      printLogHelp(options.level);
      return;
    }

    let jobOptions: EmbedOptions;
    let store: ObjectStore | undefined;
    try {
      configureLogging({ level: options.level, logFile: options.logFile });
      const result = resolveEmbedOptions(options, await loadConfig());
      if (!result.success) {
        fatal(`Invalid options:\n${formatValidationError(result.error)}`);
      }
      jobOptions = result.data;
      if (needsObjectStore(jobOptions)) {
        store = S3ObjectStore.fromEnv(validateStorageEnv(process.env));
      }
    } catch (error) {
      fatal(describeError(error));
    }

    const log = createLogger('cli:embed');
    log.info('Arguments', { ...jobOptions });

    const startTime = Date.now();
    try {
      const prepared = await prepareEmbeddingJob(jobOptions, { store });
      if (prepared.status === 'already-satisfied') {
        return;
      }

      const result = await runEmbeddingJob(prepared.options, { store });
      const elapsed = (Date.now() - startTime) / 1000;

      console.log('');
      console.log(color.success('Embedding complete!'));
      console.log(`  Records written: ${color.cyan(formatNumber(result.recordsWritten))}`);
      console.log(`  Output: ${color.dim(prepared.options.outputPath)}`);
      if (result.upload) {
        const status =
          result.upload.status === 'failed'
            ? color.error(`failed (${result.upload.error.reason})`)
            : color.green(result.upload.status);
        console.log(`  Upload: ${status}`);
      }
      if (result.truncated) {
        console.log(`  Local output replaced by timestamp marker`);
      }
      console.log(`  Time: ${color.yellow(formatDuration(elapsed))}`);
    } catch (error) {
      fatal(describeError(error));
    }
  });
