/**
 * Stamps Command
 *
 * Mirror the objects under an S3 prefix as local stamp files.
 */

import { Command } from 'commander';
import { color, configureLogging, fatal, formatNumber, loadConfig } from './utils.js';
import {
  formatValidationError,
  safeValidateStampOptions,
  validateStorageEnv,
  type CliConfig,
} from '../lib/config-schema.js';
import { describeError } from '../lib/errors.js';
import { S3ObjectStore } from '../storage/object-store.js';
import { LocalStampCreator } from '../storage/stamps.js';

/** Stamps command options as parsed by commander */
export interface StampsCommandOptions {
  localDir?: string;
  /** `false` when --no-bucket is given */
  bucket: boolean;
  stampExtension?: string;
  writeContent: boolean;
  level: string;
  logFile?: string;
}

/**
 * Merge command-line options over the loaded configuration and validate
 */
export function resolveStampOptions(
  s3Path: string,
  options: StampsCommandOptions,
  config: CliConfig
): ReturnType<typeof safeValidateStampOptions> {
  return safeValidateStampOptions({
    s3Path,
    localDir: options.localDir ?? config.localDir,
    noBucket: !options.bucket,
    stampExtension: options.stampExtension ?? config.stampExtension,
    writeContent: options.writeContent,
  });
}

export const stampsCommand = new Command('stamps')
  .description('Create local stamp files mirroring the objects under an S3 prefix')
  .argument('<s3-path>', 'S3 prefix in the format s3://BUCKET/PREFIX')
  .option('-d, --local-dir <path>', 'Local directory the stamp files are created in (default: ./)')
  .option('--no-bucket', 'Do not nest local files under a directory named after the bucket')
  .option('--stamp-extension <ext>', 'Extension appended to stamp files, with its dot (default: .stamp)')
  .option('--write-content', 'Write the object content into the files instead of empty stamps', false)
  .option('--level <level>', 'Log level: debug, info, warning, error, critical', 'info')
  .option('--log-file <path>', 'Also write every log entry as a JSON line to this file')
  .action(async (s3Path: string, options: StampsCommandOptions) => {
    try {
      configureLogging({ level: options.level, logFile: options.logFile });
      const result = resolveStampOptions(s3Path, options, await loadConfig());
      if (!result.success) {
        fatal(`Invalid options:\n${formatValidationError(result.error)}`);
      }

      const store = S3ObjectStore.fromEnv(validateStorageEnv(process.env));
      const creator = new LocalStampCreator(store, result.data);
      const { filesCreated } = await creator.run();

      console.log(`${color.success('Done.')} Files created: ${color.cyan(formatNumber(filesCreated))}`);
    } catch (error) {
      fatal(describeError(error));
    }
  });
