/**
 * Existence-gated uploader
 *
 * Uploads a finished artifact only when nothing exists at the remote key,
 * so a rerun never replaces an object that an earlier run produced.
 * Upload failures are returned, never thrown: the local output stays
 * usable and the upload can be repeated later.
 */

import { open, utimes } from 'node:fs/promises';
import {
  CredentialsError,
  RemoteProbeError,
  UploadError,
  getErrorCode,
  type UploadFailureReason,
} from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { formatS3Path, parseS3Path } from '../storage/s3-path.js';
import type { ObjectStore } from '../storage/object-store.js';
import type { UploadResult } from './types.js';

const getLog = () => createLogger('embeddings:uploader');

/**
 * Map an upload failure to its reason
 */
export function classifyUploadFailure(error: unknown): UploadFailureReason {
  if (getErrorCode(error) === 'ENOENT') {
    return 'missing-local-file';
  }
  if (error instanceof CredentialsError) {
    return error.problem === 'partial' ? 'partial-credentials' : 'missing-credentials';
  }
  // Raised by the AWS SDK default provider chain
  if (error instanceof Error && error.name === 'CredentialsProviderError') {
    return 'missing-credentials';
  }
  return 'remote';
}

function failureMessage(reason: UploadFailureReason, localPath: string, error: unknown): string {
  switch (reason) {
    case 'missing-local-file':
      return `The file ${localPath} was not found`;
    case 'missing-credentials':
      return 'Credentials not available';
    case 'partial-credentials':
      return 'Incomplete credentials provided';
    case 'remote':
      return `Failed to upload ${localPath}: ${error instanceof Error ? error.message : String(error)}`;
  }
}

export class ExistenceGatedUploader {
  private readonly log: Logger;

  constructor(
    private readonly store: ObjectStore,
    logger?: Logger
  ) {
    this.log = logger ?? getLog();
  }

  /**
   * Whether an object exists at `bucket/key`.
   *
   * @throws {RemoteProbeError} If the check fails for any reason other
   *   than "not found"
   */
  async exists(bucket: string, key: string): Promise<boolean> {
    try {
      return (await this.store.headObject(bucket, key)) !== null;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemoteProbeError(
        `Cannot check ${formatS3Path(bucket, key)}: ${reason}`,
        bucket,
        key,
        { cause: error }
      );
    }
  }

  /**
   * Upload `localPath` to `locator` unless the remote object exists.
   *
   * @throws {InvalidPathError} If `locator` is not an `s3://bucket/key` path
   * @throws {RemoteProbeError} If the existence check fails
   */
  async upload(localPath: string, locator: string): Promise<UploadResult> {
    const { bucket, key } = parseS3Path(locator);
    const remote = formatS3Path(bucket, key);

    if (await this.exists(bucket, key)) {
      this.log.warn(`The file ${remote} already exists. Skipping upload.`);
      return { status: 'skipped', bucket, key };
    }

    this.log.info(`Uploading ${localPath} to ${remote}`);
    try {
      await this.store.putFile(bucket, key, localPath);
    } catch (error) {
      const reason = classifyUploadFailure(error);
      const uploadError = new UploadError(failureMessage(reason, localPath, error), reason, {
        cause: error,
      });
      this.log.error(uploadError.message, { reason, target: remote }, 'upload');
      return { status: 'failed', error: uploadError };
    }
    this.log.info(`Successfully uploaded ${localPath} to ${remote}`);
    return { status: 'uploaded', bucket, key };
  }

  /**
   * Replace a file's content with zero bytes and set its access and
   * modification times to `timestamp` (default: now).
   *
   * @returns `false` if the file could not be truncated or touched
   */
  async truncateToMarker(path: string, timestamp: Date = new Date()): Promise<boolean> {
    try {
      this.log.info(`Truncating ${path} and setting its timestamp metadata.`);
      const handle = await open(path, 'w');
      await handle.close();
      await utimes(path, timestamp, timestamp);
      this.log.info(
        `File ${path} has been truncated and its timestamp updated to ${timestamp.toISOString()}.`
      );
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log.error(`Failed to truncate ${path}: ${reason}`, undefined, 'truncate');
      return false;
    }
  }
}
