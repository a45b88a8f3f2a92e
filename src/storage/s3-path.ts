/**
 * Object storage locators
 *
 * `s3://bucket/key` strings are the only way the pipeline names remote
 * objects. Keys may contain further `/` separators.
 */

import { InvalidPathError } from '../lib/errors.js';
import { S3_SCHEME } from '../lib/constants.js';

/** A resolved storage locator */
export interface S3Location {
  bucket: string;
  key: string;
}

/**
 * Whether a string uses the object storage scheme
 */
export function isS3Path(value: string): boolean {
  return value.startsWith(S3_SCHEME);
}

/**
 * Split `s3://bucket/key` into bucket and key.
 *
 * @example
 * ```typescript
 * parseS3Path('s3://mybucket/myfolder/myfile.txt');
 * // { bucket: 'mybucket', key: 'myfolder/myfile.txt' }
 * ```
 *
 * @throws {InvalidPathError} If the scheme is missing or there is no `/`
 *   after the bucket name
 */
export function parseS3Path(locator: string): S3Location {
  if (!isS3Path(locator)) {
    throw new InvalidPathError(`S3 path must start with ${S3_SCHEME}`, locator);
  }
  const rest = locator.slice(S3_SCHEME.length);
  const slash = rest.indexOf('/');
  if (slash === -1) {
    throw new InvalidPathError(
      `S3 path must be in the format ${S3_SCHEME}bucket/key`,
      locator
    );
  }
  return { bucket: rest.slice(0, slash), key: rest.slice(slash + 1) };
}

/**
 * Build a locator from bucket and key
 */
export function formatS3Path(bucket: string, key: string): string {
  return `${S3_SCHEME}${bucket}/${key}`;
}
