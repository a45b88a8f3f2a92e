/**
 * Storage Layer
 *
 * S3 locators, the object store used by the pipeline and local stamp
 * files mirroring remote objects.
 */

// Type definitions
export type { S3Location } from './s3-path.js';
export type { ObjectInfo, ObjectStore } from './object-store.js';
export type { StampRunResult } from './stamps.js';

// S3 paths
export { parseS3Path, formatS3Path, isS3Path } from './s3-path.js';

// Object store
export { S3ObjectStore, isNotFoundError } from './object-store.js';

// Stamp files
export { LocalStampCreator } from './stamps.js';
