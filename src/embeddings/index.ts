/**
 * Embeddings module exports
 *
 * Filters input records, computes their embeddings, writes the results and
 * uploads the finished artifact.
 */

// Types
export type { ResultRecord, UploadResult } from './types.js';

// Job
export { prepareEmbeddingJob, runEmbeddingJob, reconcileOptions } from './job.js';
export type {
  AlreadySatisfiedReason,
  EmbeddingJobDeps,
  EmbeddingJobResult,
  PrepareResult,
} from './job.js';

// Record filter and embedder
export { RecordEmbedder, characterCount, formatTimestamp } from './processor.js';
export type { RecordEmbedderOptions } from './processor.js';

// Backends
export { HttpEmbeddingBackend, createHttpBackendFactory, embedderName } from './backend.js';
export type {
  EmbeddingBackend,
  EmbeddingBackendFactory,
  HttpEmbeddingBackendConfig,
} from './backend.js';

// Statistics
export {
  RunStatistics,
  STAT_KEYS,
  SKIPPED_TYPE_PREFIX,
  skippedTypeKey,
  languageKey,
  charCountBucket,
  charCountBucketKey,
} from './stats.js';
export type { StatsView } from './stats.js';

// Output
export { writeJsonLines, serializeRecord } from './writer.js';
export type { WriteJsonLinesOptions } from './writer.js';
export { ExistenceGatedUploader, classifyUploadFailure } from './uploader.js';

// Vector helpers
export { vectorNorm, normalizeVector, roundTo, roundVector } from './vector.js';
