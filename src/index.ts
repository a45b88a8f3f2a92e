/**
 * textembed - Main Library Entry Point
 *
 * This module re-exports key functionality from the various sub-modules
 * for convenient access by library consumers.
 */

// ============================================================================
// EMBEDDING PIPELINE - Filter, embed, write and upload
// ============================================================================
export {
  prepareEmbeddingJob,
  runEmbeddingJob,
  reconcileOptions,
  RecordEmbedder,
  characterCount,
  formatTimestamp,
  HttpEmbeddingBackend,
  createHttpBackendFactory,
  embedderName,
  RunStatistics,
  STAT_KEYS,
  writeJsonLines,
  serializeRecord,
  ExistenceGatedUploader,
  classifyUploadFailure,
  normalizeVector,
  roundVector,
} from './embeddings/index.js'

export type {
  EmbeddingJobDeps,
  EmbeddingJobResult,
  PrepareResult,
  RecordEmbedderOptions,
  EmbeddingBackend,
  EmbeddingBackendFactory,
  HttpEmbeddingBackendConfig,
  StatsView,
  ResultRecord,
  UploadResult,
} from './embeddings/index.js'

// ============================================================================
// INGEST - Line reading and record decoding
// ============================================================================
export {
  openSource,
  readLines,
  readOpenedLines,
  parseRecordLine,
  createDecompressor,
  createCompressor,
  detectCompressionFromExtension,
} from './ingest/index.js'

export type { CompressionType, InputRecord, ReadLinesOptions, SourceLine } from './ingest/index.js'

// ============================================================================
// STORAGE - S3 paths, object store and stamp files
// ============================================================================
export {
  parseS3Path,
  formatS3Path,
  isS3Path,
  S3ObjectStore,
  isNotFoundError,
  LocalStampCreator,
} from './storage/index.js'

export type { ObjectInfo, ObjectStore, S3Location, StampRunResult } from './storage/index.js'

// ============================================================================
// LIB - Errors, logging and configuration
// ============================================================================
export {
  InvalidPathError,
  SourceUnavailableError,
  JsonDecodeError,
  RemoteProbeError,
  UploadError,
  CredentialsError,
  EmbeddingBackendError,
  ConfigurationError,
  isTypedError,
  describeError,
} from './lib/errors.js'

export type { ErrorKind, TypedError, UploadFailureReason } from './lib/errors.js'

export { Logger, createLogger, setLoggerProvider, resetLoggerProvider } from './lib/logger.js'

export type { LogLevel, LoggerConfig, LoggerProvider } from './lib/logger.js'

export {
  EmbedOptionsSchema,
  StampOptionsSchema,
  StorageEnvSchema,
  validateStorageEnv,
} from './lib/config-schema.js'

export type { EmbedOptions, EmbedOptionsInput, StampOptions, StorageEnv } from './lib/config-schema.js'
