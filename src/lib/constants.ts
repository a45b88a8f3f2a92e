/**
 * Centralized constants for the embedding pipeline
 *
 * Defaults shared by the CLI, the configuration schema and the pipeline
 * modules. Import from here to keep them consistent.
 */

// ============================================================================
// Embedding
// ============================================================================

/** Default embedding model */
export const DEFAULT_MODEL_NAME = 'Alibaba-NLP/gte-multilingual-base';

/** Default embedding model revision */
export const DEFAULT_MODEL_REVISION = 'main';

/** Default base URL of the embedding server */
export const DEFAULT_EMBEDDING_URL = 'http://127.0.0.1:8080';

/** Default embedding request timeout in milliseconds */
export const DEFAULT_EMBEDDING_TIMEOUT_MS = 120000;

/** Content types embedded unless configured otherwise */
export const DEFAULT_CONTENT_TYPES = ['ar'] as const;

/** Texts of this many characters or fewer are not embedded */
export const DEFAULT_MIN_CHAR_LENGTH = 400;

/** Decimal digits kept for every embedding coordinate */
export const EMBEDDING_PRECISION = 5;

/** Width of the character-count histogram buckets */
export const CHAR_COUNT_BUCKET_WIDTH = 5000;

/** A progress line is logged after this many valid texts */
export const PROGRESS_LOG_INTERVAL = 100;

// ============================================================================
// Storage
// ============================================================================

/** Scheme prefix of object storage locators */
export const S3_SCHEME = 's3://';

/** Default S3-compatible endpoint */
export const DEFAULT_S3_ENDPOINT = 'https://os.zhdk.cloud.switch.ch/';

/** Region sent to the S3 client; S3-compatible stores mostly ignore it */
export const DEFAULT_S3_REGION = 'us-east-1';

/** Extension appended to stamp files that carry no content */
export const DEFAULT_STAMP_EXTENSION = '.stamp';
