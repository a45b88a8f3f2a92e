/**
 * Configuration Schema Validation
 *
 * Zod schemas for validating CLI configuration, embedding job options and
 * storage credentials from the environment. Provides runtime type safety
 * and readable error messages for misconfiguration.
 */

import { z } from 'zod';
import {
  DEFAULT_CONTENT_TYPES,
  DEFAULT_MIN_CHAR_LENGTH,
  DEFAULT_MODEL_NAME,
  DEFAULT_MODEL_REVISION,
  DEFAULT_S3_ENDPOINT,
  DEFAULT_S3_REGION,
  DEFAULT_EMBEDDING_URL,
  DEFAULT_STAMP_EXTENSION,
} from './constants.js';

const s3Locator = z
  .string()
  .startsWith('s3://', { message: "S3 path must start with 's3://'" });

/**
 * CLI Configuration Schema
 *
 * Validates configuration from .textembedrc files and environment variables.
 * Every field is optional; command-line flags take precedence.
 */
export const CliConfigSchema = z.object({
  /** Embedding model name */
  modelName: z.string().min(1).optional(),

  /** Embedding model revision */
  modelRevision: z.string().min(1).optional(),

  /** Base URL of the embedding server */
  embeddingUrl: z.string().url().optional(),

  /** Content types that are embedded */
  contentTypes: z.array(z.string().min(1)).nonempty().optional(),

  /** Minimum character length of an embedded text */
  minCharLength: z.number().int().nonnegative().optional(),

  /** Local root directory for stamp files */
  localDir: z.string().optional(),

  /** Extension appended to stamp files */
  stampExtension: z.string().optional(),
});

/** Type inferred from CliConfigSchema */
export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Embedding job options
 *
 * The fully merged options of one `embed` run.
 */
export const EmbedOptionsSchema = z.object({
  /** `s3://bucket/key` or a local path to the compressed JSONL input */
  inputPath: z.string().min(1),
  /** Local output path */
  outputPath: z.string().min(1),
  /** Skip the run when the local output already exists */
  noOverwrite: z.boolean().default(false),
  /** Remote location the output is uploaded to */
  s3OutputPath: s3Locator.optional(),
  /** Never upload, even if s3OutputPath is set */
  s3OutputDryRun: z.boolean().default(false),
  /** Stop before processing when s3OutputPath already exists */
  quitIfS3OutputExists: z.boolean().default(false),
  /** Replace the local output with a timestamped empty marker after upload */
  keepTimestampOnly: z.boolean().default(false),
  modelName: z.string().min(1).default(DEFAULT_MODEL_NAME),
  modelRevision: z.string().min(1).default(DEFAULT_MODEL_REVISION),
  embeddingUrl: z.string().url().default(DEFAULT_EMBEDDING_URL),
  contentTypes: z.array(z.string().min(1)).nonempty().default([...DEFAULT_CONTENT_TYPES]),
  minCharLength: z.number().int().nonnegative().default(DEFAULT_MIN_CHAR_LENGTH),
  normalizeEmbeddings: z.boolean().default(false),
  includeText: z.boolean().default(false),
});

/** Validated embedding job options */
export type EmbedOptions = z.infer<typeof EmbedOptionsSchema>;

/** Raw embedding job options before defaults are applied */
export type EmbedOptionsInput = z.input<typeof EmbedOptionsSchema>;

/**
 * Stamp mirroring options
 */
export const StampOptionsSchema = z.object({
  /** `s3://bucket/prefix` to mirror */
  s3Path: s3Locator,
  localDir: z.string().default('./'),
  /** Do not nest local files under a directory named after the bucket */
  noBucket: z.boolean().default(false),
  stampExtension: z.string().default(DEFAULT_STAMP_EXTENSION),
  /** Write the object content instead of an empty stamp */
  writeContent: z.boolean().default(false),
});

/** Validated stamp options */
export type StampOptions = z.infer<typeof StampOptionsSchema>;

/**
 * Storage environment
 *
 * S3-compatible object storage credentials and endpoint.
 */
export const StorageEnvSchema = z.object({
  SE_ACCESS_KEY: z.string().min(1).optional(),
  SE_SECRET_KEY: z.string().min(1).optional(),
  SE_HOST_URL: z.string().url().default(DEFAULT_S3_ENDPOINT),
  SE_REGION: z.string().min(1).default(DEFAULT_S3_REGION),
});

/** Validated storage environment */
export type StorageEnv = z.infer<typeof StorageEnvSchema>;

/**
 * Safely validate CLI configuration without throwing
 */
export function safeValidateCliConfig(config: unknown): z.SafeParseReturnType<unknown, CliConfig> {
  return CliConfigSchema.safeParse(config);
}

/**
 * Safely validate embedding job options without throwing
 */
export function safeValidateEmbedOptions(
  options: unknown
): z.SafeParseReturnType<EmbedOptionsInput, EmbedOptions> {
  return EmbedOptionsSchema.safeParse(options);
}

/**
 * Safely validate stamp options without throwing
 */
export function safeValidateStampOptions(
  options: unknown
): z.SafeParseReturnType<z.input<typeof StampOptionsSchema>, StampOptions> {
  return StampOptionsSchema.safeParse(options);
}

/**
 * Validate the storage environment
 *
 * Empty strings count as unset, so `SE_ACCESS_KEY=` in a .env file does
 * not produce a half-configured client.
 *
 * @throws {z.ZodError} If validation fails
 */
export function validateStorageEnv(env: NodeJS.ProcessEnv): StorageEnv {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  return StorageEnvSchema.parse(present);
}

/**
 * Format Zod validation errors for user display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
