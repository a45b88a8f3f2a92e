/**
 * Object storage access
 *
 * The pipeline talks to object storage only through the {@link ObjectStore}
 * interface: stream an object, probe its metadata, upload a local file and
 * list a prefix. {@link S3ObjectStore} implements it on
 * `@aws-sdk/client-s3` for any S3-compatible endpoint.
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { CredentialsError } from '../lib/errors.js';
import type { StorageEnv } from '../lib/config-schema.js';
import { createLogger } from '../lib/logger.js';

const getLog = () => createLogger('storage:s3');

/** Metadata of one remote object */
export interface ObjectInfo {
  key: string;
  lastModified: Date;
  size: number;
}

/** Minimal object storage capability used by the pipeline */
export interface ObjectStore {
  /** Open an object for streaming reads */
  getObjectStream(bucket: string, key: string): Promise<Readable>;
  /** Object metadata, or `null` if the object does not exist */
  headObject(bucket: string, key: string): Promise<ObjectInfo | null>;
  /** Upload a local file as `key` */
  putFile(bucket: string, key: string, localPath: string): Promise<void>;
  /** Every object whose key starts with `prefix`, in listing order */
  listObjects(bucket: string, prefix: string): AsyncIterable<ObjectInfo>;
}

function httpStatusOf(error: Error): number | undefined {
  if (!('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (
    typeof metadata === 'object' &&
    metadata !== null &&
    'httpStatusCode' in metadata &&
    typeof metadata.httpStatusCode === 'number'
  ) {
    return metadata.httpStatusCode;
  }
  return undefined;
}

/**
 * Whether a storage client error means "no such object"
 */
export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === 'NotFound' || error.name === 'NoSuchKey' || httpStatusOf(error) === 404;
}

/**
 * Build the credentials part of the S3 client configuration.
 *
 * Both keys set: static credentials. Neither set: the SDK default provider
 * chain. Only one set: a provider that fails every request, so the half
 * configuration is reported instead of silently falling back.
 */
function credentialsFor(env: StorageEnv): S3ClientConfig['credentials'] {
  const accessKeyId = env.SE_ACCESS_KEY;
  const secretAccessKey = env.SE_SECRET_KEY;
  if (accessKeyId && secretAccessKey) {
    return { accessKeyId, secretAccessKey };
  }
  if (accessKeyId || secretAccessKey) {
    return async () => {
      throw new CredentialsError(
        'Incomplete credentials provided: set both SE_ACCESS_KEY and SE_SECRET_KEY',
        'partial'
      );
    };
  }
  return undefined;
}

/**
 * {@link ObjectStore} on an S3-compatible service
 */
export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  /**
   * Create a store from the storage environment (`SE_*` variables)
   */
  static fromEnv(env: StorageEnv): S3ObjectStore {
    const config: S3ClientConfig = {
      endpoint: env.SE_HOST_URL,
      region: env.SE_REGION,
      forcePathStyle: true,
    };
    const credentials = credentialsFor(env);
    if (credentials) {
      config.credentials = credentials;
    }
    getLog().debug('Creating S3 client', { endpoint: env.SE_HOST_URL, region: env.SE_REGION });
    return new S3ObjectStore(new S3Client(config));
  }

  async getObjectStream(bucket: string, key: string): Promise<Readable> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    const body = response.Body;
    if (!(body instanceof Readable)) {
      throw new Error(`Object s3://${bucket}/${key} has no readable body`);
    }
    return body;
  }

  async headObject(bucket: string, key: string): Promise<ObjectInfo | null> {
    try {
      const response = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return {
        key,
        lastModified: response.LastModified ?? new Date(0),
        size: response.ContentLength ?? 0,
      };
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  async putFile(bucket: string, key: string, localPath: string): Promise<void> {
    const { size } = await stat(localPath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: createReadStream(localPath),
        ContentLength: size,
      })
    );
  }

  async *listObjects(bucket: string, prefix: string): AsyncGenerator<ObjectInfo, void, unknown> {
    let continuationToken: string | undefined;
    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );
      for (const object of response.Contents ?? []) {
        if (object.Key === undefined || object.LastModified === undefined) {
          continue;
        }
        yield { key: object.Key, lastModified: object.LastModified, size: object.Size ?? 0 };
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
  }
}
