/**
 * Local stamp files
 *
 * Mirrors the objects under an `s3://bucket/prefix` as local files whose
 * access and modification times equal each object's last-modified time.
 * Stamps are empty unless content is requested; a stamp without content
 * gets the stamp extension appended to its name.
 */

import { createWriteStream } from 'node:fs';
import { mkdir, utimes, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { StampOptions } from '../lib/config-schema.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { createDecompressor } from '../ingest/decompress.js';
import type { ObjectStore } from './object-store.js';
import { parseS3Path } from './s3-path.js';

const getLog = () => createLogger('storage:stamps');

/** Outcome of {@link LocalStampCreator.run} */
export interface StampRunResult {
  filesCreated: number;
  /** Local paths in listing order */
  paths: string[];
}

export class LocalStampCreator {
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly log: Logger;
  private filesCreated = 0;

  /**
   * @throws {InvalidPathError} If `options.s3Path` is malformed
   */
  constructor(
    private readonly store: ObjectStore,
    private readonly options: StampOptions,
    logger?: Logger
  ) {
    const { bucket, key } = parseS3Path(options.s3Path);
    this.bucket = bucket;
    this.prefix = key;
    this.log = logger ?? getLog();
  }

  /**
   * Create a stamp for every object under the prefix
   */
  async run(): Promise<StampRunResult> {
    this.log.info('Starting stamp file creation...');
    const paths: string[] = [];
    for await (const object of this.store.listObjects(this.bucket, this.prefix)) {
      if (object.key.endsWith('/')) {
        this.log.debug('Skipping directory marker', { key: object.key });
        continue;
      }
      paths.push(await this.createLocalStampFile(object.key, object.lastModified));
    }
    this.log.info(`Stamp file creation completed. Files created: ${this.filesCreated}`);
    return { filesCreated: this.filesCreated, paths };
  }

  /**
   * Local path of the stamp for `key`
   */
  localPathFor(key: string, withContent = this.options.writeContent): string {
    const parts = key.split('/');
    const base = this.options.noBucket
      ? join(this.options.localDir, ...parts)
      : join(this.options.localDir, this.bucket, ...parts);
    return withContent ? base : `${base}${this.options.stampExtension}`;
  }

  /**
   * Create one stamp file and set its times to `lastModified`.
   *
   * With content enabled the object is downloaded into the file;
   * `.bz2` objects are stored decompressed.
   *
   * @returns The local path written
   */
  async createLocalStampFile(key: string, lastModified: Date): Promise<string> {
    const path = this.localPathFor(key);
    await mkdir(dirname(path), { recursive: true });

    if (this.options.writeContent) {
      const body = await this.store.getObjectStream(this.bucket, key);
      const compression = key.endsWith('.bz2') ? 'bzip2' : 'none';
      await pipeline(body, createDecompressor(compression), createWriteStream(path));
    } else {
      await writeFile(path, '');
    }

    await utimes(path, lastModified, lastModified);
    this.filesCreated++;
    this.log.info(
      `Created stamp file: '${path}' with modification date: ${lastModified.toISOString()}`
    );
    return path;
  }
}
