/**
 * Tests for the embedding job
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { gzipSync } from 'node:zlib';
import {
  prepareEmbeddingJob,
  reconcileOptions,
  runEmbeddingJob,
} from '../../src/embeddings/job.js';
import { EmbedOptionsSchema, type EmbedOptions, type EmbedOptionsInput } from '../../src/lib/config-schema.js';
import {
  ConfigurationError,
  InvalidPathError,
  JsonDecodeError,
  RemoteProbeError,
  SourceUnavailableError,
} from '../../src/lib/errors.js';
import { SKIPPED_TYPE_PREFIX } from '../../src/embeddings/stats.js';
import { DefaultLoggerProvider, Logger, setLoggerProvider } from '../../src/lib/logger.js';
import {
  FakeBackend,
  MemoryObjectStore,
  createClock,
  createCountingFactory,
  createTempDir,
  toJsonLines,
} from '../helpers.js';

const START = Date.UTC(2024, 0, 1, 12, 0, 0, 250);
const END = START + 750;

const INPUT_RECORDS = [
  { id: 'a1', tp: 'ar', ft: 'x'.repeat(500), lang: 'de' },
  { id: 'p1', tp: 'page', ft: 'y'.repeat(500), lang: 'de' },
  { id: 's1', tp: 'ar', ft: 'too short', lang: 'fr' },
];

const EXPECTED_LINE =
  '{"id":"a1","ts":"2024-01-01T12:00:01Z","embedder":"fake-model@main","len":500,"embedding":[500,0,0.12346]}\n';

describe('embedding job', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let store: MemoryObjectStore;
  let logger: Logger;

  function options(overrides: Partial<EmbedOptionsInput> = {}): EmbedOptions {
    return EmbedOptionsSchema.parse({
      inputPath: join(dir, 'docs.jsonl.gz'),
      outputPath: join(dir, 'out', 'embeddings.jsonl'),
      modelName: 'fake-model',
      ...overrides,
    });
  }

  function deps(backend = new FakeBackend()) {
    const counting = createCountingFactory(backend);
    return {
      store,
      backendFactory: counting.factory,
      now: createClock(END),
      timer: createClock(0, 750),
      logger,
      constructed: counting.constructed,
    };
  }

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    store = new MemoryObjectStore();
    logger = new Logger({ level: 'error' });
    setLoggerProvider(new DefaultLoggerProvider({ level: 'error' }));
    await writeFile(join(dir, 'docs.jsonl.gz'), gzipSync(toJsonLines(INPUT_RECORDS)));
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('reconcileOptions', () => {
    it('should keep remote-only flags with a remote output', () => {
      const input = options({
        s3OutputPath: 's3://bucket/out.jsonl',
        keepTimestampOnly: true,
        quitIfS3OutputExists: true,
      });

      expect(reconcileOptions(input, logger)).toBe(input);
    });

    it('should drop remote-only flags without a remote output', () => {
      const warn = vi.spyOn(logger, 'warn');

      const effective = reconcileOptions(
        options({ keepTimestampOnly: true, quitIfS3OutputExists: true }),
        logger
      );

      expect(effective.keepTimestampOnly).toBe(false);
      expect(effective.quitIfS3OutputExists).toBe(false);
      expect(warn).toHaveBeenCalledTimes(2);
      expect(warn).toHaveBeenCalledWith(
        'Option --quit-if-s3-output-exists is ignored without S3 output path option --s3-output-path set.'
      );
    });
  });

  describe('prepareEmbeddingJob', () => {
    it('should be ready when nothing exists yet', async () => {
      const input = options({ s3OutputPath: 's3://bucket/out.jsonl', quitIfS3OutputExists: true });

      const result = await prepareEmbeddingJob(input, deps());

      expect(result).toEqual({ status: 'ready', options: input });
    });

    it('should stop when the local output exists and overwriting is off', async () => {
      const input = options({ noOverwrite: true, outputPath: join(dir, 'docs.jsonl.gz') });

      const result = await prepareEmbeddingJob(input, deps());

      expect(result).toEqual({ status: 'already-satisfied', reason: 'local-output-exists' });
    });

    it('should continue when the local output exists and overwriting is on', async () => {
      const result = await prepareEmbeddingJob(
        options({ outputPath: join(dir, 'docs.jsonl.gz') }),
        deps()
      );

      expect(result.status).toBe('ready');
    });

    it('should stop when the remote output exists and quitting was asked for', async () => {
      store.put('bucket', 'out.jsonl', 'earlier run');
      const warn = vi.spyOn(logger, 'warn');

      const result = await prepareEmbeddingJob(
        options({ s3OutputPath: 's3://bucket/out.jsonl', quitIfS3OutputExists: true }),
        deps()
      );

      expect(result).toEqual({ status: 'already-satisfied', reason: 'remote-output-exists' });
      expect(warn).toHaveBeenCalledWith(
        'The file s3://bucket/out.jsonl already exists. Silently quitting, as requested by the option --quit-if-s3-output-exists.'
      );
    });

    it('should not probe the remote output unless quitting was asked for', async () => {
      store.failHead = new Error('Forbidden');

      const result = await prepareEmbeddingJob(
        options({ s3OutputPath: 's3://bucket/out.jsonl' }),
        deps()
      );

      expect(result.status).toBe('ready');
    });

    it('should ignore the quit flag without a remote output', async () => {
      const result = await prepareEmbeddingJob(options({ quitIfS3OutputExists: true }), deps());

      expect(result).toMatchObject({ status: 'ready', options: { quitIfS3OutputExists: false } });
    });

    it('should reject a malformed remote input before any I/O', async () => {
      await expect(
        prepareEmbeddingJob(options({ inputPath: 's3://bucket-only' }), deps())
      ).rejects.toThrow(InvalidPathError);
    });

    it('should surface probe failures', async () => {
      store.failHead = new Error('Forbidden');

      await expect(
        prepareEmbeddingJob(
          options({ s3OutputPath: 's3://bucket/out.jsonl', quitIfS3OutputExists: true }),
          deps()
        )
      ).rejects.toThrow(RemoteProbeError);
    });
  });

  describe('runEmbeddingJob', () => {
    it('should filter, embed and write in one pass', async () => {
      const d = deps();

      const result = await runEmbeddingJob(options(), d);

      expect(await readFile(join(dir, 'out', 'embeddings.jsonl'), 'utf8')).toBe(EXPECTED_LINE);
      expect(result.recordsWritten).toBe(1);
      expect(result.upload).toBeUndefined();
      expect(result.truncated).toBe(false);
      expect(result.lastTimestamp).toEqual(new Date('2024-01-01T12:00:01Z'));
      expect(result.stats).toEqual({
        char_count_bucket_5k_5000: 1,
        lines_read: 3,
        records_written: 1,
        short_texts: 1,
        skipped_type_page: 1,
        total_time: 0.75,
        valid_texts: 1,
        valid_texts_lg_de: 1,
      });
      expect(d.constructed()).toBe(1);
    });

    it('should read the input from the object store', async () => {
      store.put('bucket', 'in/docs.jsonl.gz', gzipSync(toJsonLines(INPUT_RECORDS)));

      const result = await runEmbeddingJob(
        options({ inputPath: 's3://bucket/in/docs.jsonl.gz' }),
        deps()
      );

      expect(result.recordsWritten).toBe(1);
    });

    it('should never build the backend when no record qualifies', async () => {
      await writeFile(
        join(dir, 'docs.jsonl.gz'),
        gzipSync(toJsonLines([{ id: 'p', tp: 'page', ft: 'y'.repeat(500), lang: 'de' }]))
      );
      const d = deps();

      const result = await runEmbeddingJob(options(), d);

      expect(d.constructed()).toBe(0);
      expect(result.recordsWritten).toBe(0);
      expect(result.lastTimestamp).toBeUndefined();
      expect(await readFile(join(dir, 'out', 'embeddings.jsonl'), 'utf8')).toBe('');
    });

    it('should upload and replace the output with a timestamp marker', async () => {
      const outputPath = join(dir, 'out', 'embeddings.jsonl');

      const result = await runEmbeddingJob(
        options({ s3OutputPath: 's3://bucket/out/embeddings.jsonl', keepTimestampOnly: true }),
        deps()
      );

      expect(result.upload).toEqual({
        status: 'uploaded',
        bucket: 'bucket',
        key: 'out/embeddings.jsonl',
      });
      expect(store.get('bucket', 'out/embeddings.jsonl')?.body.toString('utf8')).toBe(
        EXPECTED_LINE
      );
      expect(result.truncated).toBe(true);
      expect(await readFile(outputPath, 'utf8')).toBe('');
      expect((await stat(outputPath)).mtime.getTime()).toBe(
        new Date('2024-01-01T12:00:01Z').getTime()
      );
    });

    it('should keep the remote object on a second run', async () => {
      const input = options({ s3OutputPath: 's3://bucket/out.jsonl', keepTimestampOnly: true });
      await runEmbeddingJob(input, deps());

      const second = await runEmbeddingJob(input, deps());

      expect(second.upload).toEqual({ status: 'skipped', bucket: 'bucket', key: 'out.jsonl' });
      expect(second.truncated).toBe(true);
      expect(store.puts).toHaveLength(1);
    });

    it('should use the clock for the marker when nothing was embedded', async () => {
      await writeFile(join(dir, 'docs.jsonl.gz'), gzipSync(''));
      const marker = Date.UTC(2024, 5, 1);
      const outputPath = join(dir, 'out', 'embeddings.jsonl');

      const result = await runEmbeddingJob(
        options({ s3OutputPath: 's3://bucket/out.jsonl', keepTimestampOnly: true }),
        { ...deps(), now: createClock(marker) }
      );

      expect(result.truncated).toBe(true);
      expect((await stat(outputPath)).mtime.getTime()).toBe(marker);
    });

    it('should not upload on a dry run', async () => {
      const outputPath = join(dir, 'out', 'embeddings.jsonl');

      const result = await runEmbeddingJob(
        options({
          s3OutputPath: 's3://bucket/out.jsonl',
          s3OutputDryRun: true,
          keepTimestampOnly: true,
        }),
        deps()
      );

      expect(result.upload).toBeUndefined();
      expect(result.truncated).toBe(false);
      expect(store.puts).toHaveLength(0);
      expect(await readFile(outputPath, 'utf8')).toBe(EXPECTED_LINE);
    });

    it('should keep the local output when the upload fails', async () => {
      store.failPut = new Error('SlowDown');
      const outputPath = join(dir, 'out', 'embeddings.jsonl');

      const result = await runEmbeddingJob(
        options({ s3OutputPath: 's3://bucket/out.jsonl', keepTimestampOnly: true }),
        deps()
      );

      expect(result.upload).toMatchObject({ status: 'failed', error: { reason: 'remote' } });
      expect(result.truncated).toBe(false);
      expect(await readFile(outputPath, 'utf8')).toBe(EXPECTED_LINE);
    });

    it('should abort on the first malformed line', async () => {
      await writeFile(
        join(dir, 'docs.jsonl.gz'),
        gzipSync(`${JSON.stringify(INPUT_RECORDS[0])}\n{"id": broken\n`)
      );

      const error = await runEmbeddingJob(options(), deps()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(JsonDecodeError);
      expect(error).toMatchObject({ lineNumber: 2 });
    });

    it('should abort when the input is missing', async () => {
      await expect(
        runEmbeddingJob(options({ inputPath: join(dir, 'missing.jsonl.bz2') }), deps())
      ).rejects.toThrow(SourceUnavailableError);
    });

    it('should leave an existing output untouched when the input is missing', async () => {
      const outputPath = join(dir, 'out', 'embeddings.jsonl');
      await mkdir(join(dir, 'out'));
      await writeFile(outputPath, '{"id":"old"}\n');

      await expect(
        runEmbeddingJob(options({ inputPath: join(dir, 'missing.jsonl.bz2') }), deps())
      ).rejects.toThrow(SourceUnavailableError);

      expect(await readFile(outputPath, 'utf8')).toBe('{"id":"old"}\n');
    });

    it('should not create the output when the input is missing', async () => {
      const input = options({ inputPath: join(dir, 'missing.jsonl.bz2'), noOverwrite: true });

      await expect(runEmbeddingJob(input, deps())).rejects.toThrow(SourceUnavailableError);

      expect(existsSync(join(dir, 'out', 'embeddings.jsonl'))).toBe(false);
      expect(await prepareEmbeddingJob(input, deps())).toEqual({ status: 'ready', options: input });
    });

    it('should account for every line read', async () => {
      await writeFile(
        join(dir, 'docs.jsonl.gz'),
        gzipSync(
          toJsonLines([
            { id: 'm1', tp: 'ar', ft: 'x'.repeat(500), lang: 'de' },
            { id: 'm2', tp: 'ar', ft: 'a'.repeat(450), lang: 'fr' },
            { id: 'm3', tp: 'page', ft: 'y'.repeat(500), lang: 'de' },
            { id: 'm4', tp: 'ad', ft: 'z'.repeat(500), lang: 'de' },
            { id: 'm5', tp: 'ar', ft: 'short', lang: 'de' },
            { id: 'm6', tp: 'ar', ft: '', lang: 'de' },
            { id: 'm7', ft: 'w'.repeat(500), lang: 'de' },
          ])
        )
      );

      const { stats, recordsWritten } = await runEmbeddingJob(options(), deps());

      const skipped = Object.entries(stats)
        .filter(([key]) => key.startsWith(SKIPPED_TYPE_PREFIX))
        .reduce((sum, [, value]) => sum + value, 0);
      expect(stats['lines_read']).toBe(7);
      expect(stats['valid_texts']).toBe(2);
      expect(stats['short_texts']).toBe(2);
      expect(stats['skipped_type_page']).toBe(1);
      expect(stats['skipped_type_ad']).toBe(1);
      expect(stats['skipped_type_null']).toBe(1);
      expect(skipped).toBe(3);
      expect((stats['valid_texts'] ?? 0) + (stats['short_texts'] ?? 0) + skipped).toBe(
        stats['lines_read']
      );
      expect(recordsWritten).toBe(2);
      expect(stats['records_written']).toBe(2);
    });

    it('should require a store for the upload', async () => {
      await expect(
        runEmbeddingJob(options({ s3OutputPath: 's3://bucket/out.jsonl' }), {
          ...deps(),
          store: undefined,
        })
      ).rejects.toThrow(ConfigurationError);
    });

    it('should include text and normalize when asked', async () => {
      await runEmbeddingJob(options({ includeText: true, normalizeEmbeddings: true }), deps());

      const [line] = (await readFile(join(dir, 'out', 'embeddings.jsonl'), 'utf8')).split('\n');
      expect(JSON.parse(line ?? '')).toEqual({
        id: 'a1',
        ts: '2024-01-01T12:00:01Z',
        embedder: 'fake-model@main',
        len: 500,
        text: 'x'.repeat(500),
        embedding: [1, 0, 0.00025],
      });
    });
  });
});
