/**
 * Tests for the streaming decompression module
 */

import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { gunzipSync, gzipSync } from 'node:zlib';
import {
  createCompressor,
  createDecompressor,
  detectCompressionFromExtension,
} from '../../src/ingest/decompress.js';

// Pipe data through a transform in small chunks and collect the output
async function transform(
  data: Buffer,
  stage: NodeJS.ReadWriteStream,
  chunkSize = 7
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for (let i = 0; i < data.length; i += chunkSize) {
    chunks.push(data.subarray(i, i + chunkSize));
  }
  const output: Buffer[] = [];
  await pipeline(
    Readable.from(chunks),
    stage,
    new Writable({
      write(chunk: Buffer, _encoding, callback) {
        output.push(chunk);
        callback();
      },
    })
  );
  return Buffer.concat(output);
}

describe('createDecompressor', () => {
  it('should decompress gzip data', async () => {
    const original = 'Hello, World! This is a test of gzip compression.';
    const result = await transform(gzipSync(original), createDecompressor('gzip'));
    expect(result.toString('utf8')).toBe(original);
  });

  it('should decompress bzip2 data', async () => {
    const fixture = fileURLToPath(new URL('../fixtures/hello.txt.bz2', import.meta.url));
    const result = await transform(await readFile(fixture), createDecompressor('bzip2'));
    expect(result.toString('utf8')).toBe('hello stamp\n');
  });

  it('should pass data through for none', async () => {
    const result = await transform(Buffer.from('plain text'), createDecompressor('none'));
    expect(result.toString('utf8')).toBe('plain text');
  });

  it('should fail on corrupt gzip data', async () => {
    await expect(
      transform(Buffer.from('definitely not gzip'), createDecompressor('gzip'))
    ).rejects.toThrow();
  });
});

describe('createCompressor', () => {
  it('should produce gzip output', async () => {
    const result = await transform(Buffer.from('{"id":1}\n'), createCompressor('gzip'));
    expect(gunzipSync(result).toString('utf8')).toBe('{"id":1}\n');
  });

  it('should pass data through for none', async () => {
    const result = await transform(Buffer.from('{"id":1}\n'), createCompressor('none'));
    expect(result.toString('utf8')).toBe('{"id":1}\n');
  });
});

describe('detectCompressionFromExtension', () => {
  it('should detect gzip', () => {
    expect(detectCompressionFromExtension('docs.jsonl.gz')).toBe('gzip');
    expect(detectCompressionFromExtension('docs.jsonl.gzip')).toBe('gzip');
  });

  it('should detect bzip2', () => {
    expect(detectCompressionFromExtension('s3://bucket/docs.jsonl.bz2')).toBe('bzip2');
    expect(detectCompressionFromExtension('docs.jsonl.BZ2')).toBe('bzip2');
  });

  it('should fall back to none', () => {
    expect(detectCompressionFromExtension('docs.jsonl')).toBe('none');
    expect(detectCompressionFromExtension('bz2.jsonl')).toBe('none');
  });
});
