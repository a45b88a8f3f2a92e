/**
 * Test helpers and utilities
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import type { ObjectInfo, ObjectStore } from '../src/storage/object-store.js';
import type { EmbeddingBackend, EmbeddingBackendFactory } from '../src/embeddings/backend.js';
import type { InputRecord } from '../src/ingest/types.js';

/** One stored object of {@link MemoryObjectStore} */
export interface MemoryObject {
  body: Buffer;
  lastModified: Date;
}

/**
 * In-memory {@link ObjectStore}
 *
 * Objects are kept per `bucket/key`. `failHead` and `failPut` make the
 * next calls reject with the given error.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, MemoryObject>();
  readonly puts: Array<{ bucket: string; key: string; localPath: string }> = [];
  failHead: Error | null = null;
  failPut: Error | null = null;

  private static id(bucket: string, key: string): string {
    return `${bucket}/${key}`;
  }

  put(bucket: string, key: string, body: string | Buffer, lastModified = new Date()): void {
    this.objects.set(MemoryObjectStore.id(bucket, key), {
      body: typeof body === 'string' ? Buffer.from(body, 'utf8') : body,
      lastModified,
    });
  }

  get(bucket: string, key: string): MemoryObject | undefined {
    return this.objects.get(MemoryObjectStore.id(bucket, key));
  }

  async getObjectStream(bucket: string, key: string): Promise<Readable> {
    const object = this.get(bucket, key);
    if (!object) {
      throw Object.assign(new Error('The specified key does not exist.'), { name: 'NoSuchKey' });
    }
    return Readable.from([object.body]);
  }

  async headObject(bucket: string, key: string): Promise<ObjectInfo | null> {
    if (this.failHead) {
      throw this.failHead;
    }
    const object = this.get(bucket, key);
    return object ? { key, lastModified: object.lastModified, size: object.body.length } : null;
  }

  async putFile(bucket: string, key: string, localPath: string): Promise<void> {
    if (this.failPut) {
      throw this.failPut;
    }
    const body = await readFile(localPath);
    this.puts.push({ bucket, key, localPath });
    this.put(bucket, key, body);
  }

  async *listObjects(bucket: string, prefix: string): AsyncGenerator<ObjectInfo, void, unknown> {
    const start = `${bucket}/`;
    const ids = [...this.objects.keys()].filter((id) => id.startsWith(start)).sort();
    for (const id of ids) {
      const key = id.slice(start.length);
      const object = this.objects.get(id);
      if (object && key.startsWith(prefix)) {
        yield { key, lastModified: object.lastModified, size: object.body.length };
      }
    }
  }
}

/**
 * Deterministic backend: the vector for a text is
 * `[length, count of 'a', 0.123456789]`.
 */
export class FakeBackend implements EmbeddingBackend {
  readonly name: string;
  readonly texts: string[] = [];

  constructor(name = 'fake-model@main') {
    this.name = name;
  }

  async embed(text: string): Promise<number[]> {
    this.texts.push(text);
    return [text.length, text.split('a').length - 1, 0.123456789];
  }
}

/**
 * Factory that counts how often a backend was constructed
 */
export function createCountingFactory(backend: EmbeddingBackend = new FakeBackend()): {
  factory: EmbeddingBackendFactory;
  constructed: () => number;
} {
  let count = 0;
  return {
    factory: async () => {
      count++;
      return backend;
    },
    constructed: () => count,
  };
}

/**
 * Build an input record
 */
export function createRecord(overrides: Partial<InputRecord> = {}): InputRecord {
  return {
    id: 'doc-1',
    tp: 'ar',
    ft: 'x'.repeat(500),
    lang: 'de',
    ...overrides,
  };
}

/**
 * Clock returning the given epoch milliseconds in turn, repeating the last
 */
export function createClock(...times: number[]): () => number {
  let index = 0;
  return () => {
    const value = times[Math.min(index, times.length - 1)] ?? 0;
    index++;
    return value;
  };
}

/**
 * Collect all items from an async iterable into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Create a temporary directory; the returned function removes it
 */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'textembed-test-'));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Serialize objects as JSONL
 */
export function toJsonLines(records: readonly unknown[]): string {
  return records.map((record) => JSON.stringify(record)).join('\n') + '\n';
}
