/**
 * Embedding backends
 *
 * The pipeline sees an embedding model only as an {@link EmbeddingBackend}:
 * a text goes in, a vector comes out. Backends are built through an
 * {@link EmbeddingBackendFactory} so that the (possibly expensive)
 * construction can be deferred until the first text that needs it.
 *
 * {@link HttpEmbeddingBackend} talks to a text-embeddings-inference style
 * server that hosts the model:
 * - `GET /info` once, when the backend is constructed
 * - `POST /embed` with `{ inputs: [text] }` per text
 */

import { z } from 'zod';
import { EmbeddingBackendError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { DEFAULT_EMBEDDING_TIMEOUT_MS } from '../lib/constants.js';

const getLog = () => createLogger('embeddings:backend');

/** Text to vector function */
export interface EmbeddingBackend {
  /** `<model-name>@<revision>` of the model that produces the vectors */
  readonly name: string;
  /** Embed a single text. Must be deterministic for a given text. */
  embed(text: string): Promise<number[]>;
}

/** Deferred backend construction */
export type EmbeddingBackendFactory = () => Promise<EmbeddingBackend>;

/** `<model-name>@<revision>` */
export function embedderName(modelName: string, modelRevision: string): string {
  return `${modelName}@${modelRevision}`;
}

/** Configuration for {@link HttpEmbeddingBackend} */
export interface HttpEmbeddingBackendConfig {
  /** Base URL of the embedding server */
  baseUrl: string;
  /** Model the server is expected to host */
  modelName: string;
  /** Model revision (commit hash or branch) */
  modelRevision: string;
  /** Request timeout in ms (default: 120000) */
  timeout?: number | undefined;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch | undefined;
  /** Optional logger instance for dependency injection (testing) */
  logger?: Logger | undefined;
}

const ServerInfoSchema = z
  .object({
    model_id: z.string(),
    model_sha: z.string().nullish(),
  })
  .passthrough();

const EmbedResponseSchema = z.array(z.array(z.number())).min(1);

/**
 * Backend on an HTTP embedding server
 */
export class HttpEmbeddingBackend implements EmbeddingBackend {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  private constructor(config: HttpEmbeddingBackendConfig) {
    this.name = embedderName(config.modelName, config.modelRevision);
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeout = config.timeout ?? DEFAULT_EMBEDDING_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
  }

  /**
   * Connect to the server and check which model it serves.
   *
   * A model or revision mismatch is logged as a warning; the configured
   * name is still written to the output so runs stay comparable.
   *
   * @throws {EmbeddingBackendError} If the server cannot be reached
   */
  static async connect(config: HttpEmbeddingBackendConfig): Promise<HttpEmbeddingBackend> {
    const log = config.logger ?? getLog();
    const backend = new HttpEmbeddingBackend(config);

    log.info('Loading embedding model', { model: backend.name, url: backend.baseUrl });
    const info = ServerInfoSchema.safeParse(await backend.request('/info', { method: 'GET' }));
    if (!info.success) {
      throw new EmbeddingBackendError(`Unexpected /info response from ${backend.baseUrl}`);
    }

    if (info.data.model_id !== config.modelName) {
      log.warn('Embedding server hosts a different model', {
        expected: config.modelName,
        served: info.data.model_id,
      });
    }
    const sha = info.data.model_sha;
    if (sha && !sha.startsWith(config.modelRevision) && config.modelRevision !== 'main') {
      log.warn('Embedding server hosts a different revision', {
        expected: config.modelRevision,
        served: sha,
      });
    }
    log.info('Model loaded', { model: backend.name });
    return backend;
  }

  async embed(text: string): Promise<number[]> {
    const body = await this.request('/embed', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ inputs: [text], normalize: false, truncate: true }),
    });
    const parsed = EmbedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingBackendError(`Unexpected /embed response from ${this.baseUrl}`);
    }
    const [vector] = parsed.data;
    if (!vector) {
      throw new EmbeddingBackendError('No embedding returned for text');
    }
    return vector;
  }

  private async request(path: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        signal: controller.signal,
      });
      if (!response.ok) {
        const detail = await response.text();
        throw new EmbeddingBackendError(
          `Embedding server error ${response.status} on ${path}: ${detail}`
        );
      }
      return await response.json();
    } catch (error) {
      if (error instanceof EmbeddingBackendError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new EmbeddingBackendError(`Request timeout after ${this.timeout}ms on ${path}`, {
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new EmbeddingBackendError(`Embedding server unreachable at ${this.baseUrl}: ${reason}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Factory that connects an {@link HttpEmbeddingBackend} when called
 */
export function createHttpBackendFactory(config: HttpEmbeddingBackendConfig): EmbeddingBackendFactory {
  return () => HttpEmbeddingBackend.connect(config);
}
