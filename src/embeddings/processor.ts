/**
 * Record filter and embedder
 *
 * Decides per input record whether it is embedded, embeds it and builds
 * the output record. Records are handled strictly one at a time; the
 * backend is built on the first record that passes the content-type
 * filter and reused for the rest of the run.
 */

import { createLogger, type Logger } from '../lib/logger.js';
import { PROGRESS_LOG_INTERVAL } from '../lib/constants.js';
import type { InputRecord } from '../ingest/types.js';
import type { EmbeddingBackend, EmbeddingBackendFactory } from './backend.js';
import {
  RunStatistics,
  STAT_KEYS,
  charCountBucketKey,
  languageKey,
  skippedTypeKey,
  type StatsView,
} from './stats.js';
import { normalizeVector, roundVector } from './vector.js';
import type { ResultRecord } from './types.js';

/** Options for {@link RecordEmbedder} */
export interface RecordEmbedderOptions {
  /** Builds the backend on first use */
  backendFactory: EmbeddingBackendFactory;
  /** `<model-name>@<revision>` written to every result */
  embedder: string;
  /** Content types that are embedded */
  contentTypes: readonly string[];
  /** Texts of this many characters or fewer are counted as short */
  minCharLength: number;
  /** Scale vectors to unit length before rounding */
  normalize?: boolean | undefined;
  /** Copy the source text into the result */
  includeText?: boolean | undefined;
  /** Clock for result timestamps, in epoch milliseconds (default: Date.now) */
  now?: (() => number) | undefined;
  /** Monotonic timer for embedding durations, in milliseconds (default: performance.now) */
  timer?: (() => number) | undefined;
  /** Statistics to update (default: a new instance) */
  stats?: RunStatistics | undefined;
  logger?: Logger | undefined;
}

/**
 * Count characters the way users see them: one per code point, so a
 * character outside the Basic Multilingual Plane counts once.
 */
export function characterCount(text: string): number {
  let count = 0;
  for (const _char of text) {
    count++;
  }
  return count;
}

/**
 * Format epoch milliseconds as `YYYY-MM-DDTHH:MM:SSZ` (UTC, whole seconds)
 */
export function formatTimestamp(epochMs: number): string {
  return new Date(Math.floor(epochMs / 1000) * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Filters and embeds input records
 */
export class RecordEmbedder {
  private readonly options: RecordEmbedderOptions;
  private readonly allowed: ReadonlySet<string>;
  private readonly statistics: RunStatistics;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly timer: () => number;
  private backend: EmbeddingBackend | null = null;
  private lastTimestampMs: number | undefined;

  constructor(options: RecordEmbedderOptions) {
    this.options = options;
    this.allowed = new Set(options.contentTypes);
    this.statistics = options.stats ?? new RunStatistics();
    this.log = options.logger ?? createLogger('embeddings:processor');
    this.now = options.now ?? Date.now;
    this.timer = options.timer ?? (() => performance.now());
  }

  /** Statistics of this run */
  get stats(): StatsView {
    return this.statistics;
  }

  /**
   * Completion time of the most recent embedding, truncated to whole
   * seconds, or `undefined` if nothing was embedded
   */
  get lastTimestamp(): Date | undefined {
    return this.lastTimestampMs === undefined
      ? undefined
      : new Date(Math.floor(this.lastTimestampMs / 1000) * 1000);
  }

  /**
   * Filter one record and embed it if it qualifies.
   *
   * @returns The result record, or `null` if the record was skipped
   */
  async process(record: InputRecord): Promise<ResultRecord | null> {
    if (record.tp === null || !this.allowed.has(record.tp)) {
      this.statistics.increment(skippedTypeKey(record.tp));
      return null;
    }

    const backend = await this.getBackend();
    this.log.debug('Computing embedding', { id: record.id });

    const text = record.ft;
    const length = characterCount(text);
    if (!text || length <= this.options.minCharLength) {
      this.statistics.increment(STAT_KEYS.shortTexts);
      return null;
    }

    this.statistics.increment(charCountBucketKey(length));
    this.statistics.increment(STAT_KEYS.validTexts);
    this.statistics.increment(languageKey(record.lang));

    const started = this.timer();
    const raw = await backend.embed(text);
    this.statistics.increment(STAT_KEYS.totalTime, (this.timer() - started) / 1000);
    const finished = this.now();
    this.lastTimestampMs = finished;

    const validTexts = this.statistics.get(STAT_KEYS.validTexts);
    if (validTexts % PROGRESS_LOG_INTERVAL === 0) {
      this.log.info(`Processed ${validTexts} valid texts.`);
    }

    const vector = this.options.normalize ? normalizeVector(raw) : raw;
    const result: ResultRecord = {
      id: record.id,
      ts: formatTimestamp(finished),
      embedder: this.options.embedder,
      len: length,
      ...(this.options.includeText ? { text } : {}),
      embedding: roundVector(vector),
    };

    this.log.debug('Computed embedding', { id: record.id });
    return result;
  }

  private async getBackend(): Promise<EmbeddingBackend> {
    if (!this.backend) {
      this.backend = await this.options.backendFactory();
    }
    return this.backend;
  }
}
