/**
 * Run statistics
 *
 * A sparse counter map with dynamically named keys. Content types,
 * languages and length buckets are not known ahead of time, so every key
 * is created on first increment.
 */

import { CHAR_COUNT_BUCKET_WIDTH } from '../lib/constants.js';
import type { Logger } from '../lib/logger.js';

/** Counter names used by the pipeline */
export const STAT_KEYS = {
  validTexts: 'valid_texts',
  shortTexts: 'short_texts',
  totalTime: 'total_time',
  recordsWritten: 'records_written',
  linesRead: 'lines_read',
} as const;

/** Prefix of the per-content-type skip counters */
export const SKIPPED_TYPE_PREFIX = 'skipped_type_';

/** Counter for records skipped because of their content type */
export function skippedTypeKey(tp: string | null): string {
  return `${SKIPPED_TYPE_PREFIX}${tp}`;
}

/** Counter for valid texts of one language */
export function languageKey(lang: string | null): string {
  return `valid_texts_lg_${lang}`;
}

/** Upper bound of the length bucket a text falls into */
export function charCountBucket(length: number): number {
  return Math.ceil(length / CHAR_COUNT_BUCKET_WIDTH) * CHAR_COUNT_BUCKET_WIDTH;
}

/** Counter for the length bucket of a text */
export function charCountBucketKey(length: number): string {
  return `char_count_bucket_5k_${charCountBucket(length)}`;
}

/** Read-only view of the statistics */
export interface StatsView {
  get(key: string): number;
  snapshot(): Readonly<Record<string, number>>;
}

/**
 * Mutable statistics owned by one pipeline run
 */
export class RunStatistics implements StatsView {
  private readonly counters = new Map<string, number>();

  constructor() {
    this.counters.set(STAT_KEYS.validTexts, 0);
    this.counters.set(STAT_KEYS.shortTexts, 0);
    this.counters.set(STAT_KEYS.totalTime, 0);
  }

  /**
   * Add `amount` (default 1) to a counter
   */
  increment(key: string, amount = 1): void {
    this.counters.set(key, (this.counters.get(key) ?? 0) + amount);
  }

  get(key: string): number {
    return this.counters.get(key) ?? 0;
  }

  /** Mean embedding time per valid text in seconds, if any text was embedded */
  averageTime(): number | undefined {
    const valid = this.get(STAT_KEYS.validTexts);
    return valid > 0 ? this.get(STAT_KEYS.totalTime) / valid : undefined;
  }

  /** Copy of all counters with keys in sorted order */
  snapshot(): Readonly<Record<string, number>> {
    const sorted = [...this.counters.keys()].sort();
    return Object.fromEntries(sorted.map((key) => [key, this.get(key)]));
  }

  /**
   * Log every counter on its own line, sorted by name, then the average
   * time per valid text
   */
  logSummary(log: Logger): void {
    for (const [key, value] of Object.entries(this.snapshot())) {
      log.info(`Statistics: ${key}: ${value}`);
    }
    const average = this.averageTime();
    if (average !== undefined) {
      log.info(`Average time per valid text: ${average.toFixed(4)} seconds`);
    }
  }
}
