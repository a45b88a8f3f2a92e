/**
 * Decode one JSONL line into an {@link InputRecord}
 */

import { JsonDecodeError } from '../lib/errors.js';
import type { InputRecord } from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Tags are compared and counted as strings; absent tags become `null` */
function toTag(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  return typeof value === 'string' ? value : String(value);
}

/**
 * Parse a line as a JSON object and pick the document fields.
 *
 * Missing fields default to `null` (`id`, `tp`, `lang`) or `''` (`ft`).
 *
 * @throws {JsonDecodeError} If the line is not valid JSON or not an object
 */
export function parseRecordLine(line: string, lineNumber: number): InputRecord {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JsonDecodeError(`Invalid JSON on line ${lineNumber}: ${reason}`, lineNumber, {
      cause: error,
    });
  }

  if (!isPlainObject(value)) {
    throw new JsonDecodeError(`Line ${lineNumber} is not a JSON object`, lineNumber);
  }

  return {
    id: value['id'] ?? null,
    tp: toTag(value['tp']),
    ft: typeof value['ft'] === 'string' ? value['ft'] : '',
    lang: toTag(value['lang']),
  };
}
