/**
 * Vector helpers for embedding output
 */

import { EMBEDDING_PRECISION } from '../lib/constants.js';

export function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Scale a vector to unit length. A zero vector is returned unchanged.
 */
export function normalizeVector(vector: readonly number[]): number[] {
  const norm = vectorNorm(vector);
  if (norm === 0) {
    return [...vector];
  }
  return vector.map((value) => value / norm);
}

/**
 * Round a number to a fixed count of decimal digits.
 *
 * `toFixed` rounds the exact binary value, so `-0.000004` becomes `-0`,
 * which serializes as `0`.
 */
export function roundTo(value: number, digits: number = EMBEDDING_PRECISION): number {
  return Number(value.toFixed(digits));
}

export function roundVector(vector: readonly number[], digits: number = EMBEDDING_PRECISION): number[] {
  return vector.map((value) => roundTo(value, digits));
}
