/**
 * Modulo-11 check-digit engine.
 *
 * Shared by CPF, CNPJ and PIS: each check digit is the weighted sum of the
 * preceding digits reduced modulo 11, where remainders 0 and 1 give 0 and any
 * other remainder `r` gives `11 - r`.
 *
 * @module @brdocs/shared/checksum
 */

import { toDigitArray } from '../digits/sanitize.js';

/**
 * A weight table per check digit, in the order the digits are appended.
 * The n-th table must be as long as the body plus the n-1 digits before it.
 */
export type WeightTables = readonly (readonly number[])[];

/**
 * Sum of `digits[i] * weights[i]` over the weights.
 * Missing digits count as zero.
 */
export function weightedSum(digits: readonly number[], weights: readonly number[]): number {
  let total = 0;
  weights.forEach((weight, i) => {
    total += (digits[i] ?? 0) * weight;
  });
  return total;
}

/**
 * Compute one modulo-11 check digit.
 *
 * @example
 * ```typescript
 * mod11CheckDigit([1, 2, 3, 4, 5, 6, 7, 8, 9], descendingWeights(10, 9)) // 0
 * ```
 */
export function mod11CheckDigit(digits: readonly number[], weights: readonly number[]): number {
  const remainder = weightedSum(digits, weights) % 11;
  return remainder < 2 ? 0 : 11 - remainder;
}

/**
 * Weights counting down from `from`, e.g. `descendingWeights(10, 9)` is 10..2.
 */
export function descendingWeights(from: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => from - i);
}

/**
 * Append one check digit per weight table to `body`.
 */
export function appendMod11Digits(body: readonly number[], tables: WeightTables): number[] {
  const digits = [...body];
  for (const weights of tables) {
    digits.push(mod11CheckDigit(digits, weights));
  }
  return digits;
}

/**
 * Check that the trailing `tables.length` digits of `digits` are the
 * modulo-11 check digits of the rest. `digits` must already be sanitized.
 */
export function hasValidMod11Digits(digits: string, tables: WeightTables): boolean {
  const bodyLength = digits.length - tables.length;
  if (bodyLength <= 0 || !/^\d+$/.test(digits)) {
    return false;
  }

  const body = toDigitArray(digits.slice(0, bodyLength));
  return appendMod11Digits(body, tables).join('') === digits;
}
