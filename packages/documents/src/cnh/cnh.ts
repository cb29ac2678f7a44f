/**
 * CNH (Carteira Nacional de Habilitação) validation and generation.
 *
 * The first check digit weighs the 9-digit body 9..1; when its remainder
 * reaches 10 it becomes 0 and a discount of 2 is carried into the second
 * digit, which weighs the body 1..9.
 *
 * @module @brdocs/documents/cnh
 */

import {
  onlyDigits,
  isRepeatedDigits,
  randomDigits,
  toDigitArray,
  weightedSum,
} from '@brdocs/shared';
import type { RandomOption } from '@brdocs/contracts';
import { resolveRandom } from '../common/options.js';

export const CNH_LENGTH = 11;

/**
 * License categories
 */
export const CNH_CATEGORIES = ['A', 'B', 'C', 'D', 'E', 'AB', 'AC', 'AD', 'AE'] as const;

export type CnhCategory = (typeof CNH_CATEGORIES)[number];

const CATEGORY_SET: ReadonlySet<string> = new Set(CNH_CATEGORIES);

const FIRST_WEIGHTS = [9, 8, 7, 6, 5, 4, 3, 2, 1] as const;
const SECOND_WEIGHTS = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

/**
 * Check digits for a 9-digit body.
 *
 * @example
 * ```typescript
 * computeCnhCheckDigits('987654321') // '09'
 * ```
 */
export function computeCnhCheckDigits(body: string): string {
  const digits = toDigitArray(body);

  let discount = 0;
  let first = weightedSum(digits, FIRST_WEIGHTS) % 11;
  if (first >= 10) {
    first = 0;
    discount = 2;
  }

  let second = (weightedSum(digits, SECOND_WEIGHTS) % 11) - discount;
  if (second < 0) {
    second += 11;
  }
  if (second >= 10) {
    second = 0;
  }

  return `${first}${second}`;
}

/**
 * Validate a CNH registration number.
 */
export function validateCnh(cnh: string): boolean {
  const digits = onlyDigits(cnh);
  if (digits.length !== CNH_LENGTH || isRepeatedDigits(digits)) {
    return false;
  }
  return computeCnhCheckDigits(digits.slice(0, 9)) === digits.slice(9);
}

/**
 * Case-insensitive category check
 */
export function isCnhCategory(value: string): boolean {
  return CATEGORY_SET.has(value.trim().toUpperCase());
}

export type CnhGenerateOptions = RandomOption;

/**
 * Generate a valid CNH number (11 digits, no punctuation).
 */
export function generateCnh(options?: CnhGenerateOptions): string {
  const random = resolveRandom(options);

  let digits: string;
  do {
    const body = randomDigits(random, 9).join('');
    digits = `${body}${computeCnhCheckDigits(body)}`;
  } while (isRepeatedDigits(digits));

  return digits;
}
