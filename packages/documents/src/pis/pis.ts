/**
 * PIS/PASEP/NIT validation, formatting and generation.
 *
 * @module @brdocs/documents/pis
 */

import {
  onlyDigits,
  isRepeatedDigits,
  hasValidMod11Digits,
  appendMod11Digits,
  parseOptions,
  randomDigits,
} from '@brdocs/shared';
import type { FormatOption, RandomOption } from '@brdocs/contracts';
import { formatOnlySchema, resolveRandom } from '../common/options.js';
import { PIS_LENGTH, PIS_WEIGHTS } from './constants.js';

/**
 * Validate a PIS/PASEP number (one modulo-11 check digit).
 *
 * @example
 * ```typescript
 * validatePis('120.54413.92-7') // true
 * ```
 */
export function validatePis(pis: string): boolean {
  const digits = onlyDigits(pis);
  if (digits.length !== PIS_LENGTH || isRepeatedDigits(digits)) {
    return false;
  }
  return hasValidMod11Digits(digits, PIS_WEIGHTS);
}

/**
 * Format as `000.00000.00-0`. Input of the wrong length comes back as digits.
 */
export function formatPis(pis: string): string {
  const digits = onlyDigits(pis);
  if (digits.length !== PIS_LENGTH) {
    return digits;
  }
  return `${digits.slice(0, 3)}.${digits.slice(3, 8)}.${digits.slice(8, 10)}-${digits.slice(10)}`;
}

export interface PisGenerateOptions extends FormatOption, RandomOption {}

/**
 * Generate a valid PIS/PASEP number.
 */
export function generatePis(options?: PisGenerateOptions): string {
  const { formatted } = parseOptions(formatOnlySchema, options, 'generatePis');
  const random = resolveRandom(options);

  let digits: string;
  do {
    digits = appendMod11Digits(randomDigits(random, PIS_LENGTH - 1), PIS_WEIGHTS).join('');
  } while (isRepeatedDigits(digits));

  return formatted ? formatPis(digits) : digits;
}
