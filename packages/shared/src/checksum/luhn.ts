/**
 * Luhn (mod 10) checksum used by payment card numbers.
 *
 * @module @brdocs/shared/checksum
 */

import { toDigitArray } from '../digits/sanitize.js';

/**
 * Luhn sum modulo 10 of a digit string. Every second digit from the right,
 * starting with the one before the last, is doubled and its digits summed.
 */
export function luhnChecksum(digits: string): number {
  let total = 0;
  const values = toDigitArray(digits).reverse();
  values.forEach((value, i) => {
    if (i % 2 === 1) {
      const doubled = value * 2;
      total += doubled > 9 ? doubled - 9 : doubled;
    } else {
      total += value;
    }
  });
  return total % 10;
}

/**
 * True when `digits` is a non-empty digit string with a Luhn sum of 0.
 *
 * @example
 * ```typescript
 * isLuhnValid('4111111111111111') // true
 * isLuhnValid('4111111111111112') // false
 * ```
 */
export function isLuhnValid(digits: string): boolean {
  if (!/^\d+$/.test(digits)) {
    return false;
  }
  return luhnChecksum(digits) === 0;
}

/**
 * Digit that completes `partial` into a Luhn-valid number.
 *
 * @example
 * ```typescript
 * luhnCheckDigit('411111111111111') // 1
 * ```
 */
export function luhnCheckDigit(partial: string): number {
  const checksum = luhnChecksum(`${partial}0`);
  return checksum === 0 ? 0 : 10 - checksum;
}
