/**
 * Payment card numbers: Luhn validation, brand detection, formatting and
 * generation.
 *
 * @module @brdocs/documents/card
 */

import { z } from 'zod';
import { BrDocsError, isLuhnValid, luhnCheckDigit, onlyDigits, parseOptions, pickOne, randomDigits } from '@brdocs/shared';
import { CARD_BRANDS, type CardBrand, type FormatOption, type RandomOption } from '@brdocs/contracts';
import { formattedOption, resolveRandom } from '../common/options.js';
import {
  CARD_BRAND_PATTERNS,
  CARD_GENERATE_MAX_ATTEMPTS,
  CARD_ISSUER_RANGES,
  CARD_MAX_LENGTH,
  CARD_MIN_LENGTH,
} from './constants.js';

/**
 * Validate a card number: 13 to 19 digits with a valid Luhn checksum.
 *
 * @example
 * ```typescript
 * validateCard('4111 1111 1111 1111') // true
 * validateCard('4111 1111 1111 1112') // false
 * ```
 */
export function validateCard(card: string): boolean {
  const digits = onlyDigits(card);
  if (digits.length < CARD_MIN_LENGTH || digits.length > CARD_MAX_LENGTH) {
    return false;
  }
  return isLuhnValid(digits);
}

/**
 * Brand from the issuer prefix and length. The checksum is not checked.
 *
 * @example
 * ```typescript
 * getCardBrand('4111111111111111') // 'visa'
 * getCardBrand('6363681234567894') // 'elo'
 * ```
 */
export function getCardBrand(card: string): CardBrand | undefined {
  const digits = onlyDigits(card);
  return CARD_BRANDS.find((brand) => CARD_BRAND_PATTERNS[brand].test(digits));
}

/**
 * Digits in groups of four separated by spaces.
 */
export function formatCard(card: string): string {
  const digits = onlyDigits(card);
  return digits.match(/\d{1,4}/g)?.join(' ') ?? '';
}

export interface CardGenerateOptions extends FormatOption, RandomOption {
  /**
   * Card brand
   * @default 'visa'
   */
  brand?: CardBrand;
}

const cardGenerateSchema = z.object({
  formatted: formattedOption,
  brand: z.enum(CARD_BRANDS).default('visa'),
});

/**
 * Generate a Luhn-valid card number of the requested brand.
 *
 * @throws InvalidArgumentError when `brand` is not a known brand
 *
 * @example
 * ```typescript
 * generateCard() // e.g. '4532 0151 1283 0366'
 * generateCard({ brand: 'amex', formatted: false }) // e.g. '371449635398431'
 * ```
 */
export function generateCard(options?: CardGenerateOptions): string {
  const { formatted, brand } = parseOptions(cardGenerateSchema, options, 'generateCard');
  const random = resolveRandom(options);

  for (let attempt = 0; attempt < CARD_GENERATE_MAX_ATTEMPTS; attempt++) {
    const range = pickOne(random, CARD_ISSUER_RANGES[brand]);
    const length = pickOne(random, range.lengths);
    const body = range.prefix + randomDigits(random, length - range.prefix.length - 1).join('');
    const digits = `${body}${luhnCheckDigit(body)}`;

    // Broad prefixes such as Visa's '4' also cover Elo ranges
    if (getCardBrand(digits) === brand) {
      return formatted ? formatCard(digits) : digits;
    }
  }

  throw new BrDocsError(`generateCard: no ${brand} number after ${CARD_GENERATE_MAX_ATTEMPTS} attempts`, 'GENERATION_FAILED', {
    brand,
  });
}
