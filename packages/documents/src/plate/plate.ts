/**
 * Vehicle plates: legacy national layout (AAA0000) and Mercosul (AAA0A00).
 *
 * @module @brdocs/documents/plate
 */

import { z } from 'zod';
import { onlyAlphanumeric, parseOptions, randomDigits } from '@brdocs/shared';
import type { FormatOption, PlateVariant, RandomOption, RandomSource } from '@brdocs/contracts';
import { formattedOption, resolveRandom } from '../common/options.js';

export const PLATE_LENGTH = 7;

export const LEGACY_PLATE_PATTERN = /^[A-Z]{3}\d{4}$/;

export const MERCOSUL_PLATE_PATTERN = /^[A-Z]{3}\d[A-Z]\d{2}$/;

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/** The 5th character maps digit 0-9 to letter A-J on conversion */
const CONVERSION_LETTERS = LETTERS.slice(0, 10);

/**
 * Uppercase alphanumerics only
 */
export function normalizePlate(plate: string): string {
  return onlyAlphanumeric(plate);
}

/**
 * Layout of a plate, or undefined when it matches neither.
 *
 * @example
 * ```typescript
 * getPlateVariant('ABC-1234') // 'legacy'
 * getPlateVariant('abc1d23') // 'mercosul'
 * ```
 */
export function getPlateVariant(plate: string): PlateVariant | undefined {
  const normalized = normalizePlate(plate);
  if (LEGACY_PLATE_PATTERN.test(normalized)) {
    return 'legacy';
  }
  if (MERCOSUL_PLATE_PATTERN.test(normalized)) {
    return 'mercosul';
  }
  return undefined;
}

export function validatePlate(plate: string): boolean {
  return getPlateVariant(plate) !== undefined;
}

export function isMercosulPlate(plate: string): boolean {
  return getPlateVariant(plate) === 'mercosul';
}

/**
 * Format legacy plates as `AAA-0000`; Mercosul plates stay `AAA0A00`.
 * Anything else comes back normalized.
 */
export function formatPlate(plate: string): string {
  const normalized = normalizePlate(plate);
  if (getPlateVariant(normalized) === 'legacy') {
    return `${normalized.slice(0, 3)}-${normalized.slice(3)}`;
  }
  return normalized;
}

/**
 * Convert a legacy plate to its Mercosul equivalent.
 * Mercosul plates are returned unchanged; invalid plates give undefined.
 *
 * @example
 * ```typescript
 * convertToMercosul('ABC-1234') // 'ABC1C34'
 * ```
 */
export function convertToMercosul(plate: string): string | undefined {
  const normalized = normalizePlate(plate);
  const variant = getPlateVariant(normalized);
  if (variant === 'mercosul') {
    return normalized;
  }
  if (variant === undefined) {
    return undefined;
  }
  const letter = CONVERSION_LETTERS[Number(normalized[4])];
  return `${normalized.slice(0, 4)}${letter}${normalized.slice(5)}`;
}

/**
 * Convert a Mercosul plate back to the legacy layout.
 * Only plates whose 5th character is A-J have a legacy equivalent.
 *
 * @example
 * ```typescript
 * convertToLegacy('ABC1C34') // 'ABC-1234'
 * convertToLegacy('ABC1Z34') // undefined
 * ```
 */
export function convertToLegacy(plate: string): string | undefined {
  const normalized = normalizePlate(plate);
  const variant = getPlateVariant(normalized);
  if (variant === 'legacy') {
    return formatPlate(normalized);
  }
  if (variant === undefined) {
    return undefined;
  }
  const index = CONVERSION_LETTERS.indexOf(normalized[4] ?? '');
  if (index < 0) {
    return undefined;
  }
  return formatPlate(`${normalized.slice(0, 4)}${index}${normalized.slice(5)}`);
}

export interface PlateGenerateOptions extends FormatOption, RandomOption {
  /**
   * Generate a Mercosul plate
   * @default true
   */
  mercosul?: boolean;
}

const plateGenerateSchema = z.object({
  formatted: formattedOption,
  mercosul: z.boolean().default(true),
});

function randomLetter(random: RandomSource): string {
  return LETTERS[random.nextInt(LETTERS.length)] ?? 'A';
}

/**
 * Generate a valid plate.
 */
export function generatePlate(options?: PlateGenerateOptions): string {
  const { formatted, mercosul } = parseOptions(plateGenerateSchema, options, 'generatePlate');
  const random = resolveRandom(options);

  const prefix = `${randomLetter(random)}${randomLetter(random)}${randomLetter(random)}`;
  const plate = mercosul
    ? `${prefix}${randomDigits(random, 1).join('')}${randomLetter(random)}${randomDigits(random, 2).join('')}`
    : `${prefix}${randomDigits(random, 4).join('')}`;

  return formatted ? formatPlate(plate) : plate;
}
