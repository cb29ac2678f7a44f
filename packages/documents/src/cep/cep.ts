/**
 * CEP (Código de Endereçamento Postal) validation, formatting and state lookup.
 *
 * @module @brdocs/documents/cep
 */

import { z } from 'zod';
import { onlyDigits, parseOptions, pickOne } from '@brdocs/shared';
import { BRAZILIAN_STATES, type BrazilianState, type FormatOption, type RandomOption } from '@brdocs/contracts';
import { formattedOption, resolveRandom } from '../common/options.js';
import { CEP_RANGES, type CepRange } from '../data/tables.js';

export const CEP_LENGTH = 8;

/**
 * Validate the shape of a CEP (8 digits).
 *
 * @example
 * ```typescript
 * validateCep('01310-100') // true
 * validateCep('1310-100') // false
 * ```
 */
export function validateCep(cep: string): boolean {
  return onlyDigits(cep).length === CEP_LENGTH;
}

/**
 * Format as `00000-000`. Input of the wrong length comes back as digits.
 */
export function formatCep(cep: string): string {
  const digits = onlyDigits(cep);
  if (digits.length !== CEP_LENGTH) {
    return digits;
  }
  return `${digits.slice(0, 5)}-${digits.slice(5)}`;
}

/**
 * State that owns a CEP.
 * Defined for every CEP from 01000000 to 99999999; undefined below that
 * and for malformed input.
 *
 * @example
 * ```typescript
 * getCepState('01310-100') // 'SP'
 * getCepState('20040-020') // 'RJ'
 * ```
 */
export function getCepState(cep: string): BrazilianState | undefined {
  const digits = onlyDigits(cep);
  if (digits.length !== CEP_LENGTH) {
    return undefined;
  }

  const value = Number(digits);
  return CEP_RANGES.find((range) => value >= range.start && value <= range.end)?.state;
}

/**
 * CEP ranges assigned to a state
 */
export function getCepRanges(state: BrazilianState): CepRange[] {
  return CEP_RANGES.filter((range) => range.state === state);
}

export interface CepGenerateOptions extends FormatOption, RandomOption {
  /** Restrict to this state's ranges. Any state when omitted. */
  state?: BrazilianState;
}

const cepGenerateSchema = z.object({
  formatted: formattedOption,
  state: z.enum(BRAZILIAN_STATES).optional(),
});

/**
 * Generate a CEP inside the ranges of a state.
 *
 * @throws InvalidArgumentError for an unknown `state`
 */
export function generateCep(options?: CepGenerateOptions): string {
  const { formatted, state } = parseOptions(cepGenerateSchema, options, 'generateCep');
  const random = resolveRandom(options);

  const ranges = state === undefined ? CEP_RANGES : getCepRanges(state);
  const range = pickOne(random, ranges) ?? { start: 1000000, end: 1999999 };
  const value = range.start + random.nextInt(range.end - range.start + 1);
  const digits = String(value).padStart(CEP_LENGTH, '0');

  return formatted ? formatCep(digits) : digits;
}
