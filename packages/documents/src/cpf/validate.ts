/**
 * CPF validation, formatting and info.
 *
 * @module @brdocs/documents/cpf
 */

import { onlyDigits, isRepeatedDigits, hasValidMod11Digits } from '@brdocs/shared';
import type { CpfInfo } from '@brdocs/contracts';
import { CPF_LENGTH, CPF_WEIGHTS, CPF_ORIGIN_REGIONS } from './constants.js';

/**
 * Validate a CPF, formatted or not.
 *
 * @example
 * ```typescript
 * validateCpf('123.456.789-09') // true
 * validateCpf('111.111.111-11') // false (repeated digits)
 * ```
 */
export function validateCpf(cpf: string): boolean {
  const digits = onlyDigits(cpf);
  if (digits.length !== CPF_LENGTH || isRepeatedDigits(digits)) {
    return false;
  }
  return hasValidMod11Digits(digits, CPF_WEIGHTS);
}

/**
 * Format as `000.000.000-00`. Input of the wrong length comes back as digits.
 */
export function formatCpf(cpf: string): string {
  const digits = onlyDigits(cpf);
  if (digits.length !== CPF_LENGTH) {
    return digits;
  }
  return `${digits.slice(0, 3)}.${digits.slice(3, 6)}.${digits.slice(6, 9)}-${digits.slice(9)}`;
}

/**
 * Fiscal region that issued the CPF, from its 9th digit.
 */
export function getCpfOriginRegion(cpf: string): string | undefined {
  const ninth = onlyDigits(cpf)[8];
  return ninth === undefined ? undefined : CPF_ORIGIN_REGIONS[ninth];
}

/**
 * Describe a CPF.
 *
 * @example
 * ```typescript
 * getCpfInfo('12345678909')
 * // { cpf: '12345678909', formatted: '123.456.789-09', valid: true, originRegion: 'PR/SC' }
 * ```
 */
export function getCpfInfo(cpf: string): CpfInfo {
  const digits = onlyDigits(cpf);
  return {
    cpf: digits,
    formatted: formatCpf(digits),
    valid: validateCpf(digits),
    originRegion: getCpfOriginRegion(digits),
  };
}
