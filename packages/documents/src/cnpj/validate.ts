/**
 * CNPJ validation, formatting and info.
 *
 * @module @brdocs/documents/cnpj
 */

import { onlyDigits, isRepeatedDigits, hasValidMod11Digits } from '@brdocs/shared';
import type { CnpjInfo } from '@brdocs/contracts';
import { CNPJ_BASE_LENGTH, CNPJ_HEADQUARTERS_BRANCH, CNPJ_LENGTH, CNPJ_WEIGHTS } from './constants.js';

/**
 * Validate a CNPJ, formatted or not.
 *
 * @example
 * ```typescript
 * validateCnpj('11.222.333/0001-81') // true
 * validateCnpj('11.111.111/1111-11') // false
 * ```
 */
export function validateCnpj(cnpj: string): boolean {
  const digits = onlyDigits(cnpj);
  if (digits.length !== CNPJ_LENGTH || isRepeatedDigits(digits)) {
    return false;
  }
  return hasValidMod11Digits(digits, CNPJ_WEIGHTS);
}

/**
 * Format as `00.000.000/0000-00`. Input of the wrong length comes back as digits.
 */
export function formatCnpj(cnpj: string): string {
  const digits = onlyDigits(cnpj);
  if (digits.length !== CNPJ_LENGTH) {
    return digits;
  }
  return `${digits.slice(0, 2)}.${digits.slice(2, 5)}.${digits.slice(5, 8)}/${digits.slice(8, 12)}-${digits.slice(12)}`;
}

/**
 * Branch number (digits 9-12), or undefined when fewer than 12 digits.
 */
export function getCnpjBranch(cnpj: string): number | undefined {
  const digits = onlyDigits(cnpj);
  if (digits.length < CNPJ_BASE_LENGTH + 4) {
    return undefined;
  }
  return Number(digits.slice(CNPJ_BASE_LENGTH, CNPJ_BASE_LENGTH + 4));
}

/**
 * Describe a CNPJ.
 *
 * @example
 * ```typescript
 * getCnpjInfo('11222333000181')
 * // { cnpj: '11222333000181', formatted: '11.222.333/0001-81', valid: true,
 * //   headquarters: true, branchNumber: 1 }
 * ```
 */
export function getCnpjInfo(cnpj: string): CnpjInfo {
  const digits = onlyDigits(cnpj);
  const branchNumber = getCnpjBranch(digits);
  return {
    cnpj: digits,
    formatted: formatCnpj(digits),
    valid: validateCnpj(digits),
    headquarters: branchNumber === undefined ? undefined : branchNumber === CNPJ_HEADQUARTERS_BRANCH,
    branchNumber,
  };
}
