/**
 * Bank lookup by COMPE code.
 *
 * @module @brdocs/documents/bank
 */

import { onlyDigits } from '@brdocs/shared';
import type { BankInfo } from '@brdocs/contracts';
import { BANKS } from '../data/tables.js';

/**
 * Bank for a COMPE code, zero-padded to three digits.
 *
 * @example
 * ```typescript
 * getBankInfo('1') // { code: '001', name: 'Banco do Brasil', type: 'commercial' }
 * getBankInfo('999') // undefined
 * ```
 */
export function getBankInfo(code: string | number): BankInfo | undefined {
  const digits = onlyDigits(String(code));
  if (digits.length === 0 || digits.length > 3) {
    return undefined;
  }
  return BANKS.get(digits.padStart(3, '0'));
}

/**
 * Every known bank, by code
 */
export function listBanks(): BankInfo[] {
  return [...BANKS.values()].sort((a, b) => a.code.localeCompare(b.code));
}
