/**
 * Voter ID validation and formatting.
 *
 * @module @brdocs/documents/voter-id
 */

import { onlyDigits, toDigitArray, weightedSum } from '@brdocs/shared';
import type { VoterIdState } from '@brdocs/contracts';
import {
  VOTER_ID_LENGTH,
  VOTER_ID_SEQUENCE_WEIGHTS,
  VOTER_ID_STATE_CODES,
  VOTER_ID_STATE_WEIGHTS,
  VOTER_ID_ZERO_AS_ONE_CODES,
} from './constants.js';

function checkDigit(sum: number, stateCode: string): number {
  const remainder = sum % 11;
  if (remainder === 0 && VOTER_ID_ZERO_AS_ONE_CODES.has(stateCode)) {
    return 1;
  }
  return remainder <= 1 ? 0 : 11 - remainder;
}

/**
 * Check digits for an 8-digit sequence and a 2-digit state code.
 *
 * @example
 * ```typescript
 * computeVoterIdCheckDigits('10238501', '06') // '44'
 * ```
 */
export function computeVoterIdCheckDigits(sequence: string, stateCode: string): string {
  const first = checkDigit(weightedSum(toDigitArray(sequence), VOTER_ID_SEQUENCE_WEIGHTS), stateCode);
  const second = checkDigit(
    weightedSum([...toDigitArray(stateCode), first], VOTER_ID_STATE_WEIGHTS),
    stateCode,
  );
  return `${first}${second}`;
}

/**
 * Validate a voter ID: 12 digits and both check digits. The state code is not
 * checked against the known list.
 *
 * @example
 * ```typescript
 * validateVoterId('1023 8501 0644') // true
 * ```
 */
export function validateVoterId(voterId: string): boolean {
  const digits = onlyDigits(voterId);
  if (digits.length !== VOTER_ID_LENGTH) {
    return false;
  }

  const stateCode = digits.slice(8, 10);
  return computeVoterIdCheckDigits(digits.slice(0, 8), stateCode) === digits.slice(10);
}

/**
 * Format as `0000 0000 0000`. Input of the wrong length comes back as digits.
 */
export function formatVoterId(voterId: string): string {
  const digits = onlyDigits(voterId);
  if (digits.length !== VOTER_ID_LENGTH) {
    return digits;
  }
  return `${digits.slice(0, 4)} ${digits.slice(4, 8)} ${digits.slice(8)}`;
}

/**
 * State of registration, from digits 9-10. Undefined for an unlisted code.
 */
export function getVoterIdState(voterId: string): VoterIdState | undefined {
  const digits = onlyDigits(voterId);
  if (digits.length < 10) {
    return undefined;
  }
  return VOTER_ID_STATE_CODES[digits.slice(8, 10)];
}
