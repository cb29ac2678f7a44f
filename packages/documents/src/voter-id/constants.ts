/**
 * Voter ID (título de eleitor) Constants
 *
 * @module @brdocs/documents/voter-id
 */

import type { VoterIdState } from '@brdocs/contracts';

export const VOTER_ID_LENGTH = 12;

/**
 * Electoral state code (digits 9-10) to federative unit.
 * Code 28 (`ZZ`) is used for voters registered abroad.
 */
export const VOTER_ID_STATE_CODES: Readonly<Record<string, VoterIdState>> = {
  '01': 'SP',
  '02': 'MG',
  '03': 'RJ',
  '04': 'BA',
  '05': 'RS',
  '06': 'PR',
  '07': 'CE',
  '08': 'PE',
  '09': 'SC',
  '10': 'GO',
  '11': 'MA',
  '12': 'PB',
  '13': 'PA',
  '14': 'ES',
  '15': 'PI',
  '16': 'RN',
  '17': 'AL',
  '18': 'MT',
  '19': 'MS',
  '20': 'DF',
  '21': 'SE',
  '22': 'AM',
  '23': 'RO',
  '24': 'AC',
  '25': 'AP',
  '26': 'RR',
  '27': 'TO',
  '28': 'ZZ',
};

/**
 * States whose zero remainder maps to check digit 1 instead of 0
 */
export const VOTER_ID_ZERO_AS_ONE_CODES: ReadonlySet<string> = new Set(['01', '02']);

/** Weights for the first check digit, over the 8-digit sequence */
export const VOTER_ID_SEQUENCE_WEIGHTS = [2, 3, 4, 5, 6, 7, 8, 9] as const;

/** Weights for the second check digit, over state code + first check digit */
export const VOTER_ID_STATE_WEIGHTS = [7, 8, 9] as const;
