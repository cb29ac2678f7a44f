/**
 * CPF Constants
 *
 * @module @brdocs/documents/cpf
 */

import { descendingWeights, type WeightTables } from '@brdocs/shared';

export const CPF_LENGTH = 11;

/**
 * Weights for the two check digits: 10..2 over the body, then 11..2
 * over the body plus the first check digit.
 */
export const CPF_WEIGHTS: WeightTables = [descendingWeights(10, 9), descendingWeights(11, 10)];

/**
 * Fiscal region of issue, keyed by the 9th digit.
 */
export const CPF_ORIGIN_REGIONS: Readonly<Record<string, string>> = {
  '0': 'RS',
  '1': 'DF/GO/MS/MT/TO',
  '2': 'AC/AM/AP/PA/RO/RR',
  '3': 'CE/MA/PI',
  '4': 'AL/PB/PE/RN',
  '5': 'BA/SE',
  '6': 'MG',
  '7': 'ES/RJ',
  '8': 'SP',
  '9': 'PR/SC',
};
