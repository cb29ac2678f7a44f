/**
 * CNPJ Constants
 *
 * @module @brdocs/documents/cnpj
 */

import type { WeightTables } from '@brdocs/shared';

export const CNPJ_LENGTH = 14;

/** Digits 1-8 identify the company, 9-12 the branch */
export const CNPJ_BASE_LENGTH = 8;

export const CNPJ_HEADQUARTERS_BRANCH = 1;

export const CNPJ_MAX_BRANCH = 9999;

export const CNPJ_WEIGHTS: WeightTables = [
  [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2],
  [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2],
];
