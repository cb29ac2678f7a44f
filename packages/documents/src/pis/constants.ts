import type { WeightTables } from '@brdocs/shared';

export const PIS_LENGTH = 11;

export const PIS_WEIGHTS: WeightTables = [[3, 2, 9, 8, 7, 6, 5, 4, 3, 2]];
