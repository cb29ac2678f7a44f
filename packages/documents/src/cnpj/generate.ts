import { z } from 'zod';
import { appendMod11Digits, parseOptions, randomDigits, toDigitArray } from '@brdocs/shared';
import type { FormatOption, RandomOption } from '@brdocs/contracts';
import { formattedOption, resolveRandom } from '../common/options.js';
import { CNPJ_BASE_LENGTH, CNPJ_HEADQUARTERS_BRANCH, CNPJ_MAX_BRANCH, CNPJ_WEIGHTS } from './constants.js';
import { formatCnpj } from './validate.js';

export interface CnpjGenerateOptions extends FormatOption, RandomOption {
  /**
   * Branch number, 1 (headquarters) to 9999
   * @default 1
   */
  branch?: number;
}

const cnpjGenerateSchema = z.object({
  formatted: formattedOption,
  branch: z.number().int().min(CNPJ_HEADQUARTERS_BRANCH).max(CNPJ_MAX_BRANCH).default(CNPJ_HEADQUARTERS_BRANCH),
});

/**
 * Generate a valid CNPJ.
 *
 * @throws InvalidArgumentError when `branch` is outside 1..9999
 *
 * @example
 * ```typescript
 * generateCnpj() // e.g. '11.222.333/0001-81'
 * generateCnpj({ branch: 2, formatted: false }) // e.g. '11222333000262'
 * ```
 */
export function generateCnpj(options?: CnpjGenerateOptions): string {
  const { formatted, branch } = parseOptions(cnpjGenerateSchema, options, 'generateCnpj');
  const random = resolveRandom(options);

  const base = randomDigits(random, CNPJ_BASE_LENGTH);
  const branchDigits = toDigitArray(String(branch).padStart(4, '0'));
  const digits = appendMod11Digits([...base, ...branchDigits], CNPJ_WEIGHTS).join('');

  return formatted ? formatCnpj(digits) : digits;
}
