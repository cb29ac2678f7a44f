import { appendMod11Digits, parseOptions, randomDigits } from '@brdocs/shared';
import type { FormatOption, RandomOption } from '@brdocs/contracts';
import { formatOnlySchema, resolveRandom } from '../common/options.js';
import { CPF_LENGTH, CPF_WEIGHTS } from './constants.js';
import { formatCpf } from './validate.js';

export interface CpfGenerateOptions extends FormatOption, RandomOption {}

/**
 * Generate a valid CPF.
 *
 * @example
 * ```typescript
 * generateCpf() // e.g. '529.982.247-25'
 * generateCpf({ formatted: false }) // e.g. '52998224725'
 * ```
 */
export function generateCpf(options?: CpfGenerateOptions): string {
  const { formatted } = parseOptions(formatOnlySchema, options, 'generateCpf');
  const random = resolveRandom(options);

  let body: number[];
  do {
    body = randomDigits(random, CPF_LENGTH - CPF_WEIGHTS.length);
  } while (body.every((digit) => digit === body[0]));

  const digits = appendMod11Digits(body, CPF_WEIGHTS).join('');
  return formatted ? formatCpf(digits) : digits;
}
