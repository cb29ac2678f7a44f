import { z } from 'zod';
import { parseOptions, randomDigits, pickOne } from '@brdocs/shared';
import type { FormatOption, RandomOption, VoterIdState } from '@brdocs/contracts';
import { formattedOption, resolveRandom } from '../common/options.js';
import { VOTER_ID_STATE_CODES } from './constants.js';
import { computeVoterIdCheckDigits, formatVoterId } from './validate.js';

export interface VoterIdGenerateOptions extends FormatOption, RandomOption {
  /** State of registration. Random when omitted. */
  state?: VoterIdState;
}

const STATE_TO_CODE = new Map<string, string>(
  Object.entries(VOTER_ID_STATE_CODES).map(([code, state]) => [state, code]),
);

const voterIdGenerateSchema = z.object({
  formatted: formattedOption,
  state: z
    .string()
    .refine((state) => STATE_TO_CODE.has(state), { message: 'Unknown electoral state' })
    .optional(),
});

/**
 * Generate a valid voter ID.
 *
 * @throws InvalidArgumentError for an unknown `state`
 */
export function generateVoterId(options?: VoterIdGenerateOptions): string {
  const { formatted, state } = parseOptions(voterIdGenerateSchema, options, 'generateVoterId');
  const random = resolveRandom(options);

  const stateCode =
    (state === undefined ? undefined : STATE_TO_CODE.get(state)) ??
    pickOne(random, Object.keys(VOTER_ID_STATE_CODES)) ??
    '01';
  const sequence = randomDigits(random, 8).join('');
  const digits = `${sequence}${stateCode}${computeVoterIdCheckDigits(sequence, stateCode)}`;

  return formatted ? formatVoterId(digits) : digits;
}
