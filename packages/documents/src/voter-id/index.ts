/**
 * Voter ID (título de eleitor).
 *
 * 8-digit sequence, 2-digit state code and 2 check digits.
 *
 * @module @brdocs/documents/voter-id
 */

export {
  VOTER_ID_LENGTH,
  VOTER_ID_STATE_CODES,
  VOTER_ID_ZERO_AS_ONE_CODES,
} from './constants.js';
export {
  validateVoterId,
  formatVoterId,
  getVoterIdState,
  computeVoterIdCheckDigits,
} from './validate.js';
export { generateVoterId, type VoterIdGenerateOptions } from './generate.js';
