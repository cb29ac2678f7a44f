/**
 * CEP (postal code).
 *
 * @module @brdocs/documents/cep
 */

export {
  CEP_LENGTH,
  validateCep,
  formatCep,
  getCepState,
  getCepRanges,
  generateCep,
  type CepGenerateOptions,
} from './cep.js';
export type { CepRange } from '../data/tables.js';
