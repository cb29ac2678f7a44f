/**
 * CNH (driver's license registration number).
 *
 * @module @brdocs/documents/cnh
 */

export {
  CNH_LENGTH,
  CNH_CATEGORIES,
  computeCnhCheckDigits,
  validateCnh,
  isCnhCategory,
  generateCnh,
  type CnhCategory,
  type CnhGenerateOptions,
} from './cnh.js';
