/**
 * CNPJ (Cadastro Nacional da Pessoa Jurídica), the corporate tax ID.
 *
 * @module @brdocs/documents/cnpj
 */

export {
  CNPJ_LENGTH,
  CNPJ_BASE_LENGTH,
  CNPJ_HEADQUARTERS_BRANCH,
  CNPJ_MAX_BRANCH,
  CNPJ_WEIGHTS,
} from './constants.js';
export { validateCnpj, formatCnpj, getCnpjBranch, getCnpjInfo } from './validate.js';
export { generateCnpj, type CnpjGenerateOptions } from './generate.js';
