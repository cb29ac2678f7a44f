/**
 * CPF (Cadastro de Pessoas Físicas), the individual tax ID.
 *
 * 11 digits, the last two being modulo-11 check digits.
 *
 * @module @brdocs/documents/cpf
 */

export { CPF_LENGTH, CPF_WEIGHTS, CPF_ORIGIN_REGIONS } from './constants.js';
export { validateCpf, formatCpf, getCpfOriginRegion, getCpfInfo } from './validate.js';
export { generateCpf, type CpfGenerateOptions } from './generate.js';
