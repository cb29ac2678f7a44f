/**
 * Built-in document handlers, one per document kind.
 *
 * Each handler pairs a shape test on the pre-computed input views with the
 * validator and formatter from `@brdocs/documents`.
 */

import type { DetectedDocument, DetectionInput, DocumentHandler, DocumentKind } from '@brdocs/contracts';
import {
  CARD_MAX_LENGTH,
  CARD_MIN_LENGTH,
  CEP_LENGTH,
  CNH_LENGTH,
  CNPJ_LENGTH,
  COUNTRY_CODE,
  CPF_LENGTH,
  LANDLINE_LENGTH,
  MOBILE_LENGTH,
  PIS_LENGTH,
  PLATE_LENGTH,
  VOTER_ID_LENGTH,
  formatCard,
  formatCep,
  formatCnpj,
  formatCpf,
  formatPhone,
  formatPis,
  formatPlate,
  formatVoterId,
  getAreaCodeInfo,
  getCardBrand,
  getCepState,
  getCnpjBranch,
  getCpfOriginRegion,
  getPlateVariant,
  getVoterIdState,
  isMobilePhone,
  normalizePhone,
  validateCard,
  validateCep,
  validateCnh,
  validateCnpj,
  validateCpf,
  validatePhone,
  validatePis,
  validateVoterId,
} from '@brdocs/documents';

function detected<K extends DocumentKind>(
  type: K,
  input: DetectionInput,
  normalized: string,
  formatted: string,
  details: DetectedDocument<K>['details'],
): DetectedDocument<K> {
  return { type, valid: true, input: input.raw, normalized, formatted, details };
}

/**
 * Personal documents share the 11-digit shape. A leading `+` marks a phone
 * number with a country code instead.
 */
function isPersonalDocumentShape(input: DetectionInput, length: number): boolean {
  return input.digits.length === length && !input.raw.trimStart().startsWith('+');
}

export const cpfHandler: DocumentHandler<'cpf'> = {
  kind: 'cpf',
  name: 'CPF',
  description: 'Individual taxpayer registry number',
  matches: (input) => isPersonalDocumentShape(input, CPF_LENGTH),
  inspect: (input) =>
    validateCpf(input.digits)
      ? detected('cpf', input, input.digits, formatCpf(input.digits), {
          originRegion: getCpfOriginRegion(input.digits),
        })
      : undefined,
};

export const cnhHandler: DocumentHandler<'cnh'> = {
  kind: 'cnh',
  name: 'CNH',
  description: "Driver's license registration number",
  matches: (input) => isPersonalDocumentShape(input, CNH_LENGTH),
  inspect: (input) =>
    validateCnh(input.digits) ? detected('cnh', input, input.digits, input.digits, {}) : undefined,
};

export const pisHandler: DocumentHandler<'pis'> = {
  kind: 'pis',
  name: 'PIS/PASEP',
  description: 'Social integration program number',
  matches: (input) => isPersonalDocumentShape(input, PIS_LENGTH),
  inspect: (input) =>
    validatePis(input.digits) ? detected('pis', input, input.digits, formatPis(input.digits), {}) : undefined,
};

export const cnpjHandler: DocumentHandler<'cnpj'> = {
  kind: 'cnpj',
  name: 'CNPJ',
  description: 'Corporate taxpayer registry number',
  matches: (input) => input.digits.length === CNPJ_LENGTH,
  inspect: (input) => {
    const branchNumber = getCnpjBranch(input.digits);
    if (!validateCnpj(input.digits) || branchNumber === undefined) {
      return undefined;
    }
    return detected('cnpj', input, input.digits, formatCnpj(input.digits), {
      headquarters: branchNumber === 1,
      branchNumber,
    });
  },
};

export const voterIdHandler: DocumentHandler<'voter-id'> = {
  kind: 'voter-id',
  name: 'Título de eleitor',
  description: 'Voter registration number',
  matches: (input) => input.digits.length === VOTER_ID_LENGTH,
  inspect: (input) =>
    validateVoterId(input.digits)
      ? detected('voter-id', input, input.digits, formatVoterId(input.digits), {
          state: getVoterIdState(input.digits),
        })
      : undefined,
};

export const cepHandler: DocumentHandler<'cep'> = {
  kind: 'cep',
  name: 'CEP',
  description: 'Postal code',
  matches: (input) => input.digits.length === CEP_LENGTH,
  inspect: (input) =>
    validateCep(input.digits)
      ? detected('cep', input, input.digits, formatCep(input.digits), { state: getCepState(input.digits) })
      : undefined,
};

export const phoneHandler: DocumentHandler<'phone'> = {
  kind: 'phone',
  name: 'Telefone',
  description: 'Landline or mobile phone number',
  matches: (input, context) => {
    const { length } = input.digits;
    if (length === LANDLINE_LENGTH || length === MOBILE_LENGTH) {
      return true;
    }
    return (
      context.stripCountryCode &&
      input.digits.startsWith(COUNTRY_CODE) &&
      length >= LANDLINE_LENGTH + COUNTRY_CODE.length &&
      length <= MOBILE_LENGTH + COUNTRY_CODE.length
    );
  },
  inspect: (input, context) => {
    const digits = normalizePhone(input.digits, context.stripCountryCode);
    if (!validatePhone(digits)) {
      return undefined;
    }
    const area = getAreaCodeInfo(digits.slice(0, 2));
    return detected('phone', input, digits, formatPhone(digits), {
      ddd: digits.slice(0, 2),
      state: area?.state,
      region: area?.region,
      type: isMobilePhone(digits) ? 'mobile' : 'landline',
    });
  },
};

export const cardHandler: DocumentHandler<'card'> = {
  kind: 'card',
  name: 'Cartão',
  description: 'Payment card number',
  matches: (input) => input.digits.length >= CARD_MIN_LENGTH && input.digits.length <= CARD_MAX_LENGTH,
  inspect: (input) =>
    validateCard(input.digits)
      ? detected('card', input, input.digits, formatCard(input.digits), { brand: getCardBrand(input.digits) })
      : undefined,
};

export const plateHandler: DocumentHandler<'plate'> = {
  kind: 'plate',
  name: 'Placa',
  description: 'Vehicle plate, legacy or Mercosul',
  matches: (input) => input.alphanumeric.length === PLATE_LENGTH && /[A-Z]/.test(input.alphanumeric),
  inspect: (input) => {
    const variant = getPlateVariant(input.alphanumeric);
    if (variant === undefined) {
      return undefined;
    }
    return detected('plate', input, input.alphanumeric, formatPlate(input.alphanumeric), { variant });
  },
};
