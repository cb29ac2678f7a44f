/**
 * Document kinds recognised by brdocs.
 *
 * The order of this list is the order in which the dispatcher tries them.
 */
export const DOCUMENT_KINDS = [
  'cpf', // Individual tax ID (Cadastro de Pessoas Físicas)
  'cnh', // Driver's license (Carteira Nacional de Habilitação)
  'pis', // National insurance number (PIS/PASEP/NIT)
  'cnpj', // Corporate tax ID (Cadastro Nacional da Pessoa Jurídica)
  'voter-id', // Título de eleitor
  'cep', // Postal code
  'phone', // Landline or mobile number
  'card', // Payment card number
  'plate', // Vehicle plate
] as const;

/**
 * Document kind type
 */
export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

/**
 * Brazilian federative units (states + federal district).
 */
export const BRAZILIAN_STATES = [
  'AC',
  'AL',
  'AM',
  'AP',
  'BA',
  'CE',
  'DF',
  'ES',
  'GO',
  'MA',
  'MG',
  'MS',
  'MT',
  'PA',
  'PB',
  'PE',
  'PI',
  'PR',
  'RJ',
  'RN',
  'RO',
  'RR',
  'RS',
  'SC',
  'SE',
  'SP',
  'TO',
] as const;

export type BrazilianState = (typeof BRAZILIAN_STATES)[number];

/**
 * Macro-regions used by IBGE.
 */
export const BRAZILIAN_REGIONS = ['Norte', 'Nordeste', 'Centro-Oeste', 'Sudeste', 'Sul'] as const;

export type BrazilianRegion = (typeof BRAZILIAN_REGIONS)[number];

/**
 * Common generator options.
 */
export interface FormatOption {
  /**
   * Apply punctuation to the generated value
   * @default true
   */
  formatted?: boolean;
}
