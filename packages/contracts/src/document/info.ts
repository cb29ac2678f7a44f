import type { BrazilianRegion, BrazilianState } from './kinds.js';

/**
 * Information derived from a CPF
 */
export interface CpfInfo {
  /** Digits only */
  cpf: string;
  /** `000.000.000-00`, or the digits when the length is wrong */
  formatted: string;
  valid: boolean;
  /**
   * Fiscal region that issued the number, from the 9th digit
   * (e.g. `'SP'`, `'ES/RJ'`). Undefined when fewer than 9 digits.
   */
  originRegion: string | undefined;
}

/**
 * Information derived from a CNPJ
 */
export interface CnpjInfo {
  /** Digits only */
  cnpj: string;
  /** `00.000.000/0000-00`, or the digits when the length is wrong */
  formatted: string;
  valid: boolean;
  /** True when the branch number is 0001 */
  headquarters: boolean | undefined;
  /** Branch number (digits 9-12) */
  branchNumber: number | undefined;
}

/**
 * Phone line type
 */
export type PhoneType = 'mobile' | 'landline';

/**
 * Area code (DDD) lookup entry
 */
export interface AreaCodeInfo {
  ddd: string;
  state: BrazilianState;
  region: BrazilianRegion;
}

/**
 * Information derived from a phone number
 */
export interface PhoneInfo {
  /** Digits only, country code removed */
  phone: string;
  formatted: string;
  valid: boolean;
  ddd: string | undefined;
  state: BrazilianState | undefined;
  region: BrazilianRegion | undefined;
  type: PhoneType | undefined;
}

/**
 * Vehicle plate layout
 */
export type PlateVariant = 'legacy' | 'mercosul';

/**
 * Card brands recognised by issuer prefix, in matching order.
 * Local brands come first: their ranges overlap Visa, Mastercard and Discover.
 */
export const CARD_BRANDS = [
  'elo',
  'hipercard',
  'visa',
  'mastercard',
  'amex',
  'diners',
  'discover',
  'jcb',
] as const;

export type CardBrand = (typeof CARD_BRANDS)[number];

/**
 * Voter ID state code target. `ZZ` marks voters registered abroad.
 */
export type VoterIdState = BrazilianState | 'ZZ';

/**
 * Bank category
 */
export const BANK_TYPES = ['commercial', 'cooperative', 'digital'] as const;

export type BankType = (typeof BANK_TYPES)[number];

/**
 * Bank lookup entry
 */
export interface BankInfo {
  /** Three-digit COMPE code */
  code: string;
  name: string;
  type: BankType;
}
