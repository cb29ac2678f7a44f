import type { DocumentKind, BrazilianRegion, BrazilianState } from '../document/kinds.js';
import type { CardBrand, PhoneType, PlateVariant, VoterIdState } from '../document/info.js';

/**
 * Type-specific attributes attached to a detection
 */
export interface DocumentDetailsMap {
  cpf: { originRegion: string | undefined };
  cnh: Record<string, never>;
  pis: Record<string, never>;
  cnpj: { headquarters: boolean; branchNumber: number };
  'voter-id': { state: VoterIdState | undefined };
  cep: { state: BrazilianState | undefined };
  phone: {
    ddd: string;
    state: BrazilianState | undefined;
    region: BrazilianRegion | undefined;
    type: PhoneType;
  };
  card: { brand: CardBrand | undefined };
  plate: { variant: PlateVariant };
}

/**
 * A value that matched the shape and check digits of a document kind
 */
export interface DetectedDocument<K extends DocumentKind = DocumentKind> {
  type: K;
  valid: true;
  /** Raw input as received */
  input: string;
  /** Canonical form (digits only, or uppercase alphanumerics for plates) */
  normalized: string;
  /** Canonical punctuation applied */
  formatted: string;
  details: DocumentDetailsMap[K];
}

/**
 * No candidate validated the input
 */
export interface UnknownDocument {
  type: 'unknown';
  valid: false;
  input: string;
  /** Kinds whose shape matched but whose validation failed */
  candidates: DocumentKind[];
}

/**
 * Result of the type-sniffing dispatcher.
 * Narrow on `type` to get the matching `details`.
 */
export type DetectionResult = { [K in DocumentKind]: DetectedDocument<K> }[DocumentKind] | UnknownDocument;

/**
 * Pre-computed views of the raw input shared by every handler
 */
export interface DetectionInput {
  raw: string;
  /** Non-digits removed */
  digits: string;
  /** Uppercased, non-alphanumerics removed */
  alphanumeric: string;
}

/**
 * Settings that influence how handlers read the input
 */
export interface DetectionContext {
  /** Accept and drop a leading `55` country code on phone numbers */
  stripCountryCode: boolean;
}
