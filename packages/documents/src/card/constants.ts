/**
 * Payment card constants
 *
 * @module @brdocs/documents/card
 */

import type { CardBrand } from '@brdocs/contracts';

export const CARD_MIN_LENGTH = 13;

export const CARD_MAX_LENGTH = 19;

/**
 * Brand patterns over the full digit string. Checked in `CARD_BRANDS` order.
 */
export const CARD_BRAND_PATTERNS: Readonly<Record<CardBrand, RegExp>> = {
  elo: /^(?:(?:636368|438935|504175|451416|636297)\d{0,10}|(?:5090|5067|5068|5069|6500|6504|6505|6507|6509|6516|6550)\d{0,12})$/,
  hipercard: /^(?:606282\d{10}(?:\d{3})?|3841\d{15})$/,
  visa: /^4\d{12}(?:\d{3})?$/,
  mastercard: /^5[1-5]\d{14}$/,
  amex: /^3[47]\d{13}$/,
  diners: /^3(?:0[0-5]|[68]\d)\d{11}$/,
  discover: /^6(?:011|5\d{2})\d{12}$/,
  jcb: /^(?:2131|1800|35\d{3})\d{11}$/,
};

/**
 * Issuer prefix with the card lengths it is issued in
 */
export interface CardIssuerRange {
  prefix: string;
  lengths: readonly [number, ...number[]];
}

/**
 * Ranges the generator draws from, per brand
 */
export const CARD_ISSUER_RANGES: Readonly<Record<CardBrand, readonly [CardIssuerRange, ...CardIssuerRange[]]>> = {
  elo: [
    { prefix: '636368', lengths: [16] },
    { prefix: '438935', lengths: [16] },
    { prefix: '504175', lengths: [16] },
    { prefix: '451416', lengths: [16] },
    { prefix: '636297', lengths: [16] },
    { prefix: '5067', lengths: [16] },
    { prefix: '5090', lengths: [16] },
    { prefix: '6500', lengths: [16] },
    { prefix: '6550', lengths: [16] },
  ],
  hipercard: [
    { prefix: '606282', lengths: [16, 19] },
    { prefix: '3841', lengths: [19] },
  ],
  visa: [{ prefix: '4', lengths: [13, 16] }],
  mastercard: [
    { prefix: '51', lengths: [16] },
    { prefix: '52', lengths: [16] },
    { prefix: '53', lengths: [16] },
    { prefix: '54', lengths: [16] },
    { prefix: '55', lengths: [16] },
  ],
  amex: [
    { prefix: '34', lengths: [15] },
    { prefix: '37', lengths: [15] },
  ],
  diners: [
    { prefix: '300', lengths: [14] },
    { prefix: '305', lengths: [14] },
    { prefix: '36', lengths: [14] },
    { prefix: '38', lengths: [14] },
  ],
  discover: [
    { prefix: '6011', lengths: [16] },
    { prefix: '65', lengths: [16] },
  ],
  jcb: [
    { prefix: '35', lengths: [16] },
    { prefix: '2131', lengths: [15] },
    { prefix: '1800', lengths: [15] },
  ],
};

/** Upper bound on redraws when a drawn number lands in another brand's range */
export const CARD_GENERATE_MAX_ATTEMPTS = 100;
