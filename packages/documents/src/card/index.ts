/**
 * Payment cards.
 *
 * @module @brdocs/documents/card
 */

export {
  CARD_MIN_LENGTH,
  CARD_MAX_LENGTH,
  CARD_BRAND_PATTERNS,
  CARD_ISSUER_RANGES,
  type CardIssuerRange,
} from './constants.js';
export { validateCard, getCardBrand, formatCard, generateCard, type CardGenerateOptions } from './card.js';
