/**
 * Phone numbers and area codes (DDD).
 *
 * @module @brdocs/documents/phone
 */

export {
  COUNTRY_CODE,
  LANDLINE_LENGTH,
  MOBILE_LENGTH,
  MOBILE_PREFIX,
  LANDLINE_PREFIXES,
  normalizePhone,
  getAreaCodeInfo,
  listAreaCodes,
  validatePhone,
  isMobilePhone,
  formatPhone,
  getPhoneInfo,
  generatePhone,
  type PhoneGenerateOptions,
} from './phone.js';
