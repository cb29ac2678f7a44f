/**
 * Brazilian phone numbers: validation, formatting, area code lookup and
 * generation.
 *
 * @module @brdocs/documents/phone
 */

import { z } from 'zod';
import { onlyDigits, parseOptions, pickOne, randomDigits } from '@brdocs/shared';
import type { AreaCodeInfo, FormatOption, PhoneInfo, PhoneType, RandomOption } from '@brdocs/contracts';
import { formattedOption, resolveRandom } from '../common/options.js';
import { AREA_CODES, AREA_CODE_MAP } from '../data/tables.js';

export const COUNTRY_CODE = '55';

export const LANDLINE_LENGTH = 10;

export const MOBILE_LENGTH = 11;

/** Mobile subscriber numbers start with this digit */
export const MOBILE_PREFIX = '9';

/** First digits used when generating landlines */
export const LANDLINE_PREFIXES = ['2', '3', '4', '5'] as const;

/**
 * Digits only, with a leading `55` country code dropped when more than
 * 11 digits remain.
 *
 * @example
 * ```typescript
 * normalizePhone('+55 (11) 91234-5678') // '11912345678'
 * normalizePhone('+55 (11) 91234-5678', false) // '5511912345678'
 * ```
 */
export function normalizePhone(phone: string, stripCountryCode = true): string {
  const digits = onlyDigits(phone);
  if (stripCountryCode && digits.startsWith(COUNTRY_CODE) && digits.length > MOBILE_LENGTH) {
    return digits.slice(COUNTRY_CODE.length);
  }
  return digits;
}

/**
 * Area code lookup
 *
 * @example
 * ```typescript
 * getAreaCodeInfo('21') // { ddd: '21', state: 'RJ', region: 'Sudeste' }
 * ```
 */
export function getAreaCodeInfo(ddd: string): AreaCodeInfo | undefined {
  return AREA_CODE_MAP.get(onlyDigits(ddd));
}

/**
 * Every valid area code, ascending
 */
export function listAreaCodes(): readonly AreaCodeInfo[] {
  return AREA_CODES;
}

/**
 * Line type of an already normalized number, or undefined when the
 * length or prefix does not fit either type.
 */
function lineType(digits: string): PhoneType | undefined {
  if (digits.length === MOBILE_LENGTH) {
    return digits[2] === MOBILE_PREFIX ? 'mobile' : undefined;
  }
  if (digits.length === LANDLINE_LENGTH) {
    return 'landline';
  }
  return undefined;
}

/**
 * Validate a phone number: 10 digits (landline) or 11 digits with a
 * leading 9 after the area code (mobile), and a known area code.
 */
export function validatePhone(phone: string): boolean {
  const digits = normalizePhone(phone);
  if (lineType(digits) === undefined) {
    return false;
  }
  return AREA_CODE_MAP.has(digits.slice(0, 2));
}

export function isMobilePhone(phone: string): boolean {
  const digits = normalizePhone(phone);
  return digits.length === MOBILE_LENGTH && digits[2] === MOBILE_PREFIX;
}

/**
 * Format as `(00) 00000-0000` (mobile) or `(00) 0000-0000` (landline).
 * Other lengths come back as digits.
 */
export function formatPhone(phone: string): string {
  const digits = normalizePhone(phone);
  if (digits.length === MOBILE_LENGTH) {
    return `(${digits.slice(0, 2)}) ${digits.slice(2, 7)}-${digits.slice(7)}`;
  }
  if (digits.length === LANDLINE_LENGTH) {
    return `(${digits.slice(0, 2)}) ${digits.slice(2, 6)}-${digits.slice(6)}`;
  }
  return digits;
}

/**
 * Describe a phone number.
 *
 * @example
 * ```typescript
 * getPhoneInfo('(11) 91234-5678')
 * // { phone: '11912345678', formatted: '(11) 91234-5678', valid: true,
 * //   ddd: '11', state: 'SP', region: 'Sudeste', type: 'mobile' }
 * ```
 */
export function getPhoneInfo(phone: string): PhoneInfo {
  const digits = normalizePhone(phone);
  const area = digits.length >= 2 ? AREA_CODE_MAP.get(digits.slice(0, 2)) : undefined;
  return {
    phone: digits,
    formatted: formatPhone(digits),
    valid: validatePhone(digits),
    ddd: digits.length >= 2 ? digits.slice(0, 2) : undefined,
    state: area?.state,
    region: area?.region,
    type: lineType(digits),
  };
}

export interface PhoneGenerateOptions extends FormatOption, RandomOption {
  /**
   * Generate a mobile number
   * @default true
   */
  mobile?: boolean;

  /** Area code. Random when omitted. */
  ddd?: string;
}

const phoneGenerateSchema = z.object({
  formatted: formattedOption,
  mobile: z.boolean().default(true),
  ddd: z
    .string()
    .refine((ddd) => AREA_CODE_MAP.has(ddd), { message: 'Unknown area code' })
    .optional(),
});

/**
 * Generate a valid phone number.
 *
 * @throws InvalidArgumentError for an unknown `ddd`
 */
export function generatePhone(options?: PhoneGenerateOptions): string {
  const { formatted, mobile, ddd } = parseOptions(phoneGenerateSchema, options, 'generatePhone');
  const random = resolveRandom(options);

  const areaCode = ddd ?? pickOne(random, AREA_CODES)?.ddd ?? '11';
  const subscriber = mobile
    ? `${MOBILE_PREFIX}${randomDigits(random, 8).join('')}`
    : `${pickOne(random, LANDLINE_PREFIXES)}${randomDigits(random, 7).join('')}`;

  const digits = `${areaCode}${subscriber}`;
  return formatted ? formatPhone(digits) : digits;
}
