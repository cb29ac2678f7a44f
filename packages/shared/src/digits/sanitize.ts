/**
 * Input sanitizers shared by every document module.
 *
 * @module @brdocs/shared/digits
 */

/**
 * Remove every non-digit character.
 *
 * @example
 * ```typescript
 * onlyDigits('123.456.789-09') // '12345678909'
 * onlyDigits('(11) 91234-5678') // '11912345678'
 * ```
 */
export function onlyDigits(value: string): string {
  if (typeof value !== 'string') {
    return '';
  }
  return value.replace(/\D/g, '');
}

/**
 * Uppercase and remove everything except A-Z and 0-9.
 *
 * @example
 * ```typescript
 * onlyAlphanumeric('abc-1234') // 'ABC1234'
 * ```
 */
export function onlyAlphanumeric(value: string): string {
  if (typeof value !== 'string') {
    return '';
  }
  return value.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * True for a non-empty string made of one repeated digit ('00000000000').
 */
export function isRepeatedDigits(value: string): boolean {
  return /^(\d)\1*$/.test(value);
}

/**
 * Convert a digit string into numbers. Callers sanitize first.
 */
export function toDigitArray(value: string): number[] {
  return Array.from(value, (char) => char.charCodeAt(0) - 48);
}
