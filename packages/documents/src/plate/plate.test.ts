import { describe, it, expect } from 'vitest';
import { createSeededRandom, createSequenceRandom } from '@brdocs/shared';
import {
  getPlateVariant,
  validatePlate,
  isMercosulPlate,
  formatPlate,
  convertToMercosul,
  convertToLegacy,
  generatePlate,
} from './plate.js';

describe('getPlateVariant', () => {
  it('should recognise both layouts', () => {
    expect(getPlateVariant('ABC-1234')).toBe('legacy');
    expect(getPlateVariant('abc1234')).toBe('legacy');
    expect(getPlateVariant('ABC1D23')).toBe('mercosul');
    expect(getPlateVariant('abc 1d23')).toBe('mercosul');
  });

  it('should reject other shapes', () => {
    expect(getPlateVariant('AB12345')).toBeUndefined();
    expect(getPlateVariant('ABC12D3')).toBeUndefined();
    expect(getPlateVariant('ABC123')).toBeUndefined();
    expect(getPlateVariant('1234567')).toBeUndefined();
  });
});

describe('validatePlate / isMercosulPlate', () => {
  it('should validate both layouts', () => {
    expect(validatePlate('ABC-1234')).toBe(true);
    expect(validatePlate('ABC1D23')).toBe(true);
    expect(validatePlate('ABCD123')).toBe(false);
  });

  it('should flag Mercosul plates', () => {
    expect(isMercosulPlate('ABC1D23')).toBe(true);
    expect(isMercosulPlate('ABC-1234')).toBe(false);
  });
});

describe('formatPlate', () => {
  it('should hyphenate legacy plates only', () => {
    expect(formatPlate('abc1234')).toBe('ABC-1234');
    expect(formatPlate('ABC-1234')).toBe('ABC-1234');
    expect(formatPlate('abc1d23')).toBe('ABC1D23');
  });

  it('should return other input normalized', () => {
    expect(formatPlate('ab-12')).toBe('AB12');
  });
});

describe('conversion', () => {
  it('should convert legacy to Mercosul', () => {
    expect(convertToMercosul('ABC-1234')).toBe('ABC1C34');
    expect(convertToMercosul('XYZ9056')).toBe('XYZ9A56');
    expect(convertToMercosul('ABC1D23')).toBe('ABC1D23');
    expect(convertToMercosul('??')).toBeUndefined();
  });

  it('should convert Mercosul back to legacy when possible', () => {
    expect(convertToLegacy('ABC1C34')).toBe('ABC-1234');
    expect(convertToLegacy('XYZ9J56')).toBe('XYZ-9956');
    expect(convertToLegacy('ABC1Z34')).toBeUndefined();
    expect(convertToLegacy('abc1234')).toBe('ABC-1234');
  });
});

describe('generatePlate', () => {
  it('should generate Mercosul plates by default', () => {
    const random = createSeededRandom(17);
    for (let i = 0; i < 50; i++) {
      const plate = generatePlate({ random });
      expect(plate).toMatch(/^[A-Z]{3}\d[A-Z]\d{2}$/);
      expect(isMercosulPlate(plate)).toBe(true);
    }
  });

  it('should generate formatted legacy plates', () => {
    const random = createSeededRandom(18);
    for (let i = 0; i < 50; i++) {
      const plate = generatePlate({ random, mercosul: false });
      expect(plate).toMatch(/^[A-Z]{3}-\d{4}$/);
      expect(getPlateVariant(plate)).toBe('legacy');
    }
  });

  it('should build from the drawn values', () => {
    // letters A B C, digit 1, letter D, digits 2 3
    const random = createSequenceRandom([0, 1, 2, 1, 3, 2, 3]);
    expect(generatePlate({ random })).toBe('ABC1D23');
  });
});
