/**
 * Check-digit engine tests
 */

import { describe, it, expect } from 'vitest';
import {
  weightedSum,
  mod11CheckDigit,
  descendingWeights,
  appendMod11Digits,
  hasValidMod11Digits,
} from './mod11.js';
import { luhnChecksum, isLuhnValid, luhnCheckDigit } from './luhn.js';

const CPF_TABLES = [descendingWeights(10, 9), descendingWeights(11, 10)];

describe('mod11', () => {
  it('should build descending weight tables', () => {
    expect(descendingWeights(10, 9)).toEqual([10, 9, 8, 7, 6, 5, 4, 3, 2]);
    expect(descendingWeights(3, 2)).toEqual([3, 2]);
  });

  it('should compute weighted sums over the weights', () => {
    expect(weightedSum([1, 2, 3], [3, 2, 1])).toBe(10);
    expect(weightedSum([1], [5, 4])).toBe(5);
  });

  it('should map remainders 0 and 1 to zero', () => {
    // 1*10 + 2*9 + ... + 9*2 = 210, 210 % 11 = 1
    expect(mod11CheckDigit([1, 2, 3, 4, 5, 6, 7, 8, 9], descendingWeights(10, 9))).toBe(0);
    // 11 % 11 = 0
    expect(mod11CheckDigit([1, 1], [10, 1])).toBe(0);
  });

  it('should return 11 - remainder otherwise', () => {
    // 2 * 2 = 4, 11 - 4 = 7
    expect(mod11CheckDigit([2], [2])).toBe(7);
  });

  it('should append one digit per weight table', () => {
    expect(appendMod11Digits([1, 2, 3, 4, 5, 6, 7, 8, 9], CPF_TABLES)).toEqual([
      1, 2, 3, 4, 5, 6, 7, 8, 9, 0, 9,
    ]);
  });

  it('should verify trailing check digits', () => {
    expect(hasValidMod11Digits('12345678909', CPF_TABLES)).toBe(true);
    expect(hasValidMod11Digits('12345678908', CPF_TABLES)).toBe(false);
    expect(hasValidMod11Digits('12345678919', CPF_TABLES)).toBe(false);
  });

  it('should reject non-digit or too short input', () => {
    expect(hasValidMod11Digits('1234567890a', CPF_TABLES)).toBe(false);
    expect(hasValidMod11Digits('09', CPF_TABLES)).toBe(false);
    expect(hasValidMod11Digits('', CPF_TABLES)).toBe(false);
  });
});

describe('luhn', () => {
  it('should accept the classic test number', () => {
    expect(isLuhnValid('4111111111111111')).toBe(true);
    expect(luhnChecksum('4111111111111111')).toBe(0);
  });

  it('should reject single-digit mutations', () => {
    const valid = '4111111111111111';
    for (let i = 0; i < valid.length; i++) {
      const original = Number(valid[i]);
      const mutated = `${valid.slice(0, i)}${(original + 1) % 10}${valid.slice(i + 1)}`;
      expect(isLuhnValid(mutated)).toBe(false);
    }
  });

  it('should compute the completing digit', () => {
    expect(luhnCheckDigit('411111111111111')).toBe(1);
    expect(luhnCheckDigit('7992739871')).toBe(3);
    expect(isLuhnValid('79927398713')).toBe(true);
  });

  it('should reject empty and non-digit input', () => {
    expect(isLuhnValid('')).toBe(false);
    expect(isLuhnValid('4111 1111 1111 1111')).toBe(false);
  });
});
