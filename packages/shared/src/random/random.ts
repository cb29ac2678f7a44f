/**
 * Random sources for the generators, with support for deterministic testing.
 *
 * By default, uses node:crypto randomInt.
 * For reproducible output, pass a seeded RandomSource.
 */

import { randomInt } from 'node:crypto';
import type { RandomSource } from '@brdocs/contracts';

/**
 * Default random source backed by node:crypto.
 */
export const defaultRandomSource: RandomSource = {
  nextInt: (maxExclusive: number) => randomInt(maxExclusive),
};

/**
 * Seeded random source (mulberry32).
 * The same seed always yields the same sequence.
 *
 * @example
 * const random = createSeededRandom(42);
 * generateCpf({ random }) // same value on every run
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    nextInt: (maxExclusive: number) => Math.floor(next() * maxExclusive),
  };
}

/**
 * Random source that replays a fixed list of integers, each reduced modulo
 * the requested bound. Wraps around when exhausted.
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  let index = 0;
  return {
    nextInt: (maxExclusive: number) => {
      const value = values.length === 0 ? 0 : (values[index % values.length] ?? 0);
      index++;
      return value % maxExclusive;
    },
  };
}

/**
 * `count` random decimal digits.
 */
export function randomDigits(random: RandomSource, count: number): number[] {
  return Array.from({ length: count }, () => random.nextInt(10));
}

/**
 * Pick one element of a non-empty list.
 */
export function pickOne<T>(random: RandomSource, items: readonly [T, ...T[]]): T;
export function pickOne<T>(random: RandomSource, items: readonly T[]): T | undefined;
export function pickOne<T>(random: RandomSource, items: readonly T[]): T | undefined {
  return items[random.nextInt(items.length)];
}
