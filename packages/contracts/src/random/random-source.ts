/**
 * Source of random integers used by the generators.
 * Inject a seeded implementation for reproducible output.
 */
export interface RandomSource {
  /** Uniform integer in `[0, maxExclusive)` */
  nextInt(maxExclusive: number): number;
}

/**
 * Options shared by every generator
 */
export interface RandomOption {
  /**
   * Custom random source.
   * If not provided, uses the cryptographic default.
   */
  random?: RandomSource;
}
