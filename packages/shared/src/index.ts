/**
 * @brdocs/shared
 *
 * Shared utilities for brdocs: logging, errors, sanitizers, checksum
 * engines and random sources.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logging/logger.js';
export { createSafeLogger, scrubPii, type SafeLoggerOptions } from './logging/safe-logger.js';
export {
  BrDocsError,
  InvalidArgumentError,
  ConfigurationError,
  DuplicateRegistrationError,
} from './errors/errors.js';

// Sanitizers
export { onlyDigits, onlyAlphanumeric, isRepeatedDigits, toDigitArray } from './digits/sanitize.js';

// Check-digit engines
export {
  weightedSum,
  mod11CheckDigit,
  descendingWeights,
  appendMod11Digits,
  hasValidMod11Digits,
  type WeightTables,
} from './checksum/mod11.js';
export { luhnChecksum, isLuhnValid, luhnCheckDigit } from './checksum/luhn.js';

// Randomness
export {
  defaultRandomSource,
  createSeededRandom,
  createSequenceRandom,
  randomDigits,
  pickOne,
} from './random/random.js';

// Option validation
export { parseOptions } from './options/parse-options.js';
