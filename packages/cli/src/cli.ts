/**
 * `brdocs` command line.
 *
 * brdocs <value>          detect and validate a value
 * brdocs --json <value>   same, printed as JSON
 * brdocs                  print generated samples and usage
 */

import type { DetectionResult, RandomSource } from '@brdocs/contracts';
import {
  generateCard,
  generateCep,
  generateCnh,
  generateCnpj,
  generateCpf,
  generatePhone,
  generatePis,
  generatePlate,
  generateVoterId,
} from '@brdocs/documents';
import { autoDetect, loadConfigFromEnv } from '@brdocs/kernel';
import { BrDocsError, createSafeLogger, defaultRandomSource } from '@brdocs/shared';

export const EXIT_VALID = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

/**
 * Process boundary, injectable for tests
 */
export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Record<string, string | undefined>;
  random?: RandomSource;
}

export const USAGE = [
  'Usage: brdocs [--json] <value>',
  '',
  'Detects CPF, CNH, PIS, CNPJ, voter ID, CEP, phone, card and plate values.',
  'Exit code: 0 valid, 1 not recognised, 2 usage error.',
  '',
  'Environment:',
  '  BRDOCS_DISABLED_KINDS      comma-separated kinds to skip',
  '  BRDOCS_STRIP_COUNTRY_CODE  accept +55 phone numbers (default true)',
  '  BRDOCS_LOG_LEVEL           debug, info, warn or error (default warn)',
];

/**
 * Lines describing a detection result
 */
export function describeResult(result: DetectionResult): string[] {
  const lines = [`Value: ${result.input}`, `Type: ${result.type}`, `Valid: ${result.valid}`];

  if (result.type === 'unknown') {
    lines.push(`candidates: ${result.candidates.length > 0 ? result.candidates.join(', ') : '-'}`);
    return lines;
  }

  lines.push(`normalized: ${result.normalized}`, `formatted: ${result.formatted}`);
  for (const [key, value] of Object.entries(result.details)) {
    lines.push(`${key}: ${value === undefined ? '-' : String(value)}`);
  }
  return lines;
}

function sampleLines(random: RandomSource): string[] {
  const samples: [string, string][] = [
    ['CPF', generateCpf({ random })],
    ['CNPJ', generateCnpj({ random })],
    ['PIS', generatePis({ random })],
    ['Voter ID', generateVoterId({ random })],
    ['CNH', generateCnh({ random })],
    ['CEP', generateCep({ random })],
    ['Phone', generatePhone({ random })],
    ['Plate', generatePlate({ random })],
    ['Card', generateCard({ random })],
  ];
  const width = Math.max(...samples.map(([label]) => label.length));
  return samples.map(([label, value]) => `  ${`${label}:`.padEnd(width + 1)} ${value}`);
}

/**
 * Run the CLI and return its exit code.
 */
export function run(args: readonly string[], io: CliIo): number {
  const json = args.includes('--json');
  const rest = args.filter((arg) => arg !== '--json');

  if (rest.includes('--help') || rest.includes('-h')) {
    USAGE.forEach((line) => io.stdout(line));
    return EXIT_VALID;
  }

  const unknownFlag = rest.find((arg) => arg.startsWith('--'));
  if (unknownFlag !== undefined || rest.length > 1) {
    io.stderr(unknownFlag !== undefined ? `Unknown option: ${unknownFlag}` : 'Expected a single value');
    USAGE.forEach((line) => io.stderr(line));
    return EXIT_USAGE;
  }

  let settings: ReturnType<typeof loadConfigFromEnv>;
  try {
    settings = loadConfigFromEnv(io.env);
  } catch (error) {
    if (error instanceof BrDocsError) {
      io.stderr(`Configuration error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const sink = { debug: io.stderr, info: io.stderr, warn: io.stderr, error: io.stderr };
  const logger = createSafeLogger({ level: settings.logLevel ?? 'warn', prefix: 'brdocs-cli', sink });

  const value = rest[0];
  if (value === undefined) {
    io.stdout('Sample values:');
    sampleLines(io.random ?? defaultRandomSource).forEach((line) => io.stdout(line));
    io.stdout('');
    USAGE.forEach((line) => io.stdout(line));
    return EXIT_VALID;
  }

  const result = autoDetect(value, {
    ...(settings.config !== undefined ? { config: settings.config } : {}),
    logger,
  });

  if (json) {
    io.stdout(JSON.stringify(result, null, 2));
  } else {
    describeResult(result).forEach((line) => io.stdout(line));
  }

  logger.info('Detection finished', { type: result.type, valid: result.valid });
  return result.valid ? EXIT_VALID : EXIT_INVALID;
}
