import { describe, it, expect, beforeEach } from 'vitest';
import { createSeededRandom } from '@brdocs/shared';
import { run, describeResult, USAGE, EXIT_INVALID, EXIT_USAGE, EXIT_VALID, type CliIo } from './cli.js';

describe('cli', () => {
  let stdout: string[];
  let stderr: string[];
  let io: CliIo;

  beforeEach(() => {
    stdout = [];
    stderr = [];
    io = {
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      env: {},
      random: createSeededRandom(99),
    };
  });

  it('should print the detection result for a valid value', () => {
    expect(run(['123.456.789-09'], io)).toBe(EXIT_VALID);
    expect(stdout).toEqual([
      'Value: 123.456.789-09',
      'Type: cpf',
      'Valid: true',
      'normalized: 12345678909',
      'formatted: 123.456.789-09',
      'originRegion: PR/SC',
    ]);
    expect(stderr).toEqual([]);
  });

  it('should exit with 1 for unrecognised values', () => {
    expect(run(['ABCD123'], io)).toBe(EXIT_INVALID);
    expect(stdout).toEqual(['Value: ABCD123', 'Type: unknown', 'Valid: false', 'candidates: plate']);
  });

  it('should print JSON when asked', () => {
    expect(run(['--json', '01310-100'], io)).toBe(EXIT_VALID);
    expect(JSON.parse(stdout.join('\n'))).toEqual({
      type: 'cep',
      valid: true,
      input: '01310-100',
      normalized: '01310100',
      formatted: '01310-100',
      details: { state: 'SP' },
    });
  });

  it('should print samples and usage without arguments', () => {
    expect(run([], io)).toBe(EXIT_VALID);
    expect(stdout[0]).toBe('Sample values:');
    expect(stdout[1]).toMatch(/^ {2}CPF: {6}\d{3}\.\d{3}\.\d{3}-\d{2}$/);
    expect(stdout[9]).toMatch(/^ {2}Card: {5}4\d{3}( \d{4}){3}$|^ {2}Card: {5}4\d{3}( \d{4}){2} \d$/);
    expect(stdout.slice(-USAGE.length)).toEqual(USAGE);
  });

  it('should print usage for --help', () => {
    expect(run(['--help'], io)).toBe(EXIT_VALID);
    expect(stdout).toEqual(USAGE);
  });

  it('should reject unknown options and extra arguments', () => {
    expect(run(['--verbose', '123'], io)).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe('Unknown option: --verbose');

    stderr.length = 0;
    expect(run(['123', '456'], io)).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe('Expected a single value');
  });

  it('should apply configuration from the environment', () => {
    io.env = { BRDOCS_DISABLED_KINDS: 'cpf' };
    expect(run(['123.456.789-09'], io)).toBe(EXIT_INVALID);
    expect(stdout.at(-1)).toBe('candidates: cnh, pis, phone');
  });

  it('should report invalid environment configuration', () => {
    io.env = { BRDOCS_LOG_LEVEL: 'loud' };
    expect(run(['123.456.789-09'], io)).toBe(EXIT_USAGE);
    expect(stderr).toEqual(["Configuration error: BRDOCS_LOG_LEVEL: unknown log level 'loud'"]);
  });

  it('should log through the scrubbing logger', () => {
    io.env = { BRDOCS_LOG_LEVEL: 'debug' };
    run(['123.456.789-09'], io);
    expect(stderr.length).toBeGreaterThan(0);
    expect(stderr.some((line) => line.includes('123.456.789-09'))).toBe(false);
    expect(stderr.at(-1)).toMatch(/\[INFO\] \[brdocs-cli\] Detection finished \{"type":"cpf","valid":true\}$/);
  });
});

describe('describeResult', () => {
  it('should print missing details as a dash', () => {
    expect(
      describeResult({
        type: 'cep',
        valid: true,
        input: '00000-001',
        normalized: '00000001',
        formatted: '00000-001',
        details: { state: undefined },
      }),
    ).toEqual([
      'Value: 00000-001',
      'Type: cep',
      'Valid: true',
      'normalized: 00000001',
      'formatted: 00000-001',
      'state: -',
    ]);
  });

  it('should print an empty candidate list as a dash', () => {
    expect(describeResult({ type: 'unknown', valid: false, input: 'x', candidates: [] })).toEqual([
      'Value: x',
      'Type: unknown',
      'Valid: false',
      'candidates: -',
    ]);
  });
});
