import { describe, it, expect, vi } from 'vitest';
import type { DocumentHandler } from '@brdocs/contracts';
import { ConfigurationError, type Logger } from '@brdocs/shared';
import type { DetectorConfigOverrides } from '../config/effective-config.js';
import { autoDetect, toDetectionInput } from './auto-detect.js';
import { createDefaultRegistry } from './default-registry.js';
import { DocumentRegistryImpl } from '../registry/registry.js';
import { cpfHandler } from './handlers.js';

describe('toDetectionInput', () => {
  it('should pre-compute digit and alphanumeric views', () => {
    expect(toDetectionInput('abc-1d23')).toEqual({ raw: 'abc-1d23', digits: '123', alphanumeric: 'ABC1D23' });
  });
});

describe('autoDetect', () => {
  it('should detect a formatted CPF', () => {
    expect(autoDetect('123.456.789-09')).toEqual({
      type: 'cpf',
      valid: true,
      input: '123.456.789-09',
      normalized: '12345678909',
      formatted: '123.456.789-09',
      details: { originRegion: 'PR/SC' },
    });
  });

  it('should fall through to CNH when the CPF check digits fail', () => {
    const result = autoDetect('98765432109');
    expect(result.type).toBe('cnh');
    expect(result.valid).toBe(true);
    if (result.type === 'cnh') {
      expect(result.formatted).toBe('98765432109');
      expect(result.details).toEqual({});
    }
  });

  it('should prefer CNH over PIS when both validate', () => {
    expect(autoDetect('12345678900').type).toBe('cnh');
    expect(autoDetect('02650306461').type).toBe('cnh');
  });

  it('should detect PIS when neither CPF nor CNH validate', () => {
    const result = autoDetect('12054413927');
    expect(result.type).toBe('pis');
    if (result.type === 'pis') {
      expect(result.formatted).toBe('120.54413.92-7');
    }
  });

  it('should detect a CNPJ with branch details', () => {
    const result = autoDetect('11.222.333/0001-81');
    expect(result).toEqual({
      type: 'cnpj',
      valid: true,
      input: '11.222.333/0001-81',
      normalized: '11222333000181',
      formatted: '11.222.333/0001-81',
      details: { headquarters: true, branchNumber: 1 },
    });
    const branch = autoDetect('11222333000262');
    expect(branch.type === 'cnpj' && branch.details).toEqual({ headquarters: false, branchNumber: 2 });
  });

  it('should detect a voter ID with its state', () => {
    const result = autoDetect('102385010644');
    expect(result.type).toBe('voter-id');
    if (result.type === 'voter-id') {
      expect(result.formatted).toBe('1023 8501 0644');
      expect(result.details.state).toBe('PR');
    }
  });

  it('should detect a CEP with its state', () => {
    const result = autoDetect('01310-100');
    expect(result).toEqual({
      type: 'cep',
      valid: true,
      input: '01310-100',
      normalized: '01310100',
      formatted: '01310-100',
      details: { state: 'SP' },
    });
  });

  it('should detect a phone number with country code', () => {
    expect(autoDetect('+55 (11) 91234-5678')).toEqual({
      type: 'phone',
      valid: true,
      input: '+55 (11) 91234-5678',
      normalized: '11912345678',
      formatted: '(11) 91234-5678',
      details: { ddd: '11', state: 'SP', region: 'Sudeste', type: 'mobile' },
    });
  });

  it('should detect a landline', () => {
    const result = autoDetect('(21) 3456-7890');
    expect(result.type === 'phone' && result.details).toEqual({
      ddd: '21',
      state: 'RJ',
      region: 'Sudeste',
      type: 'landline',
    });
  });

  it('should detect a card number with its brand', () => {
    const result = autoDetect('4111 1111 1111 1111');
    expect(result.type).toBe('card');
    if (result.type === 'card') {
      expect(result.formatted).toBe('4111 1111 1111 1111');
      expect(result.details.brand).toBe('visa');
    }
  });

  it('should detect a 14-digit card when the CNPJ check fails', () => {
    const result = autoDetect('36123456789013');
    expect(result.type === 'card' && result.details.brand).toBe('diners');
  });

  it('should detect plates of both layouts', () => {
    const mercosul = autoDetect('ABC1D23');
    expect(mercosul.type).toBe('plate');
    expect(mercosul.valid).toBe(true);
    expect(mercosul.type === 'plate' && mercosul.details.variant).toBe('mercosul');

    const legacy = autoDetect('abc-1234');
    expect(legacy.type === 'plate' && legacy.formatted).toBe('ABC-1234');
    expect(legacy.type === 'plate' && legacy.details.variant).toBe('legacy');
  });

  it('should report the kinds whose shape matched when none validates', () => {
    expect(autoDetect('12345678901')).toEqual({
      type: 'unknown',
      valid: false,
      input: '12345678901',
      candidates: ['cpf', 'cnh', 'pis', 'phone'],
    });
    expect(autoDetect('ABCD123')).toEqual({
      type: 'unknown',
      valid: false,
      input: 'ABCD123',
      candidates: ['plate'],
    });
  });

  it('should return unknown with no candidates for unrecognisable input', () => {
    expect(autoDetect('')).toEqual({ type: 'unknown', valid: false, input: '', candidates: [] });
    expect(autoDetect('hello')).toEqual({ type: 'unknown', valid: false, input: 'hello', candidates: [] });
  });

  it('should treat a leading + as a phone number, not a personal document', () => {
    const result = autoDetect('+1 234 567 8901');
    expect(result).toEqual({ type: 'unknown', valid: false, input: '+1 234 567 8901', candidates: ['phone'] });
  });

  describe('configuration', () => {
    it('should skip disabled kinds', () => {
      expect(autoDetect('123.456.789-09', { config: { disabledKinds: ['cpf'] } })).toEqual({
        type: 'unknown',
        valid: false,
        input: '123.456.789-09',
        candidates: ['cnh', 'pis', 'phone'],
      });
    });

    it('should not accept the country code when stripping is off', () => {
      const result = autoDetect('+55 (11) 91234-5678', { config: { stripCountryCode: false } });
      expect(result).toEqual({
        type: 'unknown',
        valid: false,
        input: '+55 (11) 91234-5678',
        candidates: ['card'],
      });
    });

    it('should reject invalid configuration', () => {
      const config = { disabledKinds: ['rg'] } as unknown as DetectorConfigOverrides;
      expect(() => autoDetect('01310-100', { config })).toThrow(ConfigurationError);
    });
  });

  describe('registry', () => {
    it('should only try the handlers of a custom registry', () => {
      const registry = new DocumentRegistryImpl();
      registry.register(cpfHandler);
      expect(autoDetect('01310-100', { registry }).type).toBe('unknown');
      expect(autoDetect('123.456.789-09', { registry }).type).toBe('cpf');
    });

    it('should skip handlers registered as disabled', () => {
      const registry = new DocumentRegistryImpl();
      registry.register(cpfHandler, { enabled: false });
      expect(autoDetect('123.456.789-09', { registry })).toEqual({
        type: 'unknown',
        valid: false,
        input: '123.456.789-09',
        candidates: [],
      });
    });

    it('should stop detecting an unregistered kind', () => {
      const registry = createDefaultRegistry();
      expect(registry.unregister('cep')).toBe(true);
      expect(autoDetect('01310-100', { registry }).type).toBe('unknown');
    });

    it('should try custom handlers in priority order', () => {
      const alwaysPlate: DocumentHandler<'plate'> = {
        kind: 'plate',
        name: 'Test plate',
        matches: () => true,
        inspect: (input) => ({
          type: 'plate',
          valid: true,
          input: input.raw,
          normalized: input.alphanumeric,
          formatted: input.alphanumeric,
          details: { variant: 'legacy' },
        }),
      };
      const registry = new DocumentRegistryImpl();
      registry.register(cpfHandler, { priority: 20 });
      registry.register(alwaysPlate, { priority: 10 });
      expect(autoDetect('123.456.789-09', { registry }).type).toBe('plate');
    });
  });

  it('should log the matching kind at debug level', () => {
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn(),
    };
    autoDetect('01310-100', { logger });
    expect(logger.debug).toHaveBeenCalledWith('Document detected', { kind: 'cep', tried: ['cep'] });
  });
});
