import { describe, it, expect } from 'vitest';
import { BrDocsError, ConfigurationError, DuplicateRegistrationError, InvalidArgumentError } from './errors.js';

describe('errors', () => {
  it('should serialize code and context', () => {
    const error = new BrDocsError('boom', 'TEST_CODE', { attempt: 1 });
    expect(error).toBeInstanceOf(Error);
    expect(error.toJSON()).toEqual({
      name: 'BrDocsError',
      message: 'boom',
      code: 'TEST_CODE',
      context: { attempt: 1 },
    });
  });

  it('should record the offending argument', () => {
    const error = new InvalidArgumentError('branch', 'branch out of range', { operation: 'generateCnpj' });
    expect(error).toBeInstanceOf(BrDocsError);
    expect(error.name).toBe('InvalidArgumentError');
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.argument).toBe('branch');
    expect(error.context).toEqual({ operation: 'generateCnpj', argument: 'branch' });
  });

  it('should name configuration errors', () => {
    const error = new ConfigurationError('bad level');
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.context).toBeUndefined();
  });

  it('should describe duplicate registrations', () => {
    expect(new DuplicateRegistrationError('cpf', 'kind').message).toBe("Document kind 'cpf' is already registered");
    expect(new DuplicateRegistrationError('placa', 'alias').message).toBe("Alias 'placa' is already registered");
    expect(new DuplicateRegistrationError('cpf', 'kind').code).toBe('DUPLICATE_REGISTRATION');
  });
});
