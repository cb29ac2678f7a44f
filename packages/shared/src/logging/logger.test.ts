import { describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel, type LogSink } from './logger.js';
import { createSafeLogger, scrubPii } from './safe-logger.js';

function createSink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  const push = (line: string) => {
    lines.push(line);
  };
  return { lines, debug: push, info: push, warn: push, error: push };
}

describe('createLogger', () => {
  it('should format level, prefix, message and context', () => {
    const sink = createSink();
    const logger = createLogger({ sink, prefix: 'test' });

    logger.info('hello', { kind: 'cpf' });

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] \[test\] hello \{"kind":"cpf"\}$/);
  });

  it('should filter below the minimum level', () => {
    const sink = createSink();
    const logger = createLogger({ sink, level: 'warn' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(sink.lines).toHaveLength(2);
    expect(sink.lines[0]).toContain('[WARN] [brdocs] w');
    expect(sink.lines[1]).toContain('[ERROR] [brdocs] e');
  });

  it('should merge child context', () => {
    const sink = createSink();
    const logger = createLogger({ sink, context: { a: 1 } }).child({ b: 2 });

    logger.info('msg');

    expect(sink.lines[0]).toMatch(/ msg \{"a":1,"b":2\}$/);
  });

  it('should write to the console by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger().error('boom');
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });

  it('should recognise level names', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('scrubPii', () => {
  it('should redact formatted tax IDs', () => {
    expect(scrubPii('cliente 123.456.789-09')).toBe('cliente [CPF:REDACTED]');
    expect(scrubPii('empresa 11.222.333/0001-81')).toBe('empresa [CNPJ:REDACTED]');
  });

  it('should redact bare digit runs', () => {
    expect(scrubPii('id 12345678909')).toBe('id [DOCUMENT:REDACTED]');
    expect(scrubPii('id 11222333000181')).toBe('id [CNPJ:REDACTED]');
    expect(scrubPii('card 4111 1111 1111 1111')).toBe('card [CARD:REDACTED]');
  });

  it('should redact phones, postal codes and e-mail', () => {
    expect(scrubPii('tel (11) 91234-5678')).toBe('tel [PHONE:REDACTED]');
    expect(scrubPii('cep 01310-100')).toBe('cep [CEP:REDACTED]');
    expect(scrubPii('mail ana@example.com')).toBe('mail [EMAIL:REDACTED]');
  });

  it('should redact unpunctuated voter IDs, landlines and postal codes', () => {
    expect(scrubPii('titulo 102385010644')).toBe('titulo [DOCUMENT:REDACTED]');
    expect(scrubPii('titulo 1023 8501 0644')).toBe('titulo [DOCUMENT:REDACTED]');
    expect(scrubPii('tel 1133334444')).toBe('tel [PHONE:REDACTED]');
    expect(scrubPii('cep 01310100')).toBe('cep [CEP:REDACTED]');
  });

  it('should leave other text alone', () => {
    expect(scrubPii('plate ABC1D23 ok')).toBe('plate ABC1D23 ok');
  });
});

describe('createSafeLogger', () => {
  it('should scrub message and context', () => {
    const sink = createSink();
    const logger = createSafeLogger({ sink });

    logger.info('got 123.456.789-09', { cpf: '12345678909', note: 'tel (21) 3456-7890' });

    expect(sink.lines[0]).toMatch(
      / got \[CPF:REDACTED\] \{"cpf":"\[REDACTED\]","note":"tel \[PHONE:REDACTED\]"\}$/,
    );
  });

  it('should scrub child context', () => {
    const sink = createSink();
    const logger = createSafeLogger({ sink }).child({ phone: '11912345678' });

    logger.warn('x');

    expect(sink.lines[0]).toMatch(/ x \{"phone":"\[REDACTED\]"\}$/);
  });

  it('should pass values through when scrubbing is disabled', () => {
    const sink = createSink();
    createSafeLogger({ sink, scrubPii: false }).info('got 123.456.789-09');

    expect(sink.lines[0]).toMatch(/ got 123\.456\.789-09$/);
  });
});
