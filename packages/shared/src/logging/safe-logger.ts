import { createLogger, type Logger, type LoggerOptions } from './logger.js';

/**
 * PII patterns that should be scrubbed from logs.
 * Applied in order: longer and punctuated shapes first.
 */
const PII_PATTERNS: { pattern: RegExp; replacement: string; name: string }[] = [
  // Email addresses
  {
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    replacement: '[EMAIL:REDACTED]',
    name: 'email',
  },
  // CNPJ 00.000.000/0000-00
  {
    pattern: /\b\d{2}\.\d{3}\.\d{3}\/\d{4}-\d{2}\b/g,
    replacement: '[CNPJ:REDACTED]',
    name: 'cnpj',
  },
  // CPF 000.000.000-00
  {
    pattern: /\b\d{3}\.\d{3}\.\d{3}-\d{2}\b/g,
    replacement: '[CPF:REDACTED]',
    name: 'cpf',
  },
  // Bare 14-digit run (CNPJ)
  {
    pattern: /\b\d{14}\b/g,
    replacement: '[CNPJ:REDACTED]',
    name: 'cnpj-digits',
  },
  // Card numbers, 13-19 digits in groups of four
  {
    pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{1,7}\b/g,
    replacement: '[CARD:REDACTED]',
    name: 'card',
  },
  // Bare 11-digit run (CPF, PIS, CNH or mobile)
  {
    pattern: /\b\d{11}\b/g,
    replacement: '[DOCUMENT:REDACTED]',
    name: 'document-digits',
  },
  // Voter ID, bare or 0000 0000 0000
  {
    pattern: /\b\d{4} ?\d{4} ?\d{4}\b/g,
    replacement: '[DOCUMENT:REDACTED]',
    name: 'voter-id',
  },
  // Bare 10-digit run (landline with area code)
  {
    pattern: /\b\d{10}\b/g,
    replacement: '[PHONE:REDACTED]',
    name: 'phone-digits',
  },
  // Phone (11) 91234-5678, optionally +55
  {
    pattern: /(?:\+55\s?)?\(\d{2}\)\s?\d{4,5}-\d{4}/g,
    replacement: '[PHONE:REDACTED]',
    name: 'phone',
  },
  // CEP 00000-000
  {
    pattern: /\b\d{5}-\d{3}\b/g,
    replacement: '[CEP:REDACTED]',
    name: 'cep',
  },
  // Bare 8-digit run (CEP)
  {
    pattern: /\b\d{8}\b/g,
    replacement: '[CEP:REDACTED]',
    name: 'cep-digits',
  },
];

/**
 * Fields that should be completely redacted when found in context.
 * Compared in lowercase.
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'password',
  'secret',
  'token',
  'cpf',
  'cnpj',
  'pis',
  'cnh',
  'rg',
  'phone',
  'telefone',
  'mobile',
  'card',
  'cardnumber',
  'card_number',
  'email',
  'address',
  'cep',
]);

/**
 * Scrub PII from a string value
 *
 * @example
 * ```typescript
 * scrubPii('cliente 123.456.789-09') // 'cliente [CPF:REDACTED]'
 * ```
 */
export function scrubPii(value: string): string {
  let result = value;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/**
 * Recursively scrub PII from an object
 */
function scrubObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_REACHED]';
  }

  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return scrubPii(obj);
  }

  if (typeof obj === 'number' || typeof obj === 'boolean') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => scrubObject(item, depth + 1));
  }

  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_FIELD_NAMES.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = scrubObject(value, depth + 1);
      }
    }
    return result;
  }

  return '[UNSUPPORTED_TYPE]';
}

function scrubContext(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase()) ? '[REDACTED]' : scrubObject(value, 1);
  }
  return result;
}

/**
 * Safe logger options
 */
export interface SafeLoggerOptions extends LoggerOptions {
  /**
   * Whether to enable PII scrubbing
   * @default true
   */
  scrubPii?: boolean;
}

/**
 * Create a logger that scrubs Brazilian documents and contact data
 * (CPF, CNPJ, card numbers, phones, CEP, e-mail) from messages and context.
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ prefix: 'brdocs-cli' });
 * logger.info('detected 123.456.789-09', { cpf: '12345678909' });
 * // ... detected [CPF:REDACTED] {"cpf":"[REDACTED]"}
 * ```
 */
export function createSafeLogger(options: SafeLoggerOptions = {}): Logger {
  const { scrubPii: scrubEnabled = true, ...loggerOptions } = options;
  const baseLogger = createLogger(loggerOptions);

  if (!scrubEnabled) {
    return baseLogger;
  }

  const wrap = (target: Logger): Logger => ({
    debug(message, context) {
      target.debug(scrubPii(message), context && scrubContext(context));
    },
    info(message, context) {
      target.info(scrubPii(message), context && scrubContext(context));
    },
    warn(message, context) {
      target.warn(scrubPii(message), context && scrubContext(context));
    },
    error(message, context) {
      target.error(scrubPii(message), context && scrubContext(context));
    },
    child(context: Record<string, unknown>): Logger {
      return wrap(target.child(scrubContext(context)));
    },
  });

  return wrap(baseLogger);
}
