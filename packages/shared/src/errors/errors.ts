/**
 * Base error class for brdocs
 */
export class BrDocsError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BrDocsError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Thrown by generators and lookups given contradictory or out-of-range options
 */
export class InvalidArgumentError extends BrDocsError {
  readonly argument: string;

  constructor(argument: string, message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', { ...context, argument });
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends BrDocsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a document kind or alias is registered twice
 */
export class DuplicateRegistrationError extends BrDocsError {
  readonly key: string;

  constructor(key: string, what: 'kind' | 'alias') {
    super(`${what === 'kind' ? 'Document kind' : 'Alias'} '${key}' is already registered`, 'DUPLICATE_REGISTRATION', {
      key,
      what,
    });
    this.name = 'DuplicateRegistrationError';
    this.key = key;
  }
}
