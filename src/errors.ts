/**
 * Error types for eolint.
 *
 * The analysis engine itself never throws; these cover the outer layers
 * (configuration loading, catalog validation).
 */

export class EolintError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EolintError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors: unreadable config file, invalid JSON, catalog tables
 * that fail schema validation.
 */
export class ConfigError extends EolintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}
