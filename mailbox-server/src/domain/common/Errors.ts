/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Validation error (400).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * Configuration error (500).
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}

/**
 * Cached folder counts disagree with the stored records (500).
 */
export class InvariantError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'INVARIANT_VIOLATION', message, details);
  }
}
