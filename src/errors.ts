/**
 * Errors that carry an HTTP status. Anything else reaching the error handler is a 500.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class InputValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INVALID_INPUT');
    this.name = 'InputValidationError';
  }
}

// Thrown at start-up only
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}
