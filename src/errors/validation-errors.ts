import { ValidationError } from './index';

export class APIResponseError extends ValidationError {
  constructor(message: string, public readonly response: unknown, cause?: unknown) {
    super(`API Response Error: ${message}`, cause);
    this.name = 'APIResponseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, APIResponseError);
    }
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    message: string,
    public readonly schema: string,
    public readonly data: unknown,
    cause?: unknown
  ) {
    super(`Schema Validation Error (${schema}): ${message}`, cause);
    this.name = 'SchemaValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaValidationError);
    }
  }
}
