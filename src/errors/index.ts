// Base error class for all factledger errors
export class FactLedgerError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'FactLedgerError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends FactLedgerError {
  constructor(message: string, public override readonly cause?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends FactLedgerError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for business logic failures
export class ProcessingError extends FactLedgerError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Claim extractor failed for a single chunk
export class ExtractorError extends FactLedgerError {
  constructor(
    message: string,
    public readonly chunkId: string,
    public override readonly cause?: unknown
  ) {
    super(message, 'EXTRACTOR_ERROR');
    this.name = 'ExtractorError';
  }
}

// Claim extractor did not answer within its time budget
export class ExtractorTimeoutError extends FactLedgerError {
  constructor(public readonly timeoutMs: number) {
    super(`Claim extraction timed out after ${timeoutMs}ms`, 'EXTRACTOR_TIMEOUT');
    this.name = 'ExtractorTimeoutError';
  }
}

// A person's scan was aborted before it reached a stop state
export class ScanCancelledError extends FactLedgerError {
  constructor(public readonly personName: string) {
    super(`Scan cancelled for ${personName}`, 'SCAN_CANCELLED');
    this.name = 'ScanCancelledError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
