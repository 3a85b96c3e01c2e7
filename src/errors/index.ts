// Base error class for all claimtrace errors
export class ClaimtraceError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'ClaimtraceError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends ClaimtraceError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends ClaimtraceError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for business logic failures
export class ProcessingError extends ClaimtraceError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// The only fatal condition of a run: nothing to process
export class InputUnavailableError extends ClaimtraceError {
  constructor(message: string) {
    super(message, 'INPUT_UNAVAILABLE');
    this.name = 'InputUnavailableError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
