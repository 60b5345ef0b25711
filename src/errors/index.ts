// Base error class for all pyreview errors
export class PyreviewError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'PyreviewError';
  }
}

// Validation error for option and schema validation failures
export class ValidationError extends PyreviewError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends PyreviewError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Input error for a source path the CLI cannot analyze
export class InputError extends PyreviewError {
  constructor(message: string) {
    super(message, 'INPUT_ERROR');
    this.name = 'InputError';
  }
}

// Processing error for failures while writing reports
export class ProcessingError extends PyreviewError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
