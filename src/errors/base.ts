// Base error class for all memoforge errors
export class MemoforgeError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'MemoforgeError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends MemoforgeError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends MemoforgeError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for business logic failures
export class ProcessingError extends MemoforgeError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Document or output directory could not be located
export class DocumentNotFoundError extends MemoforgeError {
  constructor(message: string, public readonly searched: string[] = []) {
    super(message, 'DOCUMENT_NOT_FOUND');
    this.name = 'DocumentNotFoundError';
  }
}
