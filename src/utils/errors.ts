/**
 * Event Isolation Pipeline - Error Utilities
 *
 * Standardized error handling across the pipeline stages.
 */

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class PipelineError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
    this.timestamp = Date.now();

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// SPECIFIC ERROR TYPES
// =============================================================================

/**
 * Validation errors
 */
export class ValidationError extends PipelineError {
  public readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, { ...details, field });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Invalid or incomplete configuration
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A persisted record could not be read or parsed
 */
export class RecordReadError extends PipelineError {
  public readonly filePath: string;

  constructor(filePath: string, message: string, originalError?: unknown) {
    super('RECORD_READ_ERROR', `${filePath}: ${message}`, {
      filePath,
      originalMessage: originalError instanceof Error ? originalError.message : undefined,
    });
    this.name = 'RecordReadError';
    this.filePath = filePath;
  }
}

/**
 * Event source failures
 */
export class EventSourceError extends PipelineError {
  public readonly source: string;
  public readonly originalError?: Error;

  constructor(source: string, message: string, originalError?: Error) {
    super('EVENT_SOURCE_ERROR', `${source}: ${message}`, {
      source,
      originalMessage: originalError?.message,
    });
    this.name = 'EventSourceError';
    this.source = source;
    this.originalError = originalError;
  }
}

/**
 * Session directories cannot be created, listed or written
 */
export class StorageError extends PipelineError {
  public readonly path: string;

  constructor(path: string, message: string, originalError?: unknown) {
    super('STORAGE_ERROR', `${path}: ${message}`, {
      path,
      originalMessage: originalError instanceof Error ? originalError.message : undefined,
    });
    this.name = 'StorageError';
    this.path = path;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Check if an error is a PipelineError
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Wrap unknown errors in PipelineError
 */
export function wrapError(error: unknown): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PipelineError('INTERNAL_ERROR', error.message, {
      originalName: error.name,
      stack: error.stack,
    });
  }

  return new PipelineError('INTERNAL_ERROR', String(error));
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * `code` of a Node.js system error (ENOENT, EACCES, ...), if any
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
