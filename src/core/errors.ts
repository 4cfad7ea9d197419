// Domain-specific error types for the check template kit

/**
 * Base error class for all operation-level errors
 */
export abstract class CheckTemplateError extends Error {
  abstract readonly code: string;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid or missing input (blank description, unsupported group, ...)
 */
export class ValidationError extends CheckTemplateError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Unknown template, missing source file
 */
export class NotFoundError extends CheckTemplateError {
  readonly code = 'NOT_FOUND';
}

/**
 * Target check already exists
 */
export class ConflictError extends CheckTemplateError {
  readonly code = 'CONFLICT';
}

/**
 * Filesystem write failures
 */
export class StorageError extends CheckTemplateError {
  readonly code = 'STORAGE_ERROR';
}

/**
 * Registry cannot be loaded (missing file, malformed entry)
 */
export class RegistryError extends CheckTemplateError {
  readonly code = 'REGISTRY_ERROR';
}
