/**
 * Custom error classes for consistent error handling
 */

/**
 * Base error class for all devtree errors
 */
export class DevtreeError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'DevtreeError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Bad branch name, path or config value. Correctable by the caller.
 */
export class ValidationError extends DevtreeError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class AlreadyExistsError extends DevtreeError {
  constructor(message: string, details?: unknown) {
    super(message, 'ALREADY_EXISTS', details);
    this.name = 'AlreadyExistsError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends DevtreeError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} '${id}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, id });
    this.name = 'NotFoundError';
  }
}

/**
 * No free port offset within the attempt cap
 */
export class AllocationExhaustedError extends DevtreeError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(`Failed to allocate port after ${attempts} attempts`, 'ALLOCATION_EXHAUSTED', { attempts });
    this.name = 'AllocationExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * Destructive operation targeted a path outside the worktrees directory.
 * Never overridable.
 */
export class UnsafeLocationError extends DevtreeError {
  public readonly path: string;
  public readonly requiredRoot: string;

  constructor(path: string, requiredRoot: string) {
    super(`Worktree must be inside '${requiredRoot}'. Got: ${path}`, 'UNSAFE_LOCATION', { path, requiredRoot });
    this.name = 'UnsafeLocationError';
    this.path = path;
    this.requiredRoot = requiredRoot;
  }
}

export class CreationFailedError extends DevtreeError {
  constructor(message: string, details?: unknown) {
    super(message, 'CREATION_FAILED', details);
    this.name = 'CreationFailedError';
  }
}

export class DeletionFailedError extends DevtreeError {
  constructor(message: string, details?: unknown) {
    super(message, 'DELETION_FAILED', details);
    this.name = 'DeletionFailedError';
  }
}

/**
 * A required external program is not installed
 */
export class DependencyError extends DevtreeError {
  public readonly binary: string;

  constructor(binary: string) {
    super(`Missing required dependency: ${binary}`, 'MISSING_DEPENDENCY', { binary });
    this.name = 'DependencyError';
    this.binary = binary;
  }
}

export class CancelledError extends DevtreeError {
  constructor(message = 'Cancelled by user') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/**
 * Session error for multiplexer failures during open
 */
export class SessionError extends DevtreeError {
  public readonly sessionName?: string;

  constructor(message: string, options?: { sessionName?: string; details?: unknown }) {
    super(message, 'SESSION_ERROR', options?.details);
    this.name = 'SessionError';
    this.sessionName = options?.sessionName;
  }
}

/**
 * Storage error for registry and lock file issues
 */
export class StorageError extends DevtreeError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

/**
 * Check if an error is a DevtreeError
 */
export function isDevtreeError(error: unknown): error is DevtreeError {
  return error instanceof DevtreeError;
}

/**
 * Wrap an unknown error as a DevtreeError
 */
export function wrapError(error: unknown, defaultMessage = 'An error occurred'): DevtreeError {
  if (error instanceof DevtreeError) return error;
  if (error instanceof Error) {
    return new DevtreeError(error.message, 'UNKNOWN_ERROR', {
      originalName: error.name,
      stack: error.stack
    });
  }
  return new DevtreeError(defaultMessage, 'UNKNOWN_ERROR', { originalError: error });
}

/**
 * Node fs error code, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
