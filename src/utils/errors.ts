/**
 * Application error types
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR'
  | 'DUPLICATE_REGISTRATION';

// Custom error class for application errors
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly isOperational: boolean;

  constructor(message: string, code: ErrorCode, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'VALIDATION_ERROR');
    this.issues = issues;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

export class DuplicateRegistrationError extends AppError {
  constructor(kind: 'agent' | 'task', id: string) {
    const label = kind === 'agent' ? 'Agent' : 'Task';
    super(`${label} ${id} is already registered`, 'DUPLICATE_REGISTRATION');
  }
}

/**
 * Text recorded on a failed task for whatever the executor threw.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
