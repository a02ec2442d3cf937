import type { ZodError } from 'zod';

// ── Error Classes ────────────────────────────────────────────────────────────

export interface ValidationIssue {
  path: string;
  message: string;
}

export class CrmError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'CrmError';
  }
}

export class ValidationError extends CrmError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }

  static fromZod(error: ZodError, message = 'Invalid payload'): ValidationError {
    return new ValidationError(
      message,
      error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  static forField(path: string, message: string): ValidationError {
    return new ValidationError(message, [{ path, message }]);
  }
}

export class NotFoundError extends CrmError {
  constructor(
    public readonly entity: string,
    public readonly id: string
  ) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends CrmError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFLICT', cause);
    this.name = 'ConflictError';
  }
}

export class StorageError extends CrmError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORAGE_ERROR', cause);
    this.name = 'StorageError';
  }
}

/**
 * Collapse validation issues into one line for import report entries.
 */
export function describeIssues(issues: ValidationIssue[]): string {
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
}
