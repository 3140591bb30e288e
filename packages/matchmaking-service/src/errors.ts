import { ZodError } from 'zod';

export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

// Well-formed input that breaks a business rule, e.g. a player already on another team.
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class StorageUnavailableError extends AppError {
  constructor(operation: string, cause: unknown) {
    super(`Storage unavailable during ${operation}: ${cause instanceof Error ? cause.message : 'Unknown error'}`, 503, { cause });
  }
}

function validationErrorFrom(error: ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError('Invalid request');
  }
  const path = issue.path.join('.');
  return new ValidationError(path ? `${path}: ${issue.message}` : issue.message);
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof ZodError) return validationErrorFrom(error);
  return new AppError(error instanceof Error ? error.message : 'Unknown error', 500, { cause: error });
}
