/**
 * shared/errors.ts — Typed application errors
 *
 * Each error carries the HTTP status and machine code the API responds with.
 * `expose` marks errors whose message is safe to show to the user as-is.
 */
import type { Region } from '../types.ts';

export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;
  readonly expose = true;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No backing file exists for the requested region. */
export class MissingDataError extends AppError {
  readonly status = 404;
  readonly code = 'MISSING_DATA';

  constructor(readonly region: Region, readonly path: string) {
    super(`No dataset available for ${region}.`);
  }
}

/** The active filters left no records for this render cycle. */
export class EmptyResultError extends AppError {
  readonly status = 404;
  readonly code = 'EMPTY_RESULT';

  constructor() {
    super('No investors matched the selected filters.');
  }
}

export class ValidationError extends AppError {
  readonly status = 400;
  readonly code = 'VALIDATION_FAILED';

  constructor(readonly details: string[]) {
    super('Validation failed');
  }
}

export class AuthError extends AppError {
  readonly status = 403;

  constructor(readonly code: 'NO_ADMIN_KEY' | 'AUTH_FAILED', message: string) {
    super(message);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
