// packages/core/src/errors.ts
export type ErrorCode =
  | 'VALIDATION'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'RATE_LIMITED'
  | 'ADAPTER'
  | 'INTERNAL';

export const ERROR_STATUS: Record<ErrorCode, number> = {
  VALIDATION: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  RATE_LIMITED: 429,
  ADAPTER: 502,
  INTERNAL: 500,
};

/** field name -> messages, in the order the rules ran */
export type FieldErrors = Record<string, string[]>;

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly details?: FieldErrors;

  constructor(code: ErrorCode, message: string, details?: FieldErrors) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.status = ERROR_STATUS[code];
    this.details = details;
  }
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError;
}

export const Errors = {
  VALIDATION: (details: FieldErrors) => new AppError('VALIDATION', 'Invalid attributes', details),
  UNAUTHORIZED: (msg = 'authentication required') => new AppError('UNAUTHORIZED', msg),
  FORBIDDEN: (msg = 'not allowed') => new AppError('FORBIDDEN', msg),
  NOT_FOUND: (what: string) => new AppError('NOT_FOUND', `${what} not found`),
  CONFLICT: (msg: string) => new AppError('CONFLICT', msg),
} as const;

export function addError(errors: FieldErrors, field: string, message: string): void {
  (errors[field] ??= []).push(message);
}

export function hasErrors(errors: FieldErrors): boolean {
  return Object.keys(errors).length > 0;
}

/** throws VALIDATION when anything was collected */
export function assertValid(errors: FieldErrors): void {
  if (hasErrors(errors)) throw Errors.VALIDATION(errors);
}
