import { z, ZodError } from 'zod';

/**
 * Base error of the order/settlement core.
 * `code` and `statusCode` are what an API layer's error middleware reads.
 */
export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION', 409);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_STATE', 409);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends AppError {
  readonly details: ValidationIssue[];

  constructor(message: string, details: ValidationIssue[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
    this.details = details;
  }
}

export class ConcurrencyConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONCURRENCY_CONFLICT', 409);
  }
}

// Trùng natural key (order_number, verification_code, ...)
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}

export class ExternalIOError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EXTERNAL_IO_ERROR', 502, { cause });
  }
}

export class TimeoutError extends AppError {
  constructor(message: string) {
    super(message, 'TIMEOUT', 504);
  }
}

export const fromZodError = (error: ZodError, message: string = 'Dữ liệu không hợp lệ'): ValidationError => {
  const details = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  return new ValidationError(message, details);
};

/**
 * Parse with a zod schema, raising ValidationError instead of ZodError.
 */
export const parseInput = <S extends z.ZodTypeAny>(schema: S, data: unknown, message?: string): z.infer<S> => {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw fromZodError(result.error, message);
  }
  return result.data;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const errorCode = (error: unknown): string =>
  error instanceof AppError ? error.code : 'INTERNAL_ERROR';
