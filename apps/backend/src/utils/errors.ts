import { ErrorCodes } from '@bookledger/shared';

export class AppError extends Error {
  constructor(
    public code: string,
    public statusCode: number,
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function notFound(message: string): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, 404, message);
}

export function unauthorized(message: string): AppError {
  return new AppError(ErrorCodes.UNAUTHORIZED, 401, message);
}

export function forbidden(message: string): AppError {
  return new AppError(ErrorCodes.FORBIDDEN, 403, message);
}

export function conflict(message: string): AppError {
  return new AppError(ErrorCodes.CONFLICT, 409, message);
}

export function validationError(message: string, field?: string): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, 400, message, field);
}

export function unavailable(message = 'No available copies of this book to borrow'): AppError {
  return new AppError(ErrorCodes.UNAVAILABLE, 400, message);
}

export function alreadyReturned(message = 'Book already returned'): AppError {
  return new AppError(ErrorCodes.ALREADY_RETURNED, 409, message);
}
