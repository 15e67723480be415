import { describe, it, expect } from 'vitest';
import {
  AppError,
  alreadyReturned,
  conflict,
  forbidden,
  notFound,
  unauthorized,
  unavailable,
  validationError,
} from './errors.js';

describe('AppError', () => {
  it('should set all properties when constructed with required args', () => {
    const err = new AppError('TEST_CODE', 418, 'teapot error');
    expect(err.code).toBe('TEST_CODE');
    expect(err.statusCode).toBe(418);
    expect(err.message).toBe('teapot error');
    expect(err.field).toBeUndefined();
    expect(err.name).toBe('AppError');
  });

  it('should be an instance of Error', () => {
    expect(new AppError('TEST_CODE', 500, 'message')).toBeInstanceOf(Error);
  });
});

describe('error factories', () => {
  it.each([
    [notFound('Book with ID 3 not found'), 'NOT_FOUND', 404],
    [unauthorized('Authentication required'), 'UNAUTHORIZED', 401],
    [forbidden('Admin privileges required'), 'FORBIDDEN', 403],
    [conflict('Email already in use'), 'CONFLICT', 409],
    [validationError('Title is required'), 'VALIDATION_ERROR', 400],
  ])('should map %s to its code and status', (err, code, status) => {
    expect(err).toBeInstanceOf(AppError);
    expect(err.code).toBe(code);
    expect(err.statusCode).toBe(status);
  });

  it('should keep the field on validation errors', () => {
    expect(validationError('Invalid email address', 'email').field).toBe('email');
  });
});

describe('unavailable', () => {
  it('should default to the borrow refusal message with a 400 status', () => {
    const err = unavailable();
    expect(err.code).toBe('UNAVAILABLE');
    expect(err.statusCode).toBe(400);
    expect(err.message).toBe('No available copies of this book to borrow');
  });
});

describe('alreadyReturned', () => {
  it('should be a 409 with its own code', () => {
    const err = alreadyReturned();
    expect(err.code).toBe('ALREADY_RETURNED');
    expect(err.statusCode).toBe(409);
    expect(err.message).toBe('Book already returned');
  });
});
