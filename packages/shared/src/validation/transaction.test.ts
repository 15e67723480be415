import { describe, it, expect } from 'vitest';
import {
  borrowSchema,
  transactionListParamsSchema,
  updateTransactionSchema,
} from './transaction.js';

describe('borrowSchema', () => {
  it('should pass with only a bookId', () => {
    const result = borrowSchema.parse({ bookId: 3 });
    expect(result).toEqual({ bookId: 3 });
  });

  it('should convert borrowDate to a Date', () => {
    const result = borrowSchema.parse({ bookId: 3, borrowDate: '2024-03-01T10:00:00Z' });
    expect(result.borrowDate).toBeInstanceOf(Date);
    expect(result.borrowDate?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should accept a borrowDate with a UTC offset', () => {
    const result = borrowSchema.parse({ bookId: 3, borrowDate: '2024-03-01T12:00:00+02:00' });
    expect(result.borrowDate?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should fail for a malformed borrowDate', () => {
    const result = borrowSchema.safeParse({ bookId: 3, borrowDate: 'yesterday' });
    expect(result.success).toBe(false);
  });

  it('should fail when bookId is missing', () => {
    const result = borrowSchema.safeParse({ userId: 1 });
    expect(result.success).toBe(false);
  });

  it('should fail when bookId is not a positive integer', () => {
    expect(borrowSchema.safeParse({ bookId: 0 }).success).toBe(false);
    expect(borrowSchema.safeParse({ bookId: 1.5 }).success).toBe(false);
    expect(borrowSchema.safeParse({ bookId: '3' }).success).toBe(false);
  });
});

describe('updateTransactionSchema', () => {
  it('should fail when no field is provided', () => {
    const result = updateTransactionSchema.safeParse({});
    expect(result.success).toBe(false);
  });

  it('should accept isReturned false, leaving the state check to the server', () => {
    expect(updateTransactionSchema.parse({ isReturned: false })).toEqual({ isReturned: false });
  });

  it('should accept closing with an explicit return date', () => {
    const result = updateTransactionSchema.parse({
      isReturned: true,
      returnDate: '2024-03-05T09:30:00Z',
    });
    expect(result.isReturned).toBe(true);
    expect(result.returnDate?.toISOString()).toBe('2024-03-05T09:30:00.000Z');
  });

  it('should reject unknown fields', () => {
    const result = updateTransactionSchema.safeParse({ bookId: 4 });
    expect(result.success).toBe(false);
  });
});

describe('transactionListParamsSchema', () => {
  it('should leave isReturned undefined when absent', () => {
    const result = transactionListParamsSchema.parse({});
    expect(result).toEqual({ skip: 0, limit: 10 });
  });

  it('should parse isReturned=true', () => {
    const result = transactionListParamsSchema.parse({ isReturned: 'true' });
    expect(result.isReturned).toBe(true);
  });

  it('should fail for isReturned=yes', () => {
    const result = transactionListParamsSchema.safeParse({ isReturned: 'yes' });
    expect(result.success).toBe(false);
  });
});
