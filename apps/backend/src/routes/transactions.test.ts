import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { db } from '../db/index.js';
import { insertCopies, insertUser, resetDatabase } from '../test/database.js';
import { loginAs } from '../test/http.js';
import type { SessionCookies } from '../test/http.js';

vi.mock('../db/index.js', async () => {
  const { createTestDatabase } = await import('../test/database.js');
  const testDb = await createTestDatabase();
  return { db: testDb.db, pool: { end: testDb.close } };
});

let app: FastifyInstance;
let readerId: number;
let otherId: number;
let readerCookies: SessionCookies;
let otherCookies: SessionCookies;
let adminCookies: SessionCookies;

beforeAll(async () => {
  app = await buildApp();
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

beforeEach(async () => {
  await resetDatabase(db);
  readerId = (await insertUser(db, { username: 'reader' })).id;
  otherId = (await insertUser(db, { username: 'other' })).id;
  await insertUser(db, { username: 'librarian', role: 'admin' });
  readerCookies = await loginAs(app, 'reader');
  otherCookies = await loginAs(app, 'other');
  adminCookies = await loginAs(app, 'librarian');
});

function borrow(cookies: SessionCookies, payload: Record<string, unknown>) {
  return app.inject({ method: 'POST', url: '/transactions', cookies, payload });
}

// ---------------------------------------------------------------------------
// POST /transactions
// ---------------------------------------------------------------------------

describe('POST /transactions', () => {
  it('should open a loan for the caller by default', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);

    const response = await borrow(readerCookies, { bookId: book.id });

    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({
      userId: readerId,
      bookId: book.id,
      isReturned: false,
      returnDate: null,
    });
  });

  it('should return 400 UNAVAILABLE once every copy is out', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);
    await borrow(readerCookies, { bookId: book.id });

    const response = await borrow(otherCookies, { bookId: book.id });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      data: null,
      meta: null,
      errors: [
        {
          code: 'UNAVAILABLE',
          field: null,
          message: 'No available copies of this book to borrow',
        },
      ],
    });
  });

  it('should return 403 when a regular user borrows for someone else', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);

    const response = await borrow(readerCookies, { bookId: book.id, userId: otherId });

    expect(response.statusCode).toBe(403);
    expect(response.json().errors[0].code).toBe('FORBIDDEN');
  });

  it('should let an admin borrow on behalf of a user', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);

    const response = await borrow(adminCookies, {
      bookId: book.id,
      userId: readerId,
      borrowDate: '2024-06-01T10:00:00Z',
    });

    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({
      userId: readerId,
      borrowDate: '2024-06-01T10:00:00.000Z',
    });
  });

  it('should ignore a borrow date sent by a regular user', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);

    const response = await borrow(readerCookies, {
      bookId: book.id,
      borrowDate: '2001-01-01T00:00:00Z',
    });

    expect(response.statusCode).toBe(201);
    expect(response.json().data.borrowDate).not.toBe('2001-01-01T00:00:00.000Z');
  });

  it('should return 404 for an unknown book', async () => {
    const response = await borrow(readerCookies, { bookId: 999 });

    expect(response.statusCode).toBe(404);
  });

  it('should return 400 when bookId is missing', async () => {
    const response = await borrow(readerCookies, {});

    expect(response.statusCode).toBe(400);
    expect(response.json().errors[0]).toMatchObject({
      code: 'VALIDATION_ERROR',
      field: 'bookId',
    });
  });

  it('should return 401 without a session', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/transactions',
      payload: { bookId: 1 },
    });

    expect(response.statusCode).toBe(401);
  });
});

// ---------------------------------------------------------------------------
// POST /transactions/:id/return
// ---------------------------------------------------------------------------

describe('POST /transactions/:id/return', () => {
  it('should close the caller\'s own loan', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);
    const loan = (await borrow(readerCookies, { bookId: book.id })).json().data;

    const response = await app.inject({
      method: 'POST',
      url: `/transactions/${loan.id}/return`,
      cookies: readerCookies,
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toMatchObject({ id: loan.id, isReturned: true });
    expect(response.json().data.returnDate).not.toBeNull();
  });

  it('should return 409 ALREADY_RETURNED on a second return', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);
    const loan = (await borrow(readerCookies, { bookId: book.id })).json().data;
    const url = `/transactions/${loan.id}/return`;
    await app.inject({ method: 'POST', url, cookies: readerCookies });

    const response = await app.inject({ method: 'POST', url, cookies: readerCookies });

    expect(response.statusCode).toBe(409);
    expect(response.json().errors[0].code).toBe('ALREADY_RETURNED');
  });

  it('should return 403 when returning someone else\'s loan', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);
    const loan = (await borrow(readerCookies, { bookId: book.id })).json().data;

    const response = await app.inject({
      method: 'POST',
      url: `/transactions/${loan.id}/return`,
      cookies: otherCookies,
    });

    expect(response.statusCode).toBe(403);
  });

  it('should let an admin return any loan', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);
    const loan = (await borrow(readerCookies, { bookId: book.id })).json().data;

    const response = await app.inject({
      method: 'POST',
      url: `/transactions/${loan.id}/return`,
      cookies: adminCookies,
    });

    expect(response.statusCode).toBe(200);
  });

  it('should return 404 for an unknown transaction', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/transactions/4242/return',
      cookies: adminCookies,
    });

    expect(response.statusCode).toBe(404);
  });

  it('should return 400 for a non-numeric id', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/transactions/abc/return',
      cookies: adminCookies,
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().errors[0].field).toBe('id');
  });
});

// ---------------------------------------------------------------------------
// Reads and admin corrections
// ---------------------------------------------------------------------------

describe('GET /transactions/user/:userId', () => {
  it('should list the caller\'s loans with paging meta', async () => {
    const copies = await insertCopies(db, 'ISBN-1', 2);
    await borrow(readerCookies, { bookId: copies[0].id });
    await borrow(readerCookies, { bookId: copies[1].id });

    const response = await app.inject({
      method: 'GET',
      url: `/transactions/user/${readerId}?limit=1`,
      cookies: readerCookies,
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.data).toHaveLength(1);
    expect(body.meta).toEqual({ total: 2, skip: 0, limit: 1 });
  });

  it('should return 403 for another user\'s history', async () => {
    const response = await app.inject({
      method: 'GET',
      url: `/transactions/user/${otherId}`,
      cookies: readerCookies,
    });

    expect(response.statusCode).toBe(403);
  });

  it('should return 400 for a limit above 100', async () => {
    const response = await app.inject({
      method: 'GET',
      url: `/transactions/user/${readerId}?limit=101`,
      cookies: readerCookies,
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().errors[0].field).toBe('limit');
  });
});

describe('GET /transactions/book/:bookId', () => {
  it('should be admin only', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);

    const asReader = await app.inject({
      method: 'GET',
      url: `/transactions/book/${book.id}`,
      cookies: readerCookies,
    });
    const asAdmin = await app.inject({
      method: 'GET',
      url: `/transactions/book/${book.id}`,
      cookies: adminCookies,
    });

    expect(asReader.statusCode).toBe(403);
    expect(asAdmin.statusCode).toBe(200);
    expect(asAdmin.json().meta).toEqual({ total: 0, skip: 0, limit: 10 });
  });
});

describe('GET /transactions/:id', () => {
  it('should show a loan to its owner but not to others', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);
    const loan = (await borrow(readerCookies, { bookId: book.id })).json().data;

    const asOwner = await app.inject({
      method: 'GET',
      url: `/transactions/${loan.id}`,
      cookies: readerCookies,
    });
    const asOther = await app.inject({
      method: 'GET',
      url: `/transactions/${loan.id}`,
      cookies: otherCookies,
    });

    expect(asOwner.statusCode).toBe(200);
    expect(asOther.statusCode).toBe(403);
  });
});

describe('PATCH /transactions/:id', () => {
  it('should reject reopening a returned loan', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);
    const loan = (await borrow(readerCookies, { bookId: book.id })).json().data;
    await app.inject({
      method: 'POST',
      url: `/transactions/${loan.id}/return`,
      cookies: readerCookies,
    });

    const response = await app.inject({
      method: 'PATCH',
      url: `/transactions/${loan.id}`,
      cookies: adminCookies,
      payload: { isReturned: false },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().errors[0]).toEqual({
      code: 'VALIDATION_ERROR',
      field: 'isReturned',
      message: 'A returned transaction cannot be reopened',
    });
  });

  it('should be refused to regular users', async () => {
    const [book] = await insertCopies(db, 'ISBN-1', 1);
    const loan = (await borrow(readerCookies, { bookId: book.id })).json().data;

    const response = await app.inject({
      method: 'PATCH',
      url: `/transactions/${loan.id}`,
      cookies: readerCookies,
      payload: { isReturned: true },
    });

    expect(response.statusCode).toBe(403);
  });
});

// ---------------------------------------------------------------------------
// Availability endpoints
// ---------------------------------------------------------------------------

describe('GET /books/:id/availability', () => {
  it('should follow borrows and returns across the ISBN group', async () => {
    const [first, second] = await insertCopies(db, 'ISBN-1', 2, 'Solaris');
    const loan = (await borrow(readerCookies, { bookId: first.id })).json().data;

    const during = await app.inject({
      method: 'GET',
      url: `/books/${second.id}/availability`,
      cookies: otherCookies,
    });
    expect(during.json().data).toEqual({
      bookId: second.id,
      title: 'Solaris',
      isbn: 'ISBN-1',
      totalCopies: 2,
      borrowedCopies: 1,
      availableCopies: 1,
      isAvailable: true,
    });

    await app.inject({
      method: 'POST',
      url: `/transactions/${loan.id}/return`,
      cookies: readerCookies,
    });
    const after = await app.inject({
      method: 'GET',
      url: '/books/isbn/ISBN-1/availability',
      cookies: otherCookies,
    });
    expect(after.json().data).toEqual({
      isbn: 'ISBN-1',
      totalCopies: 2,
      borrowedCopies: 0,
      availableCopies: 2,
      isAvailable: true,
    });
  });

  it('should return 404 for an unknown book', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/books/999/availability',
      cookies: readerCookies,
    });

    expect(response.statusCode).toBe(404);
  });
});
