import { and, asc, count, countDistinct, eq, isNull } from 'drizzle-orm';
import type { BookAvailability, IsbnAvailability } from '@bookledger/shared';
import { db } from '../db/index.js';
import type { Database } from '../db/index.js';
import { books, transactions } from '../db/schema/index.js';
import { notFound } from '../utils/errors.js';

// Join condition shared by every query that looks at copies on loan.
const openLoanOnBook = and(
  eq(transactions.bookId, books.id),
  eq(transactions.isReturned, false),
);

/**
 * Derives copy counts from the `books` and `transactions` tables at read time.
 * Nothing is cached, so the result is consistent with the ledger by
 * construction.
 *
 * Every method takes an optional executor so the borrow flow can run the same
 * queries inside its own database transaction.
 */
export class AvailabilityService {
  constructor(private readonly database: Database) {}

  async getByIsbn(isbn: string, executor: Database = this.database): Promise<IsbnAvailability> {
    // Aggregate without GROUP BY: always exactly one row, zeros for an unknown ISBN
    const [row] = await executor
      .select({
        totalCopies: countDistinct(books.id),
        borrowedCopies: count(transactions.id),
      })
      .from(books)
      .leftJoin(transactions, openLoanOnBook)
      .where(eq(books.isbn, isbn));

    const totalCopies = Number(row?.totalCopies ?? 0);
    const borrowedCopies = Number(row?.borrowedCopies ?? 0);
    const availableCopies = totalCopies - borrowedCopies;

    return {
      isbn,
      totalCopies,
      borrowedCopies,
      availableCopies,
      isAvailable: availableCopies > 0,
    };
  }

  async getByBookId(bookId: number, executor: Database = this.database): Promise<BookAvailability> {
    const [book] = await executor
      .select({ id: books.id, title: books.title, isbn: books.isbn })
      .from(books)
      .where(eq(books.id, bookId))
      .limit(1);

    if (!book) {
      throw notFound(`Book with ID ${bookId} not found`);
    }

    const counts = await this.getByIsbn(book.isbn, executor);
    return { bookId: book.id, title: book.title, ...counts };
  }

  /**
   * Id of a copy in the ISBN group with no open loan, or null when every copy
   * is out. `preferredBookId` wins when it is free; otherwise the lowest id.
   */
  async findFreeCopy(
    isbn: string,
    preferredBookId: number,
    executor: Database = this.database,
  ): Promise<number | null> {
    const free = await executor
      .select({ id: books.id })
      .from(books)
      .leftJoin(transactions, openLoanOnBook)
      .where(and(eq(books.isbn, isbn), isNull(transactions.id)))
      .orderBy(asc(books.id));

    if (free.length === 0) {
      return null;
    }

    return free.some((copy) => copy.id === preferredBookId) ? preferredBookId : free[0].id;
  }
}

export const availabilityService = new AvailabilityService(db);
