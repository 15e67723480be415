import { and, asc, count, eq, ilike, notExists, or } from 'drizzle-orm';
import type {
  Book,
  BookListParamsInput,
  CreateBookInput,
  Page,
  UpdateBookInput,
} from '@bookledger/shared';
import { db } from '../db/index.js';
import type { Database } from '../db/index.js';
import { authors, books, transactions } from '../db/schema/index.js';
import type { Book as BookRow, NewBook } from '../db/schema/index.js';
import { createLogger } from '../utils/logger.js';
import { conflict, notFound } from '../utils/errors.js';
import { containsPattern } from '../utils/like.js';
import { isForeignKeyViolation } from '../utils/pg-errors.js';

const logger = createLogger('BookService');

export function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    isbn: row.isbn,
    publishedYear: row.publishedYear,
    authorId: row.authorId,
    description: row.description,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export class BookService {
  constructor(private readonly database: Database) {}

  /** Registers `copies` physical copies; each is its own row sharing the ISBN. */
  async createBooks(input: CreateBookInput): Promise<Book[]> {
    if (input.authorId != null) {
      await this._requireAuthor(input.authorId);
    }

    const row: NewBook = {
      title: input.title,
      isbn: input.isbn,
      publishedYear: input.publishedYear ?? null,
      authorId: input.authorId ?? null,
      description: input.description ?? null,
    };

    let created: BookRow[];
    try {
      created = await this.database
        .insert(books)
        .values(Array.from({ length: input.copies }, () => ({ ...row })))
        .returning();
    } catch (err) {
      throw this._mapMissingAuthor(err, input.authorId);
    }

    logger.info(
      { service: 'BookService', isbn: input.isbn, copies: created.length },
      'Book copies created',
    );

    return created.sort((a, b) => a.id - b.id).map(toBook);
  }

  async getBook(bookId: number): Promise<Book> {
    return toBook(await this._requireBook(bookId));
  }

  async listBooks(params: BookListParamsInput): Promise<Page<Book>> {
    const where = and(
      params.search
        ? or(
            ilike(books.title, containsPattern(params.search)),
            ilike(books.isbn, containsPattern(params.search)),
          )
        : undefined,
      params.authorId !== undefined ? eq(books.authorId, params.authorId) : undefined,
      params.availableOnly
        ? notExists(
            this.database
              .select({ id: transactions.id })
              .from(transactions)
              .where(and(eq(transactions.bookId, books.id), eq(transactions.isReturned, false))),
          )
        : undefined,
    );

    const [{ value: total }] = await this.database
      .select({ value: count() })
      .from(books)
      .where(where);

    const rows = await this.database
      .select()
      .from(books)
      .where(where)
      .orderBy(asc(books.title), asc(books.id))
      .limit(params.limit)
      .offset(params.skip);

    return {
      items: rows.map(toBook),
      total: Number(total),
      skip: params.skip,
      limit: params.limit,
    };
  }

  async updateBook(bookId: number, input: UpdateBookInput): Promise<Book> {
    await this._requireBook(bookId);

    if (input.authorId != null) {
      await this._requireAuthor(input.authorId);
    }

    const patch: Partial<NewBook> = { updatedAt: new Date() };
    if (input.title !== undefined) patch.title = input.title;
    if (input.isbn !== undefined) patch.isbn = input.isbn;
    if (input.publishedYear !== undefined) patch.publishedYear = input.publishedYear;
    if (input.authorId !== undefined) patch.authorId = input.authorId;
    if (input.description !== undefined) patch.description = input.description;

    try {
      const [updated] = await this.database
        .update(books)
        .set(patch)
        .where(eq(books.id, bookId))
        .returning();

      if (!updated) {
        throw notFound(`Book with ID ${bookId} not found`);
      }

      return toBook(updated);
    } catch (err) {
      throw this._mapMissingAuthor(err, input.authorId);
    }
  }

  /**
   * Refused while the copy is on loan. The row lock makes a concurrent borrow
   * of this copy wait for the delete to finish (or fail).
   */
  async deleteBook(bookId: number): Promise<void> {
    await this.database.transaction(async (tx) => {
      const [book] = await tx
        .select({ id: books.id })
        .from(books)
        .where(eq(books.id, bookId))
        .for('update');

      if (!book) {
        throw notFound(`Book with ID ${bookId} not found`);
      }

      const [openLoan] = await tx
        .select({ id: transactions.id })
        .from(transactions)
        .where(and(eq(transactions.bookId, bookId), eq(transactions.isReturned, false)))
        .limit(1);

      if (openLoan) {
        throw conflict('Cannot delete a book that is currently borrowed');
      }

      await tx.delete(books).where(eq(books.id, bookId));
    });

    logger.info({ service: 'BookService', bookId }, 'Book deleted');
  }

  // ---- Private helpers ----

  private async _requireBook(bookId: number): Promise<BookRow> {
    const [book] = await this.database
      .select()
      .from(books)
      .where(eq(books.id, bookId))
      .limit(1);

    if (!book) {
      throw notFound(`Book with ID ${bookId} not found`);
    }

    return book;
  }

  private async _requireAuthor(authorId: number): Promise<void> {
    const [author] = await this.database
      .select({ id: authors.id })
      .from(authors)
      .where(eq(authors.id, authorId))
      .limit(1);

    if (!author) {
      throw notFound(`Author with ID ${authorId} not found`);
    }
  }

  // The author can be deleted between the existence check and the write
  private _mapMissingAuthor(err: unknown, authorId: number | null | undefined): unknown {
    if (isForeignKeyViolation(err, 'books_author_id_authors_id_fk')) {
      return notFound(`Author with ID ${authorId ?? ''} not found`);
    }
    return err;
  }
}

export const bookService = new BookService(db);
