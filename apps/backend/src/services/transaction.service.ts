import { and, asc, count, desc, eq } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type {
  Page,
  Transaction as TransactionApi,
  TransactionListParamsInput,
  UpdateTransactionInput,
  UserProfile,
} from '@bookledger/shared';
import { db } from '../db/index.js';
import type { Database } from '../db/index.js';
import { books, transactions, users, OPEN_LOAN_INDEX } from '../db/schema/index.js';
import type { NewTransaction, Transaction as TransactionRow } from '../db/schema/index.js';
import { createLogger } from '../utils/logger.js';
import {
  alreadyReturned,
  conflict,
  notFound,
  unavailable,
  validationError,
} from '../utils/errors.js';
import { isUniqueViolation } from '../utils/pg-errors.js';
import { AvailabilityService, availabilityService } from './availability.service.js';

const logger = createLogger('TransactionService');

export interface BorrowCommand {
  userId: number;
  bookId: number;
  borrowDate?: Date;
}

export function toTransaction(row: TransactionRow): TransactionApi {
  return {
    id: row.id,
    userId: row.userId,
    bookId: row.bookId,
    borrowDate: row.borrowDate.toISOString(),
    returnDate: row.returnDate ? row.returnDate.toISOString() : null,
    isReturned: row.isReturned,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export class TransactionService {
  constructor(
    private readonly database: Database,
    private readonly availability: AvailabilityService,
  ) {}

  // ---- Lifecycle ----

  /**
   * Open a loan on a copy of the requested book.
   *
   * The availability check and the insert share one database transaction
   * that holds row locks on every copy of the ISBN group, so concurrent
   * borrowers of the same title are serialized. The partial unique index on
   * open loans backs this up; losing a race there surfaces as UNAVAILABLE.
   */
  async borrow(command: BorrowCommand): Promise<TransactionApi> {
    let row: TransactionRow;

    try {
      row = await this.database.transaction(async (tx) => {
        const [book] = await tx
          .select({ id: books.id, isbn: books.isbn })
          .from(books)
          .where(eq(books.id, command.bookId))
          .limit(1);

        if (!book) {
          throw notFound(`Book with ID ${command.bookId} not found`);
        }

        const [user] = await tx
          .select({ id: users.id })
          .from(users)
          .where(eq(users.id, command.userId))
          .limit(1)
          .for('share');

        if (!user) {
          throw notFound(`User with ID ${command.userId} not found`);
        }

        // Lock in id order so two borrowers of one group never deadlock
        const lockedCopies = await tx
          .select({ id: books.id })
          .from(books)
          .where(eq(books.isbn, book.isbn))
          .orderBy(asc(books.id))
          .for('update');

        if (!lockedCopies.some((copy) => copy.id === book.id)) {
          throw conflict(`Book with ID ${book.id} changed while borrowing; try again`);
        }

        const counts = await this.availability.getByIsbn(book.isbn, tx);
        if (counts.availableCopies <= 0) {
          throw unavailable();
        }

        const copyId = await this.availability.findFreeCopy(book.isbn, book.id, tx);
        if (copyId === null) {
          throw unavailable();
        }

        const [inserted] = await tx
          .insert(transactions)
          .values({
            userId: user.id,
            bookId: copyId,
            borrowDate: command.borrowDate ?? new Date(),
            isReturned: false,
          })
          .returning();

        return inserted;
      });
    } catch (err) {
      if (isUniqueViolation(err, OPEN_LOAN_INDEX)) {
        logger.warn(
          { service: 'TransactionService', bookId: command.bookId, userId: command.userId },
          'Borrow lost a race for the last copy',
        );
        throw unavailable();
      }
      throw err;
    }

    logger.info(
      {
        service: 'TransactionService',
        transactionId: row.id,
        userId: row.userId,
        requestedBookId: command.bookId,
        bookId: row.bookId,
      },
      'Book borrowed',
    );

    return toTransaction(row);
  }

  /**
   * Close an open loan. The conditional UPDATE makes concurrent returns of the
   * same loan race safely: exactly one of them matches the open row.
   */
  async returnTransaction(transactionId: number, actor: UserProfile): Promise<TransactionApi> {
    const now = new Date();

    const [updated] = await this.database
      .update(transactions)
      .set({ isReturned: true, returnDate: now, updatedAt: now })
      .where(and(eq(transactions.id, transactionId), eq(transactions.isReturned, false)))
      .returning();

    if (!updated) {
      await this._requireTransaction(transactionId);
      throw alreadyReturned();
    }

    logger.info(
      {
        service: 'TransactionService',
        transactionId,
        bookId: updated.bookId,
        actorId: actor.id,
      },
      'Book returned',
    );

    return toTransaction(updated);
  }

  // ---- Reads ----

  async getTransaction(transactionId: number): Promise<TransactionApi> {
    const row = await this._requireTransaction(transactionId);
    return toTransaction(row);
  }

  async listByUser(
    userId: number,
    params: TransactionListParamsInput,
  ): Promise<Page<TransactionApi>> {
    return this._list(eq(transactions.userId, userId), params);
  }

  /** Borrowing history of one copy. Callers restrict this to admins. */
  async listByBook(
    bookId: number,
    params: TransactionListParamsInput,
  ): Promise<Page<TransactionApi>> {
    return this._list(eq(transactions.bookId, bookId), params);
  }

  async listTransactions(params: TransactionListParamsInput): Promise<Page<TransactionApi>> {
    return this._list(undefined, params);
  }

  // ---- Admin corrections ----

  async updateTransaction(
    transactionId: number,
    patch: UpdateTransactionInput,
  ): Promise<TransactionApi> {
    const existing = await this._requireTransaction(transactionId);
    const now = new Date();

    if (patch.isReturned === false && existing.isReturned) {
      throw validationError('A returned transaction cannot be reopened', 'isReturned');
    }

    const closing = patch.isReturned === true && !existing.isReturned;
    const willBeReturned = existing.isReturned || closing;

    if (patch.returnDate !== undefined && patch.returnDate !== null && !willBeReturned) {
      throw validationError(
        'returnDate can only be set on a returned transaction',
        'returnDate',
      );
    }
    if (patch.returnDate === null && willBeReturned) {
      throw validationError('A returned transaction must keep its return date', 'returnDate');
    }

    const values: Partial<NewTransaction> = { updatedAt: now };

    if (patch.borrowDate !== undefined) {
      values.borrowDate = patch.borrowDate;
    }
    if (closing) {
      values.isReturned = true;
      values.returnDate = patch.returnDate ?? now;
    } else if (patch.returnDate) {
      values.returnDate = patch.returnDate;
    }

    const borrowDate = values.borrowDate ?? existing.borrowDate;
    const returnDate = values.returnDate ?? existing.returnDate;
    if (returnDate && returnDate < borrowDate) {
      throw validationError('returnDate cannot be earlier than borrowDate', 'returnDate');
    }

    // Guard on the state we validated against so a concurrent return is not overwritten
    const [updated] = await this.database
      .update(transactions)
      .set(values)
      .where(
        and(
          eq(transactions.id, transactionId),
          eq(transactions.isReturned, existing.isReturned),
        ),
      )
      .returning();

    if (!updated) {
      throw conflict(`Transaction with ID ${transactionId} changed during the update; try again`);
    }

    logger.info(
      { service: 'TransactionService', transactionId, closed: closing },
      'Transaction corrected',
    );

    return toTransaction(updated);
  }

  async deleteTransaction(transactionId: number): Promise<void> {
    await this._requireTransaction(transactionId);

    await this.database.delete(transactions).where(eq(transactions.id, transactionId));

    logger.info({ service: 'TransactionService', transactionId }, 'Transaction deleted');
  }

  // ---- Private helpers ----

  private async _requireTransaction(transactionId: number): Promise<TransactionRow> {
    const [row] = await this.database
      .select()
      .from(transactions)
      .where(eq(transactions.id, transactionId))
      .limit(1);

    if (!row) {
      throw notFound(`Transaction with ID ${transactionId} not found`);
    }

    return row;
  }

  private async _list(
    filter: SQL | undefined,
    params: TransactionListParamsInput,
  ): Promise<Page<TransactionApi>> {
    const where = and(
      filter,
      params.isReturned !== undefined ? eq(transactions.isReturned, params.isReturned) : undefined,
    );

    const [{ value: total }] = await this.database
      .select({ value: count() })
      .from(transactions)
      .where(where);

    const rows = await this.database
      .select()
      .from(transactions)
      .where(where)
      .orderBy(desc(transactions.borrowDate), desc(transactions.id))
      .limit(params.limit)
      .offset(params.skip);

    return {
      items: rows.map(toTransaction),
      total: Number(total),
      skip: params.skip,
      limit: params.limit,
    };
  }
}

export const transactionService = new TransactionService(db, availabilityService);
