import { and, asc, count, eq, ilike, inArray, or } from 'drizzle-orm';
import type {
  AuthorDetail,
  AuthorListParamsInput,
  BookSummary,
  CreateAuthorInput,
  Page,
  UpdateAuthorInput,
} from '@bookledger/shared';
import { db } from '../db/index.js';
import type { Database } from '../db/index.js';
import { authors, books } from '../db/schema/index.js';
import type { Author as AuthorRow, NewAuthor } from '../db/schema/index.js';
import { createLogger } from '../utils/logger.js';
import { conflict, notFound } from '../utils/errors.js';
import { isUniqueViolation } from '../utils/pg-errors.js';
import { containsPattern } from '../utils/like.js';

const logger = createLogger('AuthorService');

// ---- Row-to-domain mappers ----

function toAuthorDetail(row: AuthorRow, authorBooks: BookSummary[]): AuthorDetail {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    bio: row.bio,
    birthDate: row.birthDate,
    nationality: row.nationality,
    website: row.website,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
    books: authorBooks,
  };
}

export class AuthorService {
  constructor(private readonly database: Database) {}

  async createAuthor(input: CreateAuthorInput): Promise<AuthorDetail> {
    try {
      const [created] = await this.database
        .insert(authors)
        .values({
          name: input.name,
          email: input.email ? input.email.toLowerCase() : null,
          bio: input.bio ?? null,
          birthDate: input.birthDate ?? null,
          nationality: input.nationality ?? null,
          website: input.website ?? null,
        })
        .returning();

      logger.info({ service: 'AuthorService', authorId: created.id }, 'Author created');

      return toAuthorDetail(created, []);
    } catch (err) {
      throw this._mapUniqueEmail(err, input.email);
    }
  }

  async getAuthor(authorId: number): Promise<AuthorDetail> {
    const author = await this._requireAuthor(authorId);
    const summaries = await this._bookSummaries([author.id]);
    return toAuthorDetail(author, summaries.get(author.id) ?? []);
  }

  /**
   * `search` matches a substring of name or email, case-insensitively.
   * `nationality` is a case-insensitive exact match.
   */
  async listAuthors(params: AuthorListParamsInput): Promise<Page<AuthorDetail>> {
    const where = and(
      params.search
        ? or(
            ilike(authors.name, containsPattern(params.search)),
            ilike(authors.email, containsPattern(params.search)),
          )
        : undefined,
      params.nationality ? ilike(authors.nationality, params.nationality) : undefined,
    );

    const [{ value: total }] = await this.database
      .select({ value: count() })
      .from(authors)
      .where(where);

    const rows = await this.database
      .select()
      .from(authors)
      .where(where)
      .orderBy(asc(authors.name), asc(authors.id))
      .limit(params.limit)
      .offset(params.skip);

    const summaries = await this._bookSummaries(rows.map((row) => row.id));

    return {
      items: rows.map((row) => toAuthorDetail(row, summaries.get(row.id) ?? [])),
      total: Number(total),
      skip: params.skip,
      limit: params.limit,
    };
  }

  async updateAuthor(authorId: number, input: UpdateAuthorInput): Promise<AuthorDetail> {
    await this._requireAuthor(authorId);

    const patch: Partial<NewAuthor> = { updatedAt: new Date() };
    if (input.name !== undefined) patch.name = input.name;
    if (input.email !== undefined) patch.email = input.email ? input.email.toLowerCase() : null;
    if (input.bio !== undefined) patch.bio = input.bio;
    if (input.birthDate !== undefined) patch.birthDate = input.birthDate;
    if (input.nationality !== undefined) patch.nationality = input.nationality;
    if (input.website !== undefined) patch.website = input.website;

    let updated: AuthorRow | undefined;
    try {
      [updated] = await this.database
        .update(authors)
        .set(patch)
        .where(eq(authors.id, authorId))
        .returning();
    } catch (err) {
      throw this._mapUniqueEmail(err, input.email);
    }

    if (!updated) {
      throw notFound(`Author with ID ${authorId} not found`);
    }

    const summaries = await this._bookSummaries([authorId]);
    return toAuthorDetail(updated, summaries.get(authorId) ?? []);
  }

  /** Books by the author stay in the catalog with no author. */
  async deleteAuthor(authorId: number): Promise<void> {
    await this._requireAuthor(authorId);

    await this.database.delete(authors).where(eq(authors.id, authorId));

    logger.info({ service: 'AuthorService', authorId }, 'Author deleted');
  }

  // ---- Private helpers ----

  private async _requireAuthor(authorId: number): Promise<AuthorRow> {
    const [author] = await this.database
      .select()
      .from(authors)
      .where(eq(authors.id, authorId))
      .limit(1);

    if (!author) {
      throw notFound(`Author with ID ${authorId} not found`);
    }

    return author;
  }

  private async _bookSummaries(authorIds: number[]): Promise<Map<number, BookSummary[]>> {
    const byAuthor = new Map<number, BookSummary[]>();
    if (authorIds.length === 0) {
      return byAuthor;
    }

    const rows = await this.database
      .select({
        id: books.id,
        title: books.title,
        isbn: books.isbn,
        publishedYear: books.publishedYear,
        authorId: books.authorId,
      })
      .from(books)
      .where(inArray(books.authorId, authorIds))
      .orderBy(asc(books.title), asc(books.id));

    for (const { authorId, ...summary } of rows) {
      if (authorId === null) continue;
      const list = byAuthor.get(authorId) ?? [];
      list.push(summary);
      byAuthor.set(authorId, list);
    }

    return byAuthor;
  }

  private _mapUniqueEmail(err: unknown, email: string | null | undefined): unknown {
    if (isUniqueViolation(err, 'authors_email_unique')) {
      return conflict(`An author with email ${email ?? ''} already exists`);
    }
    return err;
  }
}

export const authorService = new AuthorService(db);
