import type { FastifyInstance } from 'fastify';
import type { BookListParamsInput, CreateBookInput, UpdateBookInput } from '@bookledger/shared';
import {
  bookListParamsSchema,
  createBookSchema,
  idParamsSchema,
  isbnParamsSchema,
  updateBookSchema,
} from '@bookledger/shared';
import { requireAdmin, requireAuth } from '../middleware/auth.js';
import { validate, validateParams, validateQuery } from '../middleware/validate.js';
import { availabilityService } from '../services/availability.service.js';
import { bookService } from '../services/book.service.js';

interface IdParams {
  id: number;
}

export async function bookRoutes(app: FastifyInstance): Promise<void> {
  // GET /: search the catalog; availableOnly keeps copies not on loan
  app.get<{ Querystring: BookListParamsInput }>(
    '/',
    { preHandler: [requireAuth, validateQuery(bookListParamsSchema)] },
    async (request, reply) => {
      const page = await bookService.listBooks(request.query);
      return reply.status(200).send({
        data: page.items,
        meta: { total: page.total, skip: page.skip, limit: page.limit },
        errors: null,
      });
    },
  );

  app.get<{ Params: IdParams }>(
    '/:id',
    { preHandler: [requireAuth, validateParams(idParamsSchema)] },
    async (request, reply) => {
      const book = await bookService.getBook(request.params.id);
      return reply.status(200).send({ data: book, meta: null, errors: null });
    },
  );

  // GET /:id/availability: counts for the copy's whole ISBN group
  app.get<{ Params: IdParams }>(
    '/:id/availability',
    { preHandler: [requireAuth, validateParams(idParamsSchema)] },
    async (request, reply) => {
      const availability = await availabilityService.getByBookId(request.params.id);
      return reply.status(200).send({ data: availability, meta: null, errors: null });
    },
  );

  app.get<{ Params: { isbn: string } }>(
    '/isbn/:isbn/availability',
    { preHandler: [requireAuth, validateParams(isbnParamsSchema)] },
    async (request, reply) => {
      const availability = await availabilityService.getByIsbn(request.params.isbn);
      return reply.status(200).send({ data: availability, meta: null, errors: null });
    },
  );

  // POST /: one row per physical copy; responds with every created copy
  app.post<{ Body: CreateBookInput }>(
    '/',
    { preHandler: [requireAuth, requireAdmin, validate(createBookSchema)] },
    async (request, reply) => {
      const created = await bookService.createBooks(request.body);
      return reply.status(201).send({
        data: created,
        meta: { total: created.length, skip: 0, limit: created.length },
        errors: null,
      });
    },
  );

  app.patch<{ Params: IdParams; Body: UpdateBookInput }>(
    '/:id',
    {
      preHandler: [
        requireAuth,
        requireAdmin,
        validateParams(idParamsSchema),
        validate(updateBookSchema),
      ],
    },
    async (request, reply) => {
      const book = await bookService.updateBook(request.params.id, request.body);
      return reply.status(200).send({ data: book, meta: null, errors: null });
    },
  );

  app.delete<{ Params: IdParams }>(
    '/:id',
    { preHandler: [requireAuth, requireAdmin, validateParams(idParamsSchema)] },
    async (request, reply) => {
      await bookService.deleteBook(request.params.id);
      return reply.status(200).send({ data: null, meta: null, errors: null });
    },
  );
}
