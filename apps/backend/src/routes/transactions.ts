import type { FastifyInstance } from 'fastify';
import type {
  BorrowInput,
  TransactionListParamsInput,
  UpdateTransactionInput,
} from '@bookledger/shared';
import {
  bookIdParamsSchema,
  borrowSchema,
  idParamsSchema,
  transactionListParamsSchema,
  updateTransactionSchema,
  userIdParamsSchema,
} from '@bookledger/shared';
import { currentUser, requireAdmin, requireAuth } from '../middleware/auth.js';
import { validate, validateParams, validateQuery } from '../middleware/validate.js';
import { transactionService } from '../services/transaction.service.js';
import { assertSelfOrAdmin, isAdmin } from '../utils/permissions.js';

interface IdParams {
  id: number;
}

export async function transactionRoutes(app: FastifyInstance): Promise<void> {
  // GET /: the whole ledger, admin only
  app.get<{ Querystring: TransactionListParamsInput }>(
    '/',
    { preHandler: [requireAuth, requireAdmin, validateQuery(transactionListParamsSchema)] },
    async (request, reply) => {
      const page = await transactionService.listTransactions(request.query);
      return reply.status(200).send({
        data: page.items,
        meta: { total: page.total, skip: page.skip, limit: page.limit },
        errors: null,
      });
    },
  );

  // POST /: borrow. userId defaults to the caller; only admins may borrow
  // for someone else or backdate the loan.
  app.post<{ Body: BorrowInput }>(
    '/',
    { preHandler: [requireAuth, validate(borrowSchema)] },
    async (request, reply) => {
      const actor = currentUser(request);
      const { bookId, borrowDate } = request.body;
      const userId = request.body.userId ?? actor.id;
      assertSelfOrAdmin(actor, userId, 'You can only borrow books for yourself');

      const transaction = await transactionService.borrow({
        userId,
        bookId,
        borrowDate: isAdmin(actor) ? borrowDate : undefined,
      });

      return reply.status(201).send({ data: transaction, meta: null, errors: null });
    },
  );

  // GET /user/:userId: owner or admin
  app.get<{ Params: { userId: number }; Querystring: TransactionListParamsInput }>(
    '/user/:userId',
    {
      preHandler: [
        requireAuth,
        validateParams(userIdParamsSchema),
        validateQuery(transactionListParamsSchema),
      ],
    },
    async (request, reply) => {
      const { userId } = request.params;
      assertSelfOrAdmin(currentUser(request), userId, 'You can only view your own transactions');
      const page = await transactionService.listByUser(userId, request.query);
      return reply.status(200).send({
        data: page.items,
        meta: { total: page.total, skip: page.skip, limit: page.limit },
        errors: null,
      });
    },
  );

  // GET /book/:bookId: a copy's borrowing history, admin only
  app.get<{ Params: { bookId: number }; Querystring: TransactionListParamsInput }>(
    '/book/:bookId',
    {
      preHandler: [
        requireAuth,
        requireAdmin,
        validateParams(bookIdParamsSchema),
        validateQuery(transactionListParamsSchema),
      ],
    },
    async (request, reply) => {
      const page = await transactionService.listByBook(request.params.bookId, request.query);
      return reply.status(200).send({
        data: page.items,
        meta: { total: page.total, skip: page.skip, limit: page.limit },
        errors: null,
      });
    },
  );

  // GET /:id: owner or admin
  app.get<{ Params: IdParams }>(
    '/:id',
    { preHandler: [requireAuth, validateParams(idParamsSchema)] },
    async (request, reply) => {
      const transaction = await transactionService.getTransaction(request.params.id);
      assertSelfOrAdmin(
        currentUser(request),
        transaction.userId,
        'You can only view your own transactions',
      );
      return reply.status(200).send({ data: transaction, meta: null, errors: null });
    },
  );

  // POST /:id/return: owner or admin
  app.post<{ Params: IdParams }>(
    '/:id/return',
    { preHandler: [requireAuth, validateParams(idParamsSchema)] },
    async (request, reply) => {
      const actor = currentUser(request);
      const { id } = request.params;
      const existing = await transactionService.getTransaction(id);
      assertSelfOrAdmin(actor, existing.userId, 'You can only return your own books');

      const transaction = await transactionService.returnTransaction(id, actor);
      return reply.status(200).send({ data: transaction, meta: null, errors: null });
    },
  );

  // PATCH /:id: admin correction
  app.patch<{ Params: IdParams; Body: UpdateTransactionInput }>(
    '/:id',
    {
      preHandler: [
        requireAuth,
        requireAdmin,
        validateParams(idParamsSchema),
        validate(updateTransactionSchema),
      ],
    },
    async (request, reply) => {
      const transaction = await transactionService.updateTransaction(
        request.params.id,
        request.body,
      );
      return reply.status(200).send({ data: transaction, meta: null, errors: null });
    },
  );

  app.delete<{ Params: IdParams }>(
    '/:id',
    { preHandler: [requireAuth, requireAdmin, validateParams(idParamsSchema)] },
    async (request, reply) => {
      await transactionService.deleteTransaction(request.params.id);
      return reply.status(200).send({ data: null, meta: null, errors: null });
    },
  );
}
