import type { FastifyInstance } from 'fastify';
import type {
  AuthorListParamsInput,
  CreateAuthorInput,
  UpdateAuthorInput,
} from '@bookledger/shared';
import {
  authorListParamsSchema,
  createAuthorSchema,
  idParamsSchema,
  updateAuthorSchema,
} from '@bookledger/shared';
import { requireAdmin, requireAuth } from '../middleware/auth.js';
import { validate, validateParams, validateQuery } from '../middleware/validate.js';
import { authorService } from '../services/author.service.js';

interface IdParams {
  id: number;
}

export async function authorRoutes(app: FastifyInstance): Promise<void> {
  app.get<{ Querystring: AuthorListParamsInput }>(
    '/',
    { preHandler: [requireAuth, validateQuery(authorListParamsSchema)] },
    async (request, reply) => {
      const page = await authorService.listAuthors(request.query);
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
      const author = await authorService.getAuthor(request.params.id);
      return reply.status(200).send({ data: author, meta: null, errors: null });
    },
  );

  app.post<{ Body: CreateAuthorInput }>(
    '/',
    { preHandler: [requireAuth, requireAdmin, validate(createAuthorSchema)] },
    async (request, reply) => {
      const author = await authorService.createAuthor(request.body);
      return reply.status(201).send({ data: author, meta: null, errors: null });
    },
  );

  app.patch<{ Params: IdParams; Body: UpdateAuthorInput }>(
    '/:id',
    {
      preHandler: [
        requireAuth,
        requireAdmin,
        validateParams(idParamsSchema),
        validate(updateAuthorSchema),
      ],
    },
    async (request, reply) => {
      const author = await authorService.updateAuthor(request.params.id, request.body);
      return reply.status(200).send({ data: author, meta: null, errors: null });
    },
  );

  // DELETE /:id: the author's books are kept with no author
  app.delete<{ Params: IdParams }>(
    '/:id',
    { preHandler: [requireAuth, requireAdmin, validateParams(idParamsSchema)] },
    async (request, reply) => {
      await authorService.deleteAuthor(request.params.id);
      return reply.status(200).send({ data: null, meta: null, errors: null });
    },
  );
}
