import type { FastifyInstance } from 'fastify';
import type {
  ChangePasswordInput,
  UpdateUserInput,
  UserListParamsInput,
  UserRole,
} from '@bookledger/shared';
import {
  changePasswordSchema,
  changeRoleSchema,
  idParamsSchema,
  updateUserSchema,
  userListParamsSchema,
} from '@bookledger/shared';
import { currentUser, requireAdmin, requireAuth } from '../middleware/auth.js';
import { validate, validateParams, validateQuery } from '../middleware/validate.js';
import { userService } from '../services/user.service.js';
import { assertSelfOrAdmin, filterUserUpdate } from '../utils/permissions.js';

interface IdParams {
  id: number;
}

export async function userRoutes(app: FastifyInstance): Promise<void> {
  // GET /: all users, admin only
  app.get<{ Querystring: UserListParamsInput }>(
    '/',
    { preHandler: [requireAuth, requireAdmin, validateQuery(userListParamsSchema)] },
    async (request, reply) => {
      const page = await userService.listUsers(request.query);
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
      const { id } = request.params;
      assertSelfOrAdmin(currentUser(request), id, 'You can only view your own account');
      const user = await userService.getUser(id);
      return reply.status(200).send({ data: user, meta: null, errors: null });
    },
  );

  // PATCH /:id: owner or admin; role and isActive are dropped for non-admins
  app.patch<{ Params: IdParams; Body: UpdateUserInput }>(
    '/:id',
    { preHandler: [requireAuth, validateParams(idParamsSchema), validate(updateUserSchema)] },
    async (request, reply) => {
      const actor = currentUser(request);
      const { id } = request.params;
      assertSelfOrAdmin(actor, id, 'You can only update your own account');
      const user = await userService.updateUser(id, filterUserUpdate(actor, request.body));
      return reply.status(200).send({ data: user, meta: null, errors: null });
    },
  );

  // POST /:id/change-password
  app.post<{ Params: IdParams; Body: ChangePasswordInput }>(
    '/:id/change-password',
    {
      preHandler: [requireAuth, validateParams(idParamsSchema), validate(changePasswordSchema)],
    },
    async (request, reply) => {
      const actor = currentUser(request);
      const { id } = request.params;
      assertSelfOrAdmin(actor, id, 'You can only change your own password');
      await userService.changePassword(id, request.body, actor);
      return reply.status(200).send({ data: null, meta: null, errors: null });
    },
  );

  // POST /:id/role: admin only
  app.post<{ Params: IdParams; Body: { role: UserRole } }>(
    '/:id/role',
    {
      preHandler: [
        requireAuth,
        requireAdmin,
        validateParams(idParamsSchema),
        validate(changeRoleSchema),
      ],
    },
    async (request, reply) => {
      const user = await userService.setRole(request.params.id, request.body.role);
      return reply.status(200).send({ data: user, meta: null, errors: null });
    },
  );

  // DELETE /:id: admin only, refused while the user has books on loan
  app.delete<{ Params: IdParams }>(
    '/:id',
    { preHandler: [requireAuth, requireAdmin, validateParams(idParamsSchema)] },
    async (request, reply) => {
      await userService.deleteUser(request.params.id);
      return reply.status(200).send({ data: null, meta: null, errors: null });
    },
  );
}
