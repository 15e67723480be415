import type { FastifyInstance, FastifyReply } from 'fastify';
import type { LoginInput, RegisterInput } from '@bookledger/shared';
import { loginSchema, registerSchema } from '@bookledger/shared';
import { config } from '../config/index.js';
import { validate } from '../middleware/validate.js';
import { SESSION_COOKIE, currentUser, requireAuth } from '../middleware/auth.js';

function setSessionCookie(reply: FastifyReply, token: string): void {
  reply.setCookie(SESSION_COOKIE, token, {
    // Seconds; validateSession enforces the same limit on the issued-at
    maxAge: config.sessionTtlMinutes * 60,
    httpOnly: true,
    secure: config.nodeEnv === 'production',
    sameSite: 'lax',
    path: '/',
    signed: true,
  });
}

function clearSessionCookie(reply: FastifyReply): void {
  reply.clearCookie(SESSION_COOKIE, { path: '/' });
}

export async function authRoutes(app: FastifyInstance): Promise<void> {
  const { authService } = app;

  // POST /register: self-service sign-up, starts a session
  app.post<{ Body: RegisterInput }>(
    '/register',
    { preHandler: [validate(registerSchema)] },
    async (request, reply) => {
      const user = await authService.register(request.body);
      setSessionCookie(reply, authService.createSessionToken(user.id));
      return reply.status(201).send({ data: user, meta: null, errors: null });
    },
  );

  // POST /login
  app.post<{ Body: LoginInput }>(
    '/login',
    { preHandler: [validate(loginSchema)] },
    async (request, reply) => {
      const { username, password } = request.body;
      const user = await authService.authenticate(username, password);
      setSessionCookie(reply, authService.createSessionToken(user.id));
      return reply.status(200).send({ data: user, meta: null, errors: null });
    },
  );

  // POST /logout
  app.post('/logout', async (_request, reply) => {
    clearSessionCookie(reply);
    return reply.status(200).send({ data: null, meta: null, errors: null });
  });

  // GET /me
  app.get(
    '/me',
    { preHandler: [requireAuth] },
    async (request, reply) => {
      return reply.status(200).send({ data: currentUser(request), meta: null, errors: null });
    },
  );
}
