import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyCookie from '@fastify/cookie';
import { config } from './config/index.js';
import { errorHandler } from './middleware/error-handler.js';
import { authService } from './services/auth.service.js';
import { authRoutes } from './routes/auth.js';
import { userRoutes } from './routes/users.js';
import { authorRoutes } from './routes/authors.js';
import { bookRoutes } from './routes/books.js';
import { transactionRoutes } from './routes/transactions.js';

export async function buildApp(): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // Decorate request with user (null until requireAuth sets it)
  app.decorateRequest('user', null);

  // Register plugins
  await app.register(fastifyCors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  await app.register(fastifyCookie, {
    secret: config.sessionSecret,
  });

  // requireAuth resolves sessions through the instance, not a module import
  app.decorate('authService', authService);

  // Global error handler
  app.setErrorHandler(errorHandler);

  // Health check
  app.get('/health', async (_request, reply) => {
    return reply.status(200).send({ data: { status: 'ok' }, meta: null, errors: null });
  });

  // Route registrations
  await app.register(authRoutes, { prefix: '/auth' });
  await app.register(userRoutes, { prefix: '/users' });
  await app.register(authorRoutes, { prefix: '/authors' });
  await app.register(bookRoutes, { prefix: '/books' });
  await app.register(transactionRoutes, { prefix: '/transactions' });

  return app;
}
