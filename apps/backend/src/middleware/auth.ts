import type { FastifyReply, FastifyRequest } from 'fastify';
import type { UserProfile } from '@bookledger/shared';
import type { AuthService } from '../services/auth.service.js';
import { forbidden, unauthorized } from '../utils/errors.js';
import { isAdmin } from '../utils/permissions.js';

declare module 'fastify' {
  interface FastifyRequest {
    user: UserProfile | null;
  }
  interface FastifyInstance {
    authService: AuthService;
  }
}

export const SESSION_COOKIE = 'bookledger_session';

export async function requireAuth(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  // @fastify/cookie populates request.cookies; signed cookies are under unsignCookie
  const rawCookie = request.cookies[SESSION_COOKIE];

  if (!rawCookie) {
    throw unauthorized('Authentication required');
  }

  const unsigned = request.unsignCookie(rawCookie);
  if (!unsigned.valid || !unsigned.value) {
    throw unauthorized('Authentication required');
  }

  request.user = await request.server.authService.validateSession(unsigned.value);
}

/** Must run after requireAuth. */
export async function requireAdmin(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  if (!isAdmin(currentUser(request))) {
    throw forbidden('Admin privileges required');
  }
}

/** The authenticated caller; throws when requireAuth has not run. */
export function currentUser(request: FastifyRequest): UserProfile {
  if (!request.user) {
    throw unauthorized('Authentication required');
  }
  return request.user;
}
