/**
 * src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and access are separate concepts.
 * - Session middleware fills this from the server-side session + a fresh user row.
 * - Without a valid session all fields are null (unauthenticated request).
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets stub (all null) on every request.
 * 2. Session middleware overwrites it with real values if a valid cookie exists.
 * 3. Controllers read it through requireSession() only.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { UserRole, UserUnit } from '../../modules/users/user.types';

export type AuthContext = {
  userId: string | null;
  username: string | null;
  fullName: string | null;
  unit: UserUnit | null;
  role: UserRole | null;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function emptyAuthContext(): AuthContext {
  return {
    userId: null,
    username: null,
    fullName: null,
    unit: null,
    role: null,
    sessionId: null,
  };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = emptyAuthContext();
    done();
  });
}
