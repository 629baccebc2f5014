/**
 * src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB or services.
 * - Throws AppError so error-handler maps it consistently.
 * - Unit-level access is NOT decided here (see modules/access).
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { UserIdentity, UserRole } from '../../modules/users/user.types';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  identity: UserIdentity;
}>;

export type RequireSessionOptions = Readonly<{
  role?: UserRole;
}>;

/**
 * Controller guard: requires a session, and optionally enforces a role.
 *
 * Guard sequence:
 * 1) no session -> 401 "Authentication required"
 * 2) wrong role -> 403 "Access denied." (redirect home)
 */
export function requireSession(
  req: FastifyRequest,
  opts: RequireSessionOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx) throw AppError.unauthorized('Authentication required');

  const { sessionId, userId, username, fullName, unit, role } = ctx;
  if (!sessionId || !userId || !username || fullName === null || !unit || !role) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.role && role !== opts.role) {
    throw AppError.forbidden('Access denied.', { requiredRole: opts.role }).withRedirect('/');
  }

  return {
    sessionId,
    identity: { id: userId, username, fullName, unit, role },
  };
}
