/**
 * src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads the signed session cookie on every request.
 * - If a valid session exists AND its user is still active, populates req.authContext.
 * - Does NOT throw if no session: endpoints decide if auth is required.
 *
 * USER RELOAD:
 * - The session stores only the user ID. Identity fields (unit, role) are read
 *   from the users table here, so an admin change takes effect on the next request.
 * - A missing or deactivated user makes the request unauthenticated, and the
 *   stale session is destroyed.
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - Bad signature / unknown session → authContext stays empty.
 * - Storage failures propagate (error handler answers 503).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SessionStore } from './session.store';
import type { SessionCookieSigner } from './session-cookie';
import { SESSION_COOKIE_NAME } from './session.types';
import type { UserIdentity } from '../../modules/users/user.types';
import { withRequestContext } from '../logger/with-context';

export type SessionUser = UserIdentity & { isActive: boolean };

export type SessionUserLoader = (userId: string) => Promise<SessionUser | undefined>;

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function registerSessionMiddleware(
  app: FastifyInstance,
  deps: {
    sessionStore: SessionStore;
    cookieSigner: SessionCookieSigner;
    loadUser: SessionUserLoader;
  },
): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const cookieValue = parseCookies(req.headers.cookie)[SESSION_COOKIE_NAME];
    if (!cookieValue) return;

    const sessionId = deps.cookieSigner.unsign(cookieValue);
    if (!sessionId) {
      withRequestContext(req).warn('session.bad_signature', { flow: 'session' });
      return;
    }

    const session = await deps.sessionStore.get(sessionId);
    if (!session) return;

    const user = await deps.loadUser(session.userId);
    if (!user || !user.isActive) {
      withRequestContext(req).info('session.user_unavailable', {
        flow: 'session',
        userId: session.userId,
        reason: user ? 'inactive' : 'missing',
      });
      await deps.sessionStore.destroy(sessionId);
      return;
    }

    req.authContext = {
      userId: user.id,
      username: user.username,
      fullName: user.fullName,
      unit: user.unit,
      role: user.role,
      sessionId,
    };
  });
}
