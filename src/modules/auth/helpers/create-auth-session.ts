/**
 * src/modules/auth/helpers/create-auth-session.ts
 *
 * WHY:
 * - sessionStore.create → cookie signing is one step of login; keeping it here
 *   lets the flow stay a straight sequence.
 *
 * RULES:
 * - No DB access (sessions live in Redis via SessionStore).
 * - isProduction is NOT needed here: cookie flags are set by the controller.
 */

import type { SessionStore } from '../../../shared/session/session.store';
import type { SessionCookieSigner } from '../../../shared/session/session-cookie';

export type CreateAuthSessionResult = {
  sessionId: string;
  cookieValue: string;
};

export async function createAuthSession(params: {
  sessionStore: SessionStore;
  cookieSigner: SessionCookieSigner;
  userId: string;
  now: Date;
}): Promise<CreateAuthSessionResult> {
  const sessionId = await params.sessionStore.create({
    userId: params.userId,
    createdAt: params.now.toISOString(),
  });

  return { sessionId, cookieValue: params.cookieSigner.sign(sessionId) };
}
