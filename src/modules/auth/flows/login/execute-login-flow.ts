/**
 * src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin: rate limit → authenticate → session.
 *
 * RULES:
 * - No HTTP concerns here (controller handles the cookie header).
 * - No raw SQL here (UserRepo only).
 * - Rate limit at the start of the flow (before any DB work).
 * - Usernames are never used raw in Redis keys (keyed hash instead).
 */

import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { KeyedHasher } from '../../../../shared/security/keyed-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { SessionStore } from '../../../../shared/session/session.store';
import type { SessionCookieSigner } from '../../../../shared/session/session-cookie';
import type { UserRepo } from '../../../users/dal/user.repo';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import type { AuthResult } from '../../auth.types';
import { createAuthSession } from '../../helpers/create-auth-session';
import { authenticate } from './authenticate';

export type LoginParams = {
  username: string;
  password: string;
  ip: string;
  requestId: string;
};

export type LoginFlowResult = {
  result: AuthResult;
  sessionId: string;
  cookieValue: string;
};

export async function executeLoginFlow(
  deps: {
    userRepo: UserRepo;
    passwordHasher: PasswordHasher;
    keyedHasher: KeyedHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    sessionStore: SessionStore;
    cookieSigner: SessionCookieSigner;
  },
  params: LoginParams,
): Promise<LoginFlowResult> {
  const usernameKey = deps.keyedHasher.hash(params.username);

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: params.requestId,
    usernameKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:user:${usernameKey}`,
    ...AUTH_RATE_LIMITS.login.perUsername,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const outcome = await authenticate(deps, {
    username: params.username,
    password: params.password,
  });

  if (!outcome.ok) {
    deps.logger.warn({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      usernameKey,
      reason: outcome.reason,
    });
    throw AuthErrors.invalidCredentials({ reason: outcome.reason });
  }

  const { identity } = outcome;

  const { sessionId, cookieValue } = await createAuthSession({
    sessionStore: deps.sessionStore,
    cookieSigner: deps.cookieSigner,
    userId: identity.id,
    now: new Date(),
  });

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: params.requestId,
    userId: identity.id,
    role: identity.role,
    unit: identity.unit,
  });

  return {
    sessionId,
    cookieValue,
    result: { status: 'AUTHENTICATED', user: identity },
  };
}
