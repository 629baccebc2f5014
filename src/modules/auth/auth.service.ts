/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates login, logout and "who am I".
 * - Login orchestration lives in flows/login (deep module); the service stays thin.
 *
 * RULES:
 * - No raw DB access (UserRepo only).
 * - Never store/log raw passwords.
 * - Logout is idempotent: destroying an unknown session is a no-op.
 */

import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { KeyedHasher } from '../../shared/security/keyed-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { SessionStore } from '../../shared/session/session.store';
import type { SessionCookieSigner } from '../../shared/session/session-cookie';
import type { UserRepo } from '../users/dal/user.repo';

import { executeLoginFlow } from './flows/login/execute-login-flow';
import type { LoginFlowResult, LoginParams } from './flows/login/execute-login-flow';

export type AuthServiceDeps = {
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  keyedHasher: KeyedHasher;
  logger: Logger;
  rateLimiter: RateLimiter;
  sessionStore: SessionStore;
  cookieSigner: SessionCookieSigner;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async login(params: LoginParams): Promise<LoginFlowResult> {
    return executeLoginFlow(this.deps, params);
  }

  async logout(params: { sessionId: string; userId: string; requestId: string }): Promise<void> {
    await this.deps.sessionStore.destroy(params.sessionId);

    this.deps.logger.info({
      msg: 'auth.logout.success',
      flow: 'auth.logout',
      requestId: params.requestId,
      userId: params.userId,
    });
  }
}
