/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import { AuthService } from './auth.service';
import type { AuthServiceDeps } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: AuthServiceDeps & { isProduction: boolean }) {
  const authService = new AuthService({
    userRepo: deps.userRepo,
    passwordHasher: deps.passwordHasher,
    keyedHasher: deps.keyedHasher,
    logger: deps.logger,
    rateLimiter: deps.rateLimiter,
    sessionStore: deps.sessionStore,
    cookieSigner: deps.cookieSigner,
  });

  const controller = new AuthController(authService, deps.isProduction);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
