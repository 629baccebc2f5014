/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId)
 * 2. auth context stub (all null)
 * 3. request log line
 * 4. session middleware (signed cookie → active user → authContext)
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: 64 * 1024,
  });

  registerRequestContext(app);
  registerAuthContext(app);

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
    });
    done();
  });

  const { userService } = opts.deps.users;
  registerSessionMiddleware(app, {
    sessionStore: opts.deps.sessionStore,
    cookieSigner: opts.deps.cookieSigner,
    loadUser: (userId) => userService.findSessionUser(userId),
  });

  registerErrorHandler(app);

  return app;
}
