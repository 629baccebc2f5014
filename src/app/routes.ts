/**
 * src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health, /)
 *   - module routes (auth, records, users, admin)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { requireSession } from '../shared/http/require-auth-context';
import { permittedUnits } from '../modules/records/helpers/record-scope';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Home: who am I, which units may I enter records for, where can I go.
  app.get('/', (req) => {
    const { identity } = requireSession(req);

    return {
      user: identity,
      units: permittedUnits(identity),
      links: {
        createRecord: '/records',
        records: '/records',
        export: '/records/export',
        ...(identity.role === 'admin' ? { admin: '/admin', users: '/admin/users' } : {}),
      },
    };
  });

  // Module routes
  opts.deps.auth.registerRoutes(app);
  opts.deps.records.registerRoutes(app);
  opts.deps.users.registerRoutes(app);
  opts.deps.admin.registerRoutes(app);
}
