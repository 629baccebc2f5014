/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes -> bootstrap
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { ensureBootstrapAdmin } from '../shared/db/seed/bootstrap-admin';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  if (config.bootstrapAdmin.enabled) {
    await ensureBootstrapAdmin({
      userRepo: deps.userRepo,
      passwordHasher: deps.passwordHasher,
      logger,
      isProduction: config.nodeEnv === 'production',
      options: {
        username: config.bootstrapAdmin.username,
        fullName: config.bootstrapAdmin.fullName,
        password: config.bootstrapAdmin.password,
      },
    });
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
