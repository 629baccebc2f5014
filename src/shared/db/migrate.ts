/**
 * src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and on deploy.
 * - Migrations are registered statically in ./migrations/index.ts, so the same
 *   provider works under tsx and in a bundled build.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import type { MigrationProvider } from 'kysely';

import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const staticProvider: MigrationProvider = {
  getMigrations() {
    return Promise.resolve(migrations);
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  logger.info('db.migrate.start', { count: Object.keys(migrations).length });

  const migrator = new Migrator({ db, provider: staticProvider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migrate.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migrate.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migrate.failed', {
      message: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }

  logger.info('db.migrate.up_to_date');
}

runMigrations().catch((err: unknown) => {
  logger.error('db.migrate.crashed', {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
