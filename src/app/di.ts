/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them.
 * - Tests swap infra through `overrides` (in-memory cache and repositories).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves.
 * - close() releases only what buildDeps itself opened.
 */

import type { AppConfig } from './config';
import { INSECURE_DEFAULT_SESSION_SECRET } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { HmacSha256KeyedHasher } from '../shared/security/keyed-hasher';
import type { KeyedHasher } from '../shared/security/keyed-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { SessionStore } from '../shared/session/session.store';
import { SessionCookieSigner } from '../shared/session/session-cookie';

import { KyselyUserRepo } from '../modules/users/dal/user.repo';
import type { UserRepo } from '../modules/users/dal/user.repo';
import { KyselyRecordRepo } from '../modules/records/dal/record.repo';
import type { RecordRepo } from '../modules/records/dal/record.repo';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { createRecordModule } from '../modules/records/record.module';
import type { RecordModule } from '../modules/records/record.module';

import { createAdminModule } from '../modules/admin/admin.module';
import type { AdminModule } from '../modules/admin/admin.module';

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  passwordHasher: PasswordHasher;
  keyedHasher: KeyedHasher;

  sessionStore: SessionStore;
  cookieSigner: SessionCookieSigner;

  userRepo: UserRepo;
  recordRepo: RecordRepo;

  // modules
  users: UserModule;
  auth: AuthModule;
  records: RecordModule;
  admin: AdminModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = Partial<{
  cache: Cache;
  userRepo: UserRepo;
  recordRepo: RecordRepo;
  passwordHasher: PasswordHasher;
}>;

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  if (config.nodeEnv === 'production' && config.session.secret === INSECURE_DEFAULT_SESSION_SECRET) {
    logger.warn('config.insecure_session_secret', {
      flow: 'startup',
      hint: 'Set SESSION_SECRET to a random value of at least 32 characters',
    });
  }

  // The pool connects lazily: no connection is opened until the first query.
  const db = createDb(config.databaseUrl);

  // Redis is mandatory unless a cache is injected (tests)
  let redis: RedisCache | null = null;
  let cache: Cache;
  if (overrides.cache) {
    cache = overrides.cache;
  } else {
    redis = await RedisCache.connect(config.redisUrl);
    cache = redis;
  }

  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });
  const keyedHasher: KeyedHasher = new HmacSha256KeyedHasher(config.session.secret);

  // Composition root decides when rate limiting is disabled.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const sessionStore = new SessionStore(cache, config.session.ttlSeconds);
  const cookieSigner = new SessionCookieSigner(keyedHasher);

  const userRepo: UserRepo = overrides.userRepo ?? new KyselyUserRepo(db);
  const recordRepo: RecordRepo = overrides.recordRepo ?? new KyselyRecordRepo(db);

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ userRepo, passwordHasher, sessionStore, logger });

  const auth = createAuthModule({
    userRepo,
    passwordHasher,
    keyedHasher,
    logger,
    rateLimiter,
    sessionStore,
    cookieSigner,
    isProduction: config.nodeEnv === 'production',
  });

  const records = createRecordModule({ recordRepo, logger });

  const admin = createAdminModule({
    userService: users.userService,
    recordService: records.recordService,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    passwordHasher,
    keyedHasher,
    sessionStore,
    cookieSigner,
    userRepo,
    recordRepo,
    users,
    auth,
    records,
    admin,
    close: async () => {
      if (redis) await redis.close();
      await db.destroy();
    },
  };
}
