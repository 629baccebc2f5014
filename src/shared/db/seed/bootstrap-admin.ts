/**
 * src/shared/db/seed/bootstrap-admin.ts
 *
 * Startup bootstrap: make sure at least one admin exists.
 *
 * Creates (only when no admin exists):
 * - an active admin with unit "Both" and the configured username/full name.
 *
 * Idempotent: safe to run on every start. Two instances racing on an empty DB
 * are settled by the username UNIQUE constraint (the loser logs and moves on).
 *
 * IMPORTANT:
 * - Stores only the bcrypt hash.
 * - When no password is configured a random one is generated. The raw value is
 *   logged ONCE, and only outside production.
 */

import { randomBytes } from 'node:crypto';

import type { Logger } from '../../logger/logger';
import type { PasswordHasher } from '../../security/password-hasher';
import type { UserRepo } from '../../../modules/users/dal/user.repo';

export type BootstrapAdminOptions = {
  username: string;
  fullName: string;
  password: string | null;
};

export type BootstrapAdminResult =
  | { status: 'exists' }
  | { status: 'created'; userId: string; generatedPassword: boolean }
  | { status: 'username_taken' };

function generatePassword(): string {
  return randomBytes(12).toString('base64url');
}

export async function ensureBootstrapAdmin(opts: {
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  logger: Logger;
  isProduction: boolean;
  options: BootstrapAdminOptions;
}): Promise<BootstrapAdminResult> {
  const { userRepo, passwordHasher, logger, options } = opts;
  const flow = 'seed.bootstrap_admin';

  if (await userRepo.hasAdmin()) {
    logger.info('seed.admin.exists', { flow });
    return { status: 'exists' };
  }

  const generated = options.password === null;
  const password = options.password ?? generatePassword();

  const result = await userRepo.insertUser({
    username: options.username,
    passwordHash: await passwordHasher.hash(password),
    fullName: options.fullName,
    unit: 'Both',
    role: 'admin',
  });

  if (!result.ok) {
    logger.warn('seed.admin.username_taken', { flow, username: options.username });
    return { status: 'username_taken' };
  }

  logger.info('seed.admin.created', {
    flow,
    userId: result.user.id,
    username: result.user.username,
    generatedPassword: generated,
  });

  if (generated) {
    if (opts.isProduction) {
      logger.warn('seed.admin.generated_password_hidden', {
        flow,
        hint: 'Set BOOTSTRAP_ADMIN_PASSWORD, or reset the account',
      });
    } else {
      // Dev convenience: the only place a raw password is ever logged.
      logger.warn('seed.admin.generated_password', { flow, password });
    }
  }

  return { status: 'created', userId: result.user.id, generatedPassword: generated };
}
