/**
 * src/modules/auth/flows/login/authenticate.ts
 *
 * WHY:
 * - The credential check on its own, without HTTP, sessions or rate limits.
 * - Unit-testable against an in-memory UserRepo.
 *
 * RULES:
 * - Only ACTIVE users are considered; an inactive user is indistinguishable
 *   from an unknown one.
 * - Unknown/inactive usernames still pay for one hash comparison (against a
 *   per-hasher dummy hash), so response time does not reveal which case failed.
 * - Hash comparison goes through PasswordHasher (bcrypt); never plaintext.
 * - Updating lastLoginAt must never fail a valid login: a storage error there
 *   is logged at warn and swallowed.
 */

import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { UserRepo } from '../../../users/dal/user.repo';
import { toIdentity } from '../../../users/user.types';
import type { AuthenticateResult } from '../../auth.types';

const DUMMY_PASSWORD = 'no-such-user-dummy-password';

const dummyHashes = new WeakMap<PasswordHasher, Promise<string>>();

function dummyHashFor(hasher: PasswordHasher): Promise<string> {
  let hash = dummyHashes.get(hasher);
  if (!hash) {
    hash = hasher.hash(DUMMY_PASSWORD);
    dummyHashes.set(hasher, hash);
  }
  return hash;
}

export async function authenticate(
  deps: {
    userRepo: UserRepo;
    passwordHasher: PasswordHasher;
    logger: Logger;
    now?: () => Date;
  },
  params: { username: string; password: string },
): Promise<AuthenticateResult> {
  const user = await deps.userRepo.findActiveByUsername(params.username);
  if (!user) {
    await deps.passwordHasher.verify(params.password, await dummyHashFor(deps.passwordHasher));
    return { ok: false, reason: 'unknown_or_inactive' };
  }

  const passwordValid = await deps.passwordHasher.verify(params.password, user.passwordHash);
  if (!passwordValid) {
    return { ok: false, reason: 'wrong_password' };
  }

  const now = deps.now ? deps.now() : new Date();
  try {
    await deps.userRepo.touchLastLogin(user.id, now);
  } catch (err) {
    deps.logger.warn({
      msg: 'auth.login.last_login_update_failed',
      flow: 'auth.login',
      userId: user.id,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  return { ok: true, identity: toIdentity(user) };
}
