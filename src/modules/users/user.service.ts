/**
 * src/modules/users/user.service.ts
 *
 * WHY:
 * - Admin user management: create, list, (de)activate.
 * - Also the user lookup the session middleware runs on every request.
 *
 * RULES:
 * - No raw DB access (UserRepo only).
 * - Username uniqueness comes from the DB constraint, never check-then-insert.
 * - Password hashes never leave this service (PublicUser only).
 * - Deactivation destroys every session of that user.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { SessionStore } from '../../shared/session/session.store';
import type { SessionUser } from '../../shared/session/session.middleware';
import type { UserRepo } from './dal/user.repo';
import { UserErrors } from './user.errors';
import type { CreateUserInput } from './user.schemas';
import { toIdentity, toPublicUser } from './user.types';
import type { PublicUser, UserIdentity } from './user.types';

export type UserServiceDeps = {
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  sessionStore: SessionStore;
  logger: Logger;
};

export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  async createUser(
    actor: UserIdentity,
    input: CreateUserInput,
    ctx: { requestId: string },
  ): Promise<PublicUser> {
    const passwordHash = await this.deps.passwordHasher.hash(input.password);

    const result = await this.deps.userRepo.insertUser({
      username: input.username,
      passwordHash,
      fullName: input.fullName,
      unit: input.unit,
      role: input.role,
    });

    if (!result.ok) {
      this.deps.logger.warn({
        msg: 'users.create.duplicate',
        flow: 'users.create',
        requestId: ctx.requestId,
        actorId: actor.id,
      });
      throw UserErrors.usernameTaken();
    }

    this.deps.logger.info({
      msg: 'users.create.success',
      flow: 'users.create',
      requestId: ctx.requestId,
      actorId: actor.id,
      userId: result.user.id,
      unit: result.user.unit,
      role: result.user.role,
    });

    return toPublicUser(result.user);
  }

  async listUsers(): Promise<PublicUser[]> {
    const users = await this.deps.userRepo.listNewestFirst();
    return users.map(toPublicUser);
  }

  async countUsers(): Promise<number> {
    return this.deps.userRepo.countAll();
  }

  async setUserActive(
    actor: UserIdentity,
    params: { userId: string; isActive: boolean },
    ctx: { requestId: string },
  ): Promise<PublicUser> {
    if (!params.isActive && params.userId === actor.id) {
      throw UserErrors.cannotDeactivateSelf({ userId: actor.id });
    }

    const user = await this.deps.userRepo.setActive(params.userId, params.isActive);
    if (!user) throw UserErrors.notFound({ userId: params.userId });

    if (!params.isActive) {
      await this.deps.sessionStore.destroyAllForUser(user.id);
    }

    this.deps.logger.info({
      msg: params.isActive ? 'users.activate.success' : 'users.deactivate.success',
      flow: 'users.set_active',
      requestId: ctx.requestId,
      actorId: actor.id,
      userId: user.id,
    });

    return toPublicUser(user);
  }

  /** Loader for the session middleware: identity + active flag, nothing else. */
  async findSessionUser(userId: string): Promise<SessionUser | undefined> {
    const user = await this.deps.userRepo.findById(userId);
    if (!user) return undefined;
    return { ...toIdentity(user), isActive: user.isActive };
  }
}
