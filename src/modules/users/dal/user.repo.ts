/**
 * src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Services depend on the UserRepo interface, not on Kysely.
 * - KyselyUserRepo is the Postgres implementation used in production;
 *   tests provide an in-memory one through buildDeps overrides.
 *
 * RULES:
 * - "Not found" is `undefined`, never an exception.
 * - Driver failures surface as StorageError (operation name + cause).
 * - Username uniqueness comes from the DB constraint; 23505 maps to
 *   `{ ok: false, reason: 'username_taken' }`.
 * - No AppError. No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { StorageError, isUniqueViolation, runStorage } from '../../../shared/db/storage-error';
import { isUserRole, isUserUnit } from '../user.types';
import type { InsertUserResult, NewUser, User } from '../user.types';
import {
  countUsersSql,
  selectActiveUserByUsernameSql,
  selectAnyAdminIdSql,
  selectUserByIdSql,
  selectUsersNewestFirstSql,
} from './user.query-sql';
import type { UserRow } from './user.query-sql';

export interface UserRepo {
  findById(userId: string): Promise<User | undefined>;
  findActiveByUsername(username: string): Promise<User | undefined>;
  listNewestFirst(): Promise<User[]>;
  countAll(): Promise<number>;
  hasAdmin(): Promise<boolean>;

  insertUser(user: NewUser): Promise<InsertUserResult>;
  setActive(userId: string, isActive: boolean): Promise<User | undefined>;
  touchLastLogin(userId: string, at: Date): Promise<void>;
}

export function toUser(row: UserRow): User {
  const { unit, role } = row;
  if (!isUserUnit(unit) || !isUserRole(role)) {
    throw new StorageError('users.decode', {
      cause: new Error(`User ${row.id} has unknown unit/role: ${unit}/${role}`),
    });
  }

  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    fullName: row.full_name,
    unit,
    role,
    isActive: row.is_active,
    createdAt: row.created_at,
    lastLoginAt: row.last_login_at,
  };
}

export class KyselyUserRepo implements UserRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(userId: string): Promise<User | undefined> {
    return runStorage('users.findById', async () => {
      const row = await selectUserByIdSql(this.db, userId);
      return row ? toUser(row) : undefined;
    });
  }

  async findActiveByUsername(username: string): Promise<User | undefined> {
    return runStorage('users.findActiveByUsername', async () => {
      const row = await selectActiveUserByUsernameSql(this.db, username);
      return row ? toUser(row) : undefined;
    });
  }

  async listNewestFirst(): Promise<User[]> {
    return runStorage('users.list', async () => {
      const rows = await selectUsersNewestFirstSql(this.db);
      return rows.map(toUser);
    });
  }

  async countAll(): Promise<number> {
    return runStorage('users.count', () => countUsersSql(this.db));
  }

  async hasAdmin(): Promise<boolean> {
    return runStorage('users.hasAdmin', async () => {
      const id = await selectAnyAdminIdSql(this.db);
      return id !== undefined;
    });
  }

  async insertUser(user: NewUser): Promise<InsertUserResult> {
    return runStorage<InsertUserResult>('users.insert', async () => {
      try {
        const row = await this.db
          .insertInto('users')
          .values({
            username: user.username,
            password_hash: user.passwordHash,
            full_name: user.fullName,
            unit: user.unit,
            role: user.role,
          })
          .returningAll()
          .executeTakeFirstOrThrow();

        return { ok: true, user: toUser(row) };
      } catch (err) {
        if (isUniqueViolation(err)) return { ok: false, reason: 'username_taken' };
        throw err;
      }
    });
  }

  async setActive(userId: string, isActive: boolean): Promise<User | undefined> {
    return runStorage('users.setActive', async () => {
      const row = await this.db
        .updateTable('users')
        .set({ is_active: isActive })
        .where('id', '=', userId)
        .returningAll()
        .executeTakeFirst();

      return row ? toUser(row) : undefined;
    });
  }

  async touchLastLogin(userId: string, at: Date): Promise<void> {
    await runStorage('users.touchLastLogin', async () => {
      await this.db
        .updateTable('users')
        .set({ last_login_at: at })
        .where('id', '=', userId)
        .execute();
    });
  }
}
