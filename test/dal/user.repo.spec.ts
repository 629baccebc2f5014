import { describe, it, expect } from 'vitest';
import { KyselyUserRepo } from '../../src/modules/users/dal/user.repo';
import { StorageError } from '../../src/shared/db/storage-error';
import { createScriptedDb } from '../helpers/scripted-db';

const createdAt = new Date('2025-01-01T00:00:00.000Z');

function userRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'u-1',
    username: 'op1',
    password_hash: 'hash',
    full_name: 'Op One',
    unit: 'Unit A',
    role: 'operator',
    is_active: true,
    created_at: createdAt,
    last_login_at: null,
    ...overrides,
  };
}

describe('KyselyUserRepo', () => {
  it('looks up an active user by username', async () => {
    const scripted = createScriptedDb();
    scripted.respond([userRow()]);

    const user = await new KyselyUserRepo(scripted.db).findActiveByUsername('op1');

    expect(scripted.queries[0]?.sql).toBe(
      'select * from "users" where "username" = $1 and "is_active" = $2',
    );
    expect(scripted.queries[0]?.parameters).toEqual(['op1', true]);
    expect(user).toEqual({
      id: 'u-1',
      username: 'op1',
      passwordHash: 'hash',
      fullName: 'Op One',
      unit: 'Unit A',
      role: 'operator',
      isActive: true,
      createdAt,
      lastLoginAt: null,
    });
  });

  it('returns undefined for a missing user', async () => {
    const scripted = createScriptedDb();

    expect(await new KyselyUserRepo(scripted.db).findById('nope')).toBeUndefined();
    expect(scripted.queries[0]?.sql).toBe('select * from "users" where "id" = $1');
  });

  it('lists newest first with id as tie-breaker', async () => {
    const scripted = createScriptedDb();
    scripted.respond([userRow({ id: 'u-2' }), userRow()]);

    const users = await new KyselyUserRepo(scripted.db).listNewestFirst();

    expect(scripted.queries[0]?.sql).toBe(
      'select * from "users" order by "created_at" desc, "id" desc',
    );
    expect(users.map((u) => u.id)).toEqual(['u-2', 'u-1']);
  });

  it('counts users from the string aggregate', async () => {
    const scripted = createScriptedDb();
    scripted.respond([{ count: '3' }]);

    expect(await new KyselyUserRepo(scripted.db).countAll()).toBe(3);
    expect(scripted.queries[0]?.sql).toBe('select count(*) as "count" from "users"');
  });

  it('checks for any admin', async () => {
    const scripted = createScriptedDb();
    scripted.respond([{ id: 'u-9' }]);

    expect(await new KyselyUserRepo(scripted.db).hasAdmin()).toBe(true);
    expect(scripted.queries[0]?.sql).toBe(
      'select "id" from "users" where "role" = $1 limit $2',
    );
    expect(scripted.queries[0]?.parameters).toEqual(['admin', 1]);
  });

  it('inserts a user and maps the returned row', async () => {
    const scripted = createScriptedDb();
    scripted.respond([userRow()]);

    const result = await new KyselyUserRepo(scripted.db).insertUser({
      username: 'op1',
      passwordHash: 'hash',
      fullName: 'Op One',
      unit: 'Unit A',
      role: 'operator',
    });

    expect(scripted.queries[0]?.sql).toBe(
      'insert into "users" ("username", "password_hash", "full_name", "unit", "role") values ($1, $2, $3, $4, $5) returning *',
    );
    expect(result.ok && result.user.id).toBe('u-1');
  });

  it('maps a unique violation to username_taken', async () => {
    const scripted = createScriptedDb();
    scripted.fail(Object.assign(new Error('duplicate key'), { code: '23505' }));

    const result = await new KyselyUserRepo(scripted.db).insertUser({
      username: 'op1',
      passwordHash: 'hash',
      fullName: 'Op One',
      unit: 'Unit A',
      role: 'operator',
    });

    expect(result).toEqual({ ok: false, reason: 'username_taken' });
  });

  it('wraps any other driver error in a StorageError naming the operation', async () => {
    const scripted = createScriptedDb();
    const cause = new Error('connection refused');
    scripted.fail(cause);

    const err = await new KyselyUserRepo(scripted.db).setActive('u-1', false).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ operation: 'users.setActive', cause });
    expect(scripted.queries[0]?.sql).toBe(
      'update "users" set "is_active" = $1 where "id" = $2 returning *',
    );
  });

  it('refuses a row with an unknown role', async () => {
    const scripted = createScriptedDb();
    scripted.respond([userRow({ role: 'root' })]);

    await expect(new KyselyUserRepo(scripted.db).findById('u-1')).rejects.toMatchObject({
      name: 'StorageError',
      operation: 'users.decode',
    });
  });
});
