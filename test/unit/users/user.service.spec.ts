import { describe, it, expect, beforeEach } from 'vitest';
import { logger } from '../../../src/shared/logger/logger';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { SessionStore } from '../../../src/shared/session/session.store';
import { UserService } from '../../../src/modules/users/user.service';
import { createUserSchema } from '../../../src/modules/users/user.schemas';
import type { PasswordHasher } from '../../../src/shared/security/password-hasher';
import type { UserIdentity } from '../../../src/modules/users/user.types';
import { InMemUserRepo } from '../../helpers/inmem-user-repo';

const plainHasher: PasswordHasher = {
  hash: (plain) => Promise.resolve(`hashed:${plain}`),
  verify: (plain, hash) => Promise.resolve(hash === `hashed:${plain}`),
};

const ctx = { requestId: 'req-1' };

describe('UserService', () => {
  let userRepo: InMemUserRepo;
  let sessionStore: SessionStore;
  let service: UserService;
  let admin: UserIdentity;

  beforeEach(async () => {
    userRepo = new InMemUserRepo();
    sessionStore = new SessionStore(new InMemCache(), 600);
    service = new UserService({ userRepo, passwordHasher: plainHasher, sessionStore, logger });

    const inserted = await userRepo.insertUser({
      username: 'admin',
      passwordHash: 'hashed:x',
      fullName: 'Admin',
      unit: 'Both',
      role: 'admin',
    });
    if (!inserted.ok) throw new Error('seed failed');
    admin = inserted.user;
  });

  it('creates an operator and never returns the hash', async () => {
    const user = await service.createUser(
      admin,
      { username: 'op1', password: 'pw-1234', fullName: 'Op One', unit: 'Unit A', role: 'operator' },
      ctx,
    );

    expect(user).toMatchObject({ username: 'op1', unit: 'Unit A', role: 'operator', isActive: true });
    expect(user).not.toHaveProperty('passwordHash');
    expect((await userRepo.findActiveByUsername('op1'))?.passwordHash).toBe('hashed:pw-1234');
  });

  it('rejects a duplicate username with 409', async () => {
    const input = {
      username: 'op1',
      password: 'pw-1234',
      fullName: 'Op One',
      unit: 'Unit A' as const,
      role: 'operator' as const,
    };
    await service.createUser(admin, input, ctx);

    await expect(service.createUser(admin, input, ctx)).rejects.toMatchObject({
      status: 409,
      message: 'Username already exists.',
    });
  });

  it('lists newest first', async () => {
    await service.createUser(
      admin,
      { username: 'op1', password: 'pw-1234', fullName: 'Op One', unit: 'Unit A', role: 'operator' },
      ctx,
    );

    const users = await service.listUsers();
    expect(users.map((u) => u.username)).toEqual(['op1', 'admin']);
    expect(await service.countUsers()).toBe(2);
  });

  it('refuses to deactivate the acting admin', async () => {
    await expect(
      service.setUserActive(admin, { userId: admin.id, isActive: false }, ctx),
    ).rejects.toMatchObject({ status: 409, message: 'You cannot deactivate your own account.' });
  });

  it('reports an unknown user', async () => {
    await expect(
      service.setUserActive(admin, { userId: 'missing', isActive: false }, ctx),
    ).rejects.toMatchObject({ status: 404, message: 'User not found.' });
  });

  it('ends every session of a deactivated user', async () => {
    const op = await service.createUser(
      admin,
      { username: 'op1', password: 'pw-1234', fullName: 'Op One', unit: 'Unit A', role: 'operator' },
      ctx,
    );
    const sessionId = await sessionStore.create({ userId: op.id, createdAt: 'x' });

    const updated = await service.setUserActive(admin, { userId: op.id, isActive: false }, ctx);

    expect(updated.isActive).toBe(false);
    expect(await sessionStore.get(sessionId)).toBeNull();
    expect(await service.findSessionUser(op.id)).toMatchObject({ username: 'op1', isActive: false });
  });
});

describe('createUserSchema', () => {
  it('trims names and defaults the role to operator', () => {
    const parsed = createUserSchema.parse({
      username: '  op1 ',
      password: 'pw-1234',
      fullName: ' Op One ',
      unit: 'Both',
    });

    expect(parsed).toEqual({
      username: 'op1',
      password: 'pw-1234',
      fullName: 'Op One',
      unit: 'Both',
      role: 'operator',
    });
  });

  it('asks for every field when one is blank', () => {
    const parsed = createUserSchema.safeParse({
      username: '   ',
      password: 'pw-1234',
      fullName: 'Op',
      unit: 'Unit A',
    });

    expect(parsed.success).toBe(false);
    if (!parsed.success) expect(parsed.error.issues[0]?.message).toBe('All fields are required');
  });

  it('rejects a short password', () => {
    const parsed = createUserSchema.safeParse({
      username: 'op1',
      password: 'abc',
      fullName: 'Op',
      unit: 'Unit A',
    });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0]?.message).toBe('Password must be at least 4 characters');
    }
  });

  it('rejects an unknown unit', () => {
    const parsed = createUserSchema.safeParse({
      username: 'op1',
      password: 'pw-1234',
      fullName: 'Op',
      unit: 'Unit C',
    });

    expect(parsed.success).toBe(false);
    if (!parsed.success) expect(parsed.error.issues[0]?.message).toBe('invalid unit');
  });
});
