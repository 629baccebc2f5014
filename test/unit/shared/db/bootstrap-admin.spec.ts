import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger } from '../../../../src/shared/logger/logger';
import { ensureBootstrapAdmin } from '../../../../src/shared/db/seed/bootstrap-admin';
import type { PasswordHasher } from '../../../../src/shared/security/password-hasher';
import { InMemUserRepo } from '../../../helpers/inmem-user-repo';

const plainHasher: PasswordHasher = {
  hash: (plain) => Promise.resolve(`hashed:${plain}`),
  verify: (plain, hash) => Promise.resolve(hash === `hashed:${plain}`),
};

const options = { username: 'admin', fullName: 'System Administrator', password: 'test-admin-pass' };

describe('ensureBootstrapAdmin', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates an active admin scoped to both units', async () => {
    const userRepo = new InMemUserRepo();

    const result = await ensureBootstrapAdmin({
      userRepo,
      passwordHasher: plainHasher,
      logger,
      isProduction: false,
      options,
    });

    expect(result).toMatchObject({ status: 'created', generatedPassword: false });
    expect(await userRepo.findActiveByUsername('admin')).toMatchObject({
      role: 'admin',
      unit: 'Both',
      fullName: 'System Administrator',
      passwordHash: 'hashed:test-admin-pass',
    });
  });

  it('does nothing on a second run', async () => {
    const userRepo = new InMemUserRepo();
    const deps = { userRepo, passwordHasher: plainHasher, logger, isProduction: false, options };

    await ensureBootstrapAdmin(deps);
    const second = await ensureBootstrapAdmin(deps);

    expect(second).toEqual({ status: 'exists' });
    expect(await userRepo.countAll()).toBe(1);
  });

  it('reports a username already held by a non-admin', async () => {
    const userRepo = new InMemUserRepo();
    await userRepo.insertUser({
      username: 'admin',
      passwordHash: 'hashed:x',
      fullName: 'Not An Admin',
      unit: 'Unit A',
      role: 'operator',
    });

    const result = await ensureBootstrapAdmin({
      userRepo,
      passwordHasher: plainHasher,
      logger,
      isProduction: false,
      options,
    });

    expect(result).toEqual({ status: 'username_taken' });
  });

  it('keeps a generated password out of production logs', async () => {
    const warn = vi.spyOn(logger, 'warn');

    const result = await ensureBootstrapAdmin({
      userRepo: new InMemUserRepo(),
      passwordHasher: plainHasher,
      logger,
      isProduction: true,
      options: { ...options, password: null },
    });

    expect(result).toMatchObject({ status: 'created', generatedPassword: true });
    expect(warn).toHaveBeenCalledWith('seed.admin.generated_password_hidden', expect.anything());
    expect(warn).not.toHaveBeenCalledWith('seed.admin.generated_password', expect.anything());
  });
});
