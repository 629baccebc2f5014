import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp, TEST_ADMIN } from '../helpers/build-test-app';
import type { TestApp } from '../helpers/build-test-app';
import { loginAs } from '../helpers/session-helpers';

type UserBody = { id: string; username: string; isActive: boolean };

describe('admin user management', () => {
  let t: TestApp;
  let admin: string;

  beforeEach(async () => {
    t = await buildTestApp();
    admin = await loginAs(t.app, TEST_ADMIN.username, TEST_ADMIN.password);
  });

  afterEach(async () => {
    await t.close();
  });

  function createUser(payload: Record<string, string>) {
    return t.app.inject({ method: 'POST', url: '/admin/users', headers: { cookie: admin }, payload });
  }

  it('creates an operator and lists it first', async () => {
    const res = await createUser({
      username: ' op1 ',
      password: 'op1-pass',
      fullName: 'Operator One',
      unit: 'Unit B',
    });

    expect(res.statusCode).toBe(201);
    const { user } = res.json<{ user: UserBody & Record<string, unknown> }>();
    expect(user).toMatchObject({ username: 'op1', unit: 'Unit B', role: 'operator', isActive: true });
    expect(user).not.toHaveProperty('passwordHash');

    const list = await t.app.inject({ method: 'GET', url: '/admin/users', headers: { cookie: admin } });
    expect(list.json<{ users: UserBody[] }>().users.map((u) => u.username)).toEqual(['op1', 'admin']);
  });

  it('rejects a duplicate username with 409', async () => {
    const payload = { username: 'op1', password: 'op1-pass', fullName: 'Op', unit: 'Unit A' };
    await createUser(payload);

    const res = await createUser(payload);

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      error: { code: 'CONFLICT', message: 'Username already exists.' },
      redirectTo: '/admin/users',
    });
  });

  it('asks for every field', async () => {
    const res = await createUser({ username: 'op1', password: 'op1-pass', fullName: '', unit: 'Unit A' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: { message: 'All fields are required' } });
  });

  it('refuses operators', async () => {
    await t.seedUser({ username: 'op1', password: 'op1-pass', unit: 'Both' });
    const op = await loginAs(t.app, 'op1', 'op1-pass');

    const users = await t.app.inject({ method: 'GET', url: '/admin/users', headers: { cookie: op } });
    const dashboard = await t.app.inject({ method: 'GET', url: '/admin', headers: { cookie: op } });

    expect(users.statusCode).toBe(403);
    expect(dashboard.statusCode).toBe(403);
    expect(dashboard.json()).toEqual({
      error: { code: 'FORBIDDEN', message: 'Access denied.' },
      redirectTo: '/',
    });
  });

  it('will not let the admin deactivate themselves', async () => {
    const me = await t.app.inject({ method: 'GET', url: '/auth/me', headers: { cookie: admin } });
    const { user } = me.json<{ user: { id: string } }>();

    const res = await t.app.inject({
      method: 'PATCH',
      url: `/admin/users/${user.id}/active`,
      headers: { cookie: admin },
      payload: { isActive: false },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({
      error: { message: 'You cannot deactivate your own account.' },
    });
  });

  it('deactivation ends the user sessions and blocks new logins', async () => {
    const op = await t.seedUser({ username: 'op1', password: 'op1-pass', unit: 'Unit A' });
    const opCookie = await loginAs(t.app, 'op1', 'op1-pass');

    const res = await t.app.inject({
      method: 'PATCH',
      url: `/admin/users/${op.id}/active`,
      headers: { cookie: admin },
      payload: { isActive: false },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json<{ user: UserBody }>().user.isActive).toBe(false);

    const me = await t.app.inject({ method: 'GET', url: '/auth/me', headers: { cookie: opCookie } });
    expect(me.statusCode).toBe(401);

    const relogin = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { username: 'op1', password: 'op1-pass' },
    });
    expect(relogin.statusCode).toBe(401);
  });

  it('reactivation lets the user log in again', async () => {
    const op = await t.seedUser({ username: 'op1', password: 'op1-pass', unit: 'Unit A' });
    await t.userRepo.setActive(op.id, false);

    const res = await t.app.inject({
      method: 'PATCH',
      url: `/admin/users/${op.id}/active`,
      headers: { cookie: admin },
      payload: { isActive: true },
    });

    expect(res.statusCode).toBe(200);
    await expect(loginAs(t.app, 'op1', 'op1-pass')).resolves.toMatch(/^sid=/);
  });

  it('reports an unknown user id as 404', async () => {
    const res = await t.app.inject({
      method: 'PATCH',
      url: '/admin/users/0b5a3c1e-8f2d-4c6a-9e7b-1d2f3a4b5c6d/active',
      headers: { cookie: admin },
      payload: { isActive: false },
    });

    expect(res.statusCode).toBe(404);
  });

  it('shows the dashboard with user and record counts', async () => {
    await t.seedUser({ username: 'op1', password: 'op1-pass', unit: 'Unit B' });

    const res = await t.app.inject({ method: 'GET', url: '/admin', headers: { cookie: admin } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      totalUsers: 2,
      totalRecords: 0,
      countsByUnit: { 'Unit A': 0, 'Unit B': 0 },
    });
  });
});
