import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp, TEST_ADMIN } from '../helpers/build-test-app';
import type { TestApp } from '../helpers/build-test-app';
import { loginAs } from '../helpers/session-helpers';

describe('auth', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  it('GET /health answers without a session', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, env: 'test', service: 'card-vault-backend' });
  });

  it('logs the bootstrap admin in with a signed, http-only cookie', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { username: TEST_ADMIN.username, password: TEST_ADMIN.password },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: 'AUTHENTICATED',
      user: { username: 'admin', role: 'admin', unit: 'Both' },
    });

    const setCookie = res.headers['set-cookie'];
    expect(typeof setCookie).toBe('string');
    expect(String(setCookie)).toMatch(/^sid=[0-9a-f-]{36}\.[A-Za-z0-9_-]+; Path=\/; HttpOnly; SameSite=Strict$/);
  });

  it('rejects a wrong password with one generic message', async () => {
    await t.seedUser({ username: 'op1', password: 'pw-1234', unit: 'Unit A' });

    const wrong = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { username: 'op1', password: 'nope' },
    });
    const unknown = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { username: 'ghost', password: 'nope' },
    });

    expect(wrong.statusCode).toBe(401);
    expect(unknown.statusCode).toBe(401);
    expect(wrong.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Invalid username or password.' },
    });
    expect(unknown.json()).toEqual(wrong.json());
    expect(wrong.headers['set-cookie']).toBeUndefined();
  });

  it('rejects a deactivated user with the right password', async () => {
    const user = await t.seedUser({ username: 'op1', password: 'pw-1234', unit: 'Unit A' });
    await t.userRepo.setActive(user.id, false);

    const res = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { username: 'op1', password: 'pw-1234' },
    });

    expect(res.statusCode).toBe(401);
  });

  it('rejects a login body without a password', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { username: 'admin' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('GET /auth/me returns the identity of the session', async () => {
    await t.seedUser({ username: 'op1', password: 'pw-1234', unit: 'Unit B', fullName: 'Op One' });
    const cookie = await loginAs(t.app, 'op1', 'pw-1234');

    const res = await t.app.inject({ method: 'GET', url: '/auth/me', headers: { cookie } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      user: { username: 'op1', fullName: 'Op One', unit: 'Unit B', role: 'operator' },
    });
  });

  it('requires a session for protected endpoints', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/' });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
    });
  });

  it('ignores a cookie with a forged signature', async () => {
    const cookie = await loginAs(t.app, TEST_ADMIN.username, TEST_ADMIN.password);
    const forged = `${cookie.slice(0, cookie.lastIndexOf('.'))}.forged`;

    const res = await t.app.inject({ method: 'GET', url: '/auth/me', headers: { cookie: forged } });

    expect(res.statusCode).toBe(401);
  });

  it('logout ends the session and clears the cookie', async () => {
    const cookie = await loginAs(t.app, TEST_ADMIN.username, TEST_ADMIN.password);

    const out = await t.app.inject({ method: 'POST', url: '/auth/logout', headers: { cookie } });

    expect(out.statusCode).toBe(200);
    expect(out.json()).toEqual({ status: 'LOGGED_OUT', redirectTo: '/auth/login' });
    expect(out.headers['set-cookie']).toBe('sid=; Path=/; HttpOnly; SameSite=Strict; Max-Age=0');

    const after = await t.app.inject({ method: 'GET', url: '/auth/me', headers: { cookie } });
    expect(after.statusCode).toBe(401);
  });

  it('home lists the units an operator may use and no admin links', async () => {
    await t.seedUser({ username: 'op1', password: 'pw-1234', unit: 'Unit A' });
    const cookie = await loginAs(t.app, 'op1', 'pw-1234');

    const res = await t.app.inject({ method: 'GET', url: '/', headers: { cookie } });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.units).toEqual(['Unit A']);
    expect(body.links).not.toHaveProperty('admin');
  });

  it('answers an unknown route with 404 and a way home', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/nowhere' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Page not found.' },
      redirectTo: '/',
    });
  });
});
