/* apps/http/test/users.spec.ts */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { MemoryStore } from '@erdbase/store-memory';
import { buildApp } from '../src/app';
import { loadConfig } from '../src/config';
import { PASSWORD, type RecordingNotifier } from '../../../tests/helpers';
import { PROVIDER_SECRET, bearer, buildTestApp, signUp } from './build';

describe('users routes', () => {
  let app: FastifyInstance;
  let store: MemoryStore;
  let notifier: RecordingNotifier;

  beforeEach(async () => {
    ({ app, store, notifier } = await buildTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  it('answers health checks with a request id', async () => {
    const health = await app.inject({ method: 'GET', url: '/healthz' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toEqual({ ok: true });
    expect(health.headers['x-request-id']).toBeDefined();

    const ready = await app.inject({ method: 'GET', url: '/readyz' });
    expect(ready.json()).toEqual({ ok: true, store: { name: 'memory', ok: true, details: { users: 0, organizations: 0 } } });
  });

  it('registers without exposing the password hash', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/users/register',
      payload: { name: 'Ada Lovelace', email: 'ada@example.com', avatar: 'ada.png', password: PASSWORD },
    });
    expect(res.statusCode).toBe(201);
    const { user } = res.json();
    expect(user).toMatchObject({ slug: 'ada-lovelace', email: 'ada@example.com', confirmedAt: null });
    expect('hashedPassword' in user).toBe(false);
  });

  it('returns field errors for invalid attributes', async () => {
    const res = await app.inject({ method: 'POST', url: '/users/register', payload: { email: 'ada' } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      code: 'VALIDATION',
      message: 'Request failed',
      error: 'Invalid attributes',
      errors: {
        name: ["can't be blank"],
        avatar: ["can't be blank"],
        email: ['must have the @ sign and no spaces'],
        password: ["can't be blank"],
      },
    });
  });

  it('returns path details for malformed bodies', async () => {
    const res = await app.inject({ method: 'POST', url: '/users/login', payload: { email: 'ada@example.com' } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 'VALIDATION', details: [{ path: 'password', msg: 'Required' }] });
  });

  it('rejects bad credentials', async () => {
    await signUp(app);
    const res = await app.inject({
      method: 'POST', url: '/users/login', payload: { email: 'ada@example.com', password: 'wrong-password' },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ code: 'UNAUTHORIZED', error: 'invalid email or password' });
  });

  it('requires a session, with a trace on demand', async () => {
    const res = await app.inject({ method: 'GET', url: '/users/me?debug=1' });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ code: 'UNAUTHORIZED', trace: { errorCode: 'UNAUTHORIZED' } });
  });

  it('serves and updates the current user', async () => {
    const { token } = await signUp(app);
    const me = await app.inject({ method: 'GET', url: '/users/me', headers: bearer(token) });
    expect(me.json().user.email).toBe('ada@example.com');

    const put = await app.inject({
      method: 'PUT', url: '/users/me', headers: bearer(token), payload: { company: 'Analytical Engines' },
    });
    expect(put.json().user.company).toBe('Analytical Engines');
  });

  it('confirms through the mailed token', async () => {
    await signUp(app);
    const res = await app.inject({ method: 'POST', url: `/users/confirm/${notifier.lastToken()}` });
    expect(res.statusCode).toBe(200);
    expect(res.json().user.confirmedAt).not.toBeNull();
  });

  it('swaps the session when the password changes', async () => {
    const { token } = await signUp(app);
    const res = await app.inject({
      method: 'PUT',
      url: '/users/me/password',
      headers: bearer(token),
      payload: { currentPassword: PASSWORD, password: 'test-password-2', passwordConfirmation: 'test-password-2' },
    });
    expect(res.statusCode).toBe(200);
    const next: string = res.json().token;
    expect((await app.inject({ method: 'GET', url: '/users/me', headers: bearer(token) })).statusCode).toBe(401);
    expect((await app.inject({ method: 'GET', url: '/users/me', headers: bearer(next) })).statusCode).toBe(200);
  });

  it('changes the email in two steps', async () => {
    const { token } = await signUp(app);
    const request = await app.inject({
      method: 'PUT',
      url: '/users/me/email',
      headers: bearer(token),
      payload: { currentPassword: PASSWORD, email: 'ada@engines.example' },
    });
    expect(request.statusCode).toBe(202);
    const apply = await app.inject({
      method: 'POST', url: `/users/me/email/${notifier.lastToken()}`, headers: bearer(token),
    });
    expect(apply.json().user.email).toBe('ada@engines.example');
  });

  it('resets a forgotten password', async () => {
    await signUp(app);
    const unknown = await app.inject({ method: 'POST', url: '/users/reset-password', payload: { email: 'nobody@example.com' } });
    expect(unknown.statusCode).toBe(204);

    await app.inject({ method: 'POST', url: '/users/reset-password', payload: { email: 'ada@example.com' } });
    const reset = await app.inject({
      method: 'POST', url: `/users/reset-password/${notifier.lastToken()}`, payload: { password: 'test-password-2' },
    });
    expect(reset.statusCode).toBe(200);
    const login = await app.inject({
      method: 'POST', url: '/users/login', payload: { email: 'ada@example.com', password: 'test-password-2' },
    });
    expect(login.statusCode).toBe(200);
  });

  it('signs in through a provider', async () => {
    const headers = { 'x-provider-secret': PROVIDER_SECRET };
    const res = await app.inject({
      method: 'POST',
      url: '/users/auth/github',
      headers,
      payload: { name: 'Grace Hopper', email: 'grace@example.com', avatar: 'g.png', githubUsername: 'ghopper' },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().user).toMatchObject({ slug: 'ghopper', provider: 'github' });

    const other = await app.inject({ method: 'POST', url: '/users/auth/gitlab', headers, payload: {} });
    expect(other.statusCode).toBe(400);
    expect(other.json().details[0].path).toBe('provider');
  });

  it('takes provider profiles only from callers holding the provider secret', async () => {
    const victim = await signUp(app);
    const payload = { name: 'Mallory', email: 'ada@example.com', avatar: 'm.png', githubUsername: 'mallory' };

    const anonymous = await app.inject({ method: 'POST', url: '/users/auth/github', payload });
    expect(anonymous.statusCode).toBe(401);
    expect(anonymous.json()).toMatchObject({ code: 'UNAUTHORIZED', error: 'provider secret required' });

    const wrong = await app.inject({
      method: 'POST', url: '/users/auth/github', headers: { 'x-provider-secret': 'not-the-secret' }, payload,
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json().token).toBeUndefined();

    // even the trusted front cannot hand a password account to a provider identity
    const trusted = await app.inject({
      method: 'POST', url: '/users/auth/github', headers: { 'x-provider-secret': PROVIDER_SECRET }, payload,
    });
    expect(trusted.statusCode).toBe(409);
    expect((await store.findUserById(victim.user.id))?.provider).toBeNull();
  });

  it('refuses provider sign-in when no provider secret is configured', async () => {
    const bare = await buildApp({
      config: loadConfig({ STORE: 'memory', BCRYPT_ROUNDS: '4', LOG_LEVEL: 'silent' }),
      store: new MemoryStore(),
      logger: false,
    });
    const res = await bare.inject({
      method: 'POST',
      url: '/users/auth/github',
      headers: { 'x-provider-secret': '' },
      payload: { name: 'Grace Hopper', email: 'grace@example.com', avatar: 'g.png' },
    });
    expect(res.statusCode).toBe(401);
    await bare.close();
  });

  it('logs out and deletes accounts', async () => {
    const first = await signUp(app);
    expect((await app.inject({ method: 'DELETE', url: '/users/session', headers: bearer(first.token) })).statusCode).toBe(204);
    expect((await app.inject({ method: 'GET', url: '/users/me', headers: bearer(first.token) })).statusCode).toBe(401);

    const login = await app.inject({
      method: 'POST', url: '/users/login', payload: { email: 'ada@example.com', password: PASSWORD },
    });
    const token: string = login.json().token;
    expect((await app.inject({ method: 'DELETE', url: '/users/me', headers: bearer(token) })).statusCode).toBe(204);
    expect((await store.findUserById(first.user.id))?.deletedAt).not.toBeNull();
  });

  it('keeps user search to admins', async () => {
    const { user, token } = await signUp(app);
    const denied = await app.inject({ method: 'GET', url: '/admin/users?q=ada', headers: bearer(token) });
    expect(denied.statusCode).toBe(403);
    expect(denied.json()).toMatchObject({ code: 'FORBIDDEN', error: 'admin only' });

    await store.updateUser(user.id, { isAdmin: true });
    const res = await app.inject({ method: 'GET', url: '/admin/users?q=LOVE&limit=5', headers: bearer(token) });
    expect(res.json().users.map((u: { slug: string }) => u.slug)).toEqual(['ada-lovelace']);
  });

  it('limits reset requests', async () => {
    const send = () => app.inject({ method: 'POST', url: '/users/reset-password', payload: { email: 'nobody@example.com' } });
    for (let i = 0; i < 5; i++) expect((await send()).statusCode).toBe(204);
    const limited = await send();
    expect(limited.statusCode).toBe(429);
    expect(limited.json().code).toBe('RATE_LIMITED');
  });
});
