import { afterEach, describe, it, expect, vi } from 'vitest';

import { buildTestApp } from '../helpers/build-test-app';
import { createUser, login, readJson, sessionCookieFrom } from '../helpers/http';
import type { ErrorResponseBody, UserBody } from '../helpers/http';

describe('POST /register', () => {
  it('creates the user (201) without signing them in', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { username: 'newbie', email: 'Newbie@Example.com', password: 'test-password' },
      });

      expect(res.statusCode).toBe(201);
      expect(res.headers['set-cookie']).toBeUndefined();
      const body = readJson<UserBody>(res);
      expect(body.username).toBe('newbie');
      expect(body.email).toBe('newbie@example.com');

      await login(app, { email: 'newbie@example.com', password: 'test-password' });
    } finally {
      await close();
    }
  });

  it('rejects a signed-in caller with ALREADY_AUTHENTICATED', async () => {
    const { app, close } = await buildTestApp();

    try {
      await createUser(app, { username: 'me', email: 'me@example.com', password: 'pw' });
      const cookie = await login(app, { email: 'me@example.com', password: 'pw' });

      const res = await app.inject({
        method: 'POST',
        url: '/register',
        headers: { cookie },
        payload: { username: 'again', email: 'again@example.com', password: 'pw' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        message: 'Already logged in',
        code: 'ALREADY_AUTHENTICATED',
      });
    } finally {
      await close();
    }
  });

  it('rejects a duplicate email', async () => {
    const { app, close } = await buildTestApp();

    try {
      await createUser(app, { username: 'taken', email: 'taken@example.com', password: 'pw' });

      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { username: 'other', email: 'TAKEN@example.com', password: 'pw' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).code).toBe('DUPLICATE_EMAIL');
    } finally {
      await close();
    }
  });
});

describe('GET /register', () => {
  it('tells an anonymous caller to register', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/register' });

      expect(res.statusCode).toBe(200);
      expect(readJson<{ message: string }>(res)).toEqual({ message: 'Register' });
    } finally {
      await close();
    }
  });

  it('rejects a signed-in caller with ALREADY_AUTHENTICATED', async () => {
    const { app, close } = await buildTestApp();

    try {
      await createUser(app, { username: 'back', email: 'back@example.com', password: 'pw' });
      const cookie = await login(app, { email: 'back@example.com', password: 'pw' });

      const res = await app.inject({ method: 'GET', url: '/register', headers: { cookie } });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        message: 'Already logged in',
        code: 'ALREADY_AUTHENTICATED',
      });
    } finally {
      await close();
    }
  });
});

describe('POST /login', () => {
  it('sets an HttpOnly SameSite=Strict session cookie for 24h', async () => {
    const { app, close } = await buildTestApp();

    try {
      const user = await createUser(app, { username: 'al', email: 'al@example.com', password: 'pw' });

      const res = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { email: ' AL@example.com ', password: 'pw' },
      });

      expect(res.statusCode).toBe(200);
      expect(readJson<UserBody>(res).id).toBe(user.id);

      const cookie = sessionCookieFrom(res);
      expect(res.headers['set-cookie']).toBe(
        `${cookie}; Path=/; HttpOnly; SameSite=Strict; Max-Age=86400`,
      );
    } finally {
      await close();
    }
  });

  it('answers unknown email and wrong password the same way', async () => {
    const { app, close } = await buildTestApp();

    try {
      await createUser(app, { username: 'bo', email: 'bo@example.com', password: 'right' });

      for (const payload of [
        { email: 'nobody@example.com', password: 'right' },
        { email: 'bo@example.com', password: 'wrong' },
      ]) {
        const res = await app.inject({ method: 'POST', url: '/login', payload });

        expect(res.statusCode).toBe(400);
        expect(res.headers['set-cookie']).toBeUndefined();
        expect(readJson<ErrorResponseBody>(res)).toEqual({
          message: 'Invalid credentials',
          code: 'INVALID_CREDENTIALS',
        });
      }
    } finally {
      await close();
    }
  });

  it('refuses an inactive account with the same answer and records why', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const user = await createUser(app, { username: 'idle', email: 'idle@example.com', password: 'pw' });
      await deps.db.updateTable('users').set({ is_active: false }).where('id', '=', user.id).execute();

      const res = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { email: 'idle@example.com', password: 'pw' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.headers['set-cookie']).toBeUndefined();
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        message: 'Invalid credentials',
        code: 'INVALID_CREDENTIALS',
      });

      const row = await deps.db
        .selectFrom('audit_events')
        .select(['metadata'])
        .where('action', '=', 'auth.login.failed')
        .executeTakeFirst();
      expect(row!.metadata).toEqual({ email: 'idle@example.com', reason: 'user_inactive' });
    } finally {
      await close();
    }
  });

  it('requires email and password', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'POST', url: '/login', payload: { email: 'x@example.com' } });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        message: 'Password is required',
        code: 'VALIDATION_ERROR',
      });
    } finally {
      await close();
    }
  });

  it('rate limits repeated attempts per email', async () => {
    // Limiter is only wired outside the test env.
    const { app, close } = await buildTestApp({ nodeEnv: 'development' });

    try {
      const payload = { email: 'victim@example.com', password: 'guess' };

      for (let i = 0; i < 5; i++) {
        const res = await app.inject({ method: 'POST', url: '/login', payload });
        expect(res.statusCode).toBe(400);
      }

      const blocked = await app.inject({ method: 'POST', url: '/login', payload });
      expect(blocked.statusCode).toBe(429);
      expect(readJson<ErrorResponseBody>(blocked)).toEqual({
        message: 'Too many requests. Try again later.',
        code: 'RATE_LIMITED',
      });
    } finally {
      await close();
    }
  });
});

describe('GET /account and GET /logout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the signed-in user, then nothing after logout', async () => {
    const { app, close } = await buildTestApp();

    try {
      const user = await createUser(app, { username: 'cy', email: 'cy@example.com', password: 'pw' });
      const cookie = await login(app, { email: 'cy@example.com', password: 'pw' });

      const account = await app.inject({ method: 'GET', url: '/account', headers: { cookie } });
      expect(account.statusCode).toBe(200);
      expect(readJson<UserBody>(account)).toEqual(user);

      const logout = await app.inject({ method: 'GET', url: '/logout', headers: { cookie } });
      expect(logout.statusCode).toBe(200);
      expect(readJson<{ message: string }>(logout)).toEqual({ message: 'Logout' });
      expect(logout.headers['set-cookie']).toBe('sid=; Path=/; HttpOnly; SameSite=Strict; Max-Age=0');

      const after = await app.inject({ method: 'GET', url: '/account', headers: { cookie } });
      expect(after.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(after).code).toBe('UNAUTHENTICATED');
    } finally {
      await close();
    }
  });

  it('logout is idempotent', async () => {
    const { app, close } = await buildTestApp();

    try {
      const none = await app.inject({ method: 'GET', url: '/logout' });
      expect(none.statusCode).toBe(200);
      expect(readJson<{ message: string }>(none)).toEqual({ message: 'Logout' });

      const unknown = await app.inject({
        method: 'GET',
        url: '/logout',
        headers: { cookie: 'sid=3f2b8f7e-8b3c-4a8e-9d55-0c6a2f1b7e10' },
      });
      expect(unknown.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('expires the session 24h after login', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-05-01T08:00:00.000Z'));

    const { app, close } = await buildTestApp();

    try {
      await createUser(app, { username: 'di', email: 'di@example.com', password: 'pw' });
      const cookie = await login(app, { email: 'di@example.com', password: 'pw' });

      vi.setSystemTime(new Date('2026-05-02T07:59:59.000Z'));
      const still = await app.inject({ method: 'GET', url: '/account', headers: { cookie } });
      expect(still.statusCode).toBe(200);

      vi.setSystemTime(new Date('2026-05-02T08:00:00.000Z'));
      const expired = await app.inject({ method: 'GET', url: '/account', headers: { cookie } });
      expect(expired.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(expired).code).toBe('UNAUTHENTICATED');
    } finally {
      await close();
    }
  });
});
