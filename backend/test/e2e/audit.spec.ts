import { describe, it, expect } from 'vitest';

import { buildTestApp } from '../helpers/build-test-app';
import { createInbox, createUser, login } from '../helpers/http';

/**
 * Each test builds its own app (fresh DB), so unscoped queries only see that test's rows.
 */
describe('audit trail', () => {
  it('records user, inbox and auth events with request context', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const user = await createUser(app, { username: 'aud', email: 'aud@example.com', password: 'pw' });
      await createInbox(app, user.id, 'general');

      const failed = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { email: 'aud@example.com', password: 'wrong' },
      });
      expect(failed.statusCode).toBe(400);

      const cookie = await login(app, { email: 'aud@example.com', password: 'pw' });
      await app.inject({ method: 'GET', url: '/logout', headers: { cookie } });

      const rows = await deps.db
        .selectFrom('audit_events')
        .select(['action', 'request_id', 'metadata'])
        .where('user_id', '=', user.id)
        .orderBy('created_at', 'asc')
        .execute();

      expect(rows.map((r) => r.action)).toEqual([
        'auth.login.failed',
        'auth.login.success',
        'auth.logout',
      ]);
      expect(rows.every((r) => typeof r.request_id === 'string')).toBe(true);
      expect(rows[0]?.metadata).toEqual({ email: 'aud@example.com', reason: 'wrong_password' });

      // Anonymous writes carry no actor; the subject is in the metadata.
      const anonymous = await deps.db
        .selectFrom('audit_events')
        .select(['action', 'user_id', 'metadata'])
        .where('action', 'in', ['user.created', 'inbox.created'])
        .orderBy('created_at', 'asc')
        .execute();

      expect(anonymous.map((r) => [r.action, r.user_id])).toEqual([
        ['user.created', null],
        ['inbox.created', null],
      ]);
      expect(anonymous[0]?.metadata).toEqual({ userId: user.id, email: 'aud@example.com' });
      expect(anonymous[1]?.metadata).toMatchObject({ ownerId: user.id, name: 'general' });
    } finally {
      await close();
    }
  });

  it('records a failed login for an unknown email without a user id', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      await app.inject({
        method: 'POST',
        url: '/login',
        payload: { email: 'ghost@example.com', password: 'pw' },
      });

      const row = await deps.db
        .selectFrom('audit_events')
        .select(['user_id', 'metadata'])
        .where('action', '=', 'auth.login.failed')
        .executeTakeFirst();

      expect(row!.user_id).toBeNull();
      expect(row!.metadata).toEqual({ email: 'ghost@example.com', reason: 'user_not_found' });
    } finally {
      await close();
    }
  });
});
