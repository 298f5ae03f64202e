import { describe, it, expect } from 'vitest';

import { buildTestApp } from '../helpers/build-test-app';
import { login, readJson } from '../helpers/http';
import type { InboxBody, UserBody } from '../helpers/http';

describe('dev seed on start', () => {
  it('makes the demo account usable right away', async () => {
    const { app, close } = await buildTestApp({
      seed: { enabled: true, email: 'seeded@example.com', password: 'seed-password' },
    });

    try {
      const cookie = await login(app, { email: 'seeded@example.com', password: 'seed-password' });

      const account = await app.inject({ method: 'GET', url: '/account', headers: { cookie } });
      const user = readJson<UserBody>(account);
      expect(user.username).toBe('demo');

      const inboxes = await app.inject({ method: 'GET', url: `/users/${user.id}/inboxes` });
      expect(readJson<InboxBody[]>(inboxes).map((i) => i.name)).toEqual(['general']);
    } finally {
      await close();
    }
  });
});
