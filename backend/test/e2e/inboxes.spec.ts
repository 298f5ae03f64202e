import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';

import { buildTestApp, TEST_PUBLIC_BASE_URL } from '../helpers/build-test-app';
import { createInbox, createUser, login, readJson } from '../helpers/http';
import type { ErrorResponseBody, InboxBody, UserBody } from '../helpers/http';

const MISSING_ID = '3f2b8f7e-8b3c-4a8e-9d55-0c6a2f1b7e10';

describe('inboxes', () => {
  let app: FastifyInstance;
  let close: () => Promise<void>;

  let alice: UserBody;
  let bob: UserBody;
  let aliceCookie: string;
  let bobCookie: string;

  beforeAll(async () => {
    const built = await buildTestApp();
    app = built.app;
    close = built.close;

    alice = await createUser(app, { username: 'alice', email: 'alice@example.com', password: 'pw-a' });
    bob = await createUser(app, { username: 'bob', email: 'bob@example.com', password: 'pw-b' });
    aliceCookie = await login(app, { email: 'alice@example.com', password: 'pw-a' });
    bobCookie = await login(app, { email: 'bob@example.com', password: 'pw-b' });
  });

  afterAll(async () => {
    await close();
  });

  describe('POST /users/:id/inboxes', () => {
    it('creates an inbox with a derived public url', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/users/${alice.id}/inboxes`,
        payload: { name: ' work ' },
      });

      expect(res.statusCode).toBe(201);
      const body = readJson<InboxBody>(res);
      expect(body.name).toBe('work');
      expect(body.userId).toBe(alice.id);
      expect(body.url).toBe(`${TEST_PUBLIC_BASE_URL}/inboxes/${body.id}`);
    });

    it('rejects a second inbox with the same name for the same user', async () => {
      await createInbox(app, alice.id, 'dupe');

      const res = await app.inject({
        method: 'POST',
        url: `/users/${alice.id}/inboxes`,
        payload: { name: 'dupe' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        message: 'Inbox already exists',
        code: 'DUPLICATE_NAME',
      });

      // another owner may reuse the name
      const other = await app.inject({
        method: 'POST',
        url: `/users/${bob.id}/inboxes`,
        payload: { name: 'dupe' },
      });
      expect(other.statusCode).toBe(201);
    });

    it('requires a name', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/users/${alice.id}/inboxes`,
        payload: { name: '' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        message: 'Name is required',
        code: 'VALIDATION_ERROR',
      });
    });

    it('404s for an unknown user', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/users/${MISSING_ID}/inboxes`,
        payload: { name: 'orphan' },
      });

      expect(res.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(res).message).toBe('User not found');
    });
  });

  describe('GET /users/:id/inboxes', () => {
    it('lists only that user inboxes, oldest first', async () => {
      const carol = await createUser(app, {
        username: 'carol',
        email: 'carol@example.com',
        password: 'pw',
      });
      const first = await createInbox(app, carol.id, 'first');
      const second = await createInbox(app, carol.id, 'second');

      const res = await app.inject({ method: 'GET', url: `/users/${carol.id}/inboxes` });

      expect(res.statusCode).toBe(200);
      expect(readJson<InboxBody[]>(res)).toEqual([first, second]);
    });

    it('returns an empty list for a user without inboxes and 404 for no user', async () => {
      const dave = await createUser(app, { username: 'dave', email: 'dave@example.com', password: 'pw' });

      const empty = await app.inject({ method: 'GET', url: `/users/${dave.id}/inboxes` });
      expect(readJson<InboxBody[]>(empty)).toEqual([]);

      const missing = await app.inject({ method: 'GET', url: `/users/${MISSING_ID}/inboxes` });
      expect(missing.statusCode).toBe(404);
    });
  });

  describe('GET /inboxes/:id', () => {
    it('returns the inbox to its owner', async () => {
      const inbox = await createInbox(app, alice.id, 'mine');

      const res = await app.inject({
        method: 'GET',
        url: `/inboxes/${inbox.id}`,
        headers: { cookie: aliceCookie },
      });

      expect(res.statusCode).toBe(200);
      expect(readJson<InboxBody>(res)).toEqual(inbox);
    });

    it('401 UNAUTHENTICATED without a session', async () => {
      const inbox = await createInbox(app, alice.id, 'private');

      for (const cookie of [undefined, 'sid=not-a-uuid', `sid=${MISSING_ID}`]) {
        const res = await app.inject({
          method: 'GET',
          url: `/inboxes/${inbox.id}`,
          headers: cookie ? { cookie } : {},
        });

        expect(res.statusCode).toBe(401);
        expect(readJson<ErrorResponseBody>(res)).toEqual({
          message: 'Authentication required',
          code: 'UNAUTHENTICATED',
        });
      }
    });

    it('401 UNAUTHORIZED for someone else', async () => {
      const inbox = await createInbox(app, alice.id, 'secret');

      const res = await app.inject({
        method: 'GET',
        url: `/inboxes/${inbox.id}`,
        headers: { cookie: bobCookie },
      });

      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        message: 'Unauthorized',
        code: 'UNAUTHORIZED',
      });
    });

    it('404 for a missing inbox, even for a signed-in caller', async () => {
      for (const id of [MISSING_ID, 'not-a-uuid']) {
        const res = await app.inject({
          method: 'GET',
          url: `/inboxes/${id}`,
          headers: { cookie: bobCookie },
        });

        expect(res.statusCode).toBe(404);
        expect(readJson<ErrorResponseBody>(res)).toEqual({
          message: 'Inbox not found',
          code: 'NOT_FOUND',
        });
      }
    });
  });

  describe('PUT /inboxes/:id', () => {
    it('renames for the owner', async () => {
      const inbox = await createInbox(app, alice.id, 'before');

      const res = await app.inject({
        method: 'PUT',
        url: `/inboxes/${inbox.id}`,
        headers: { cookie: aliceCookie },
        payload: { name: 'after' },
      });

      expect(res.statusCode).toBe(200);
      const body = readJson<InboxBody>(res);
      expect(body.name).toBe('after');
      expect(body.url).toBe(inbox.url);
    });

    it('refuses a rename onto an existing name', async () => {
      await createInbox(app, alice.id, 'taken');
      const inbox = await createInbox(app, alice.id, 'free');

      const res = await app.inject({
        method: 'PUT',
        url: `/inboxes/${inbox.id}`,
        headers: { cookie: aliceCookie },
        payload: { name: 'taken' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).code).toBe('DUPLICATE_NAME');
    });

    it('refuses a non-owner', async () => {
      const inbox = await createInbox(app, alice.id, 'not-bobs');

      const res = await app.inject({
        method: 'PUT',
        url: `/inboxes/${inbox.id}`,
        headers: { cookie: bobCookie },
        payload: { name: 'bobs-now' },
      });

      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(res).code).toBe('UNAUTHORIZED');
    });
  });

  describe('DELETE /inboxes/:id', () => {
    it('deletes the inbox and its messages for the owner', async () => {
      const inbox = await createInbox(app, alice.id, 'to-delete');
      const posted = await app.inject({
        method: 'POST',
        url: `/inboxes/${inbox.id}/messages`,
        payload: { body: 'hello' },
      });
      expect(posted.statusCode).toBe(201);
      const messageId = readJson<{ id: string }>(posted).id;

      const denied = await app.inject({
        method: 'DELETE',
        url: `/inboxes/${inbox.id}`,
        headers: { cookie: bobCookie },
      });
      expect(denied.statusCode).toBe(401);

      const res = await app.inject({
        method: 'DELETE',
        url: `/inboxes/${inbox.id}`,
        headers: { cookie: aliceCookie },
      });
      expect(res.statusCode).toBe(204);

      const inboxGone = await app.inject({
        method: 'GET',
        url: `/inboxes/${inbox.id}`,
        headers: { cookie: aliceCookie },
      });
      expect(inboxGone.statusCode).toBe(404);

      const messageGone = await app.inject({
        method: 'GET',
        url: `/messages/${messageId}`,
        headers: { cookie: aliceCookie },
      });
      expect(messageGone.statusCode).toBe(404);
    });
  });
});
