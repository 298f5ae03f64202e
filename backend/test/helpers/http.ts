import type { FastifyInstance, LightMyRequestResponse } from 'fastify';

export type ErrorResponseBody = {
  message: string;
  code: string;
};

export type UserBody = {
  id: string;
  username: string;
  email: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
};

export type InboxBody = {
  id: string;
  name: string;
  userId: string;
  url: string;
  createdAt: string;
  updatedAt: string;
};

export type MessageBody = {
  id: string;
  subject: string;
  body: string;
  read: boolean;
  inboxId: string;
  createdAt: string;
  updatedAt: string;
};

export function readJson<T>(res: { json: () => unknown }): T {
  // Fastify inject returns `any` for json() in many typings.
  return res.json() as T;
}

/** Extracts "sid=<value>" from the Set-Cookie header, ready to send back as Cookie. */
export function sessionCookieFrom(res: LightMyRequestResponse): string {
  const header = res.headers['set-cookie'];
  const raw = Array.isArray(header) ? header[0] : header;
  if (!raw) throw new Error('response has no Set-Cookie header');

  const pair = raw.split(';')[0];
  if (!pair?.startsWith('sid=')) throw new Error(`unexpected Set-Cookie: ${raw}`);
  return pair;
}

export async function createUser(
  app: FastifyInstance,
  input: { username: string; email: string; password: string },
): Promise<UserBody> {
  const res = await app.inject({ method: 'POST', url: '/users', payload: input });
  if (res.statusCode !== 201) {
    throw new Error(`createUser failed: ${res.statusCode} ${res.body}`);
  }
  return readJson<UserBody>(res);
}

export async function login(
  app: FastifyInstance,
  input: { email: string; password: string },
): Promise<string> {
  const res = await app.inject({ method: 'POST', url: '/login', payload: input });
  if (res.statusCode !== 200) {
    throw new Error(`login failed: ${res.statusCode} ${res.body}`);
  }
  return sessionCookieFrom(res);
}

export async function createInbox(
  app: FastifyInstance,
  userId: string,
  name: string,
): Promise<InboxBody> {
  const res = await app.inject({
    method: 'POST',
    url: `/users/${userId}/inboxes`,
    payload: { name },
  });
  if (res.statusCode !== 201) {
    throw new Error(`createInbox failed: ${res.statusCode} ${res.body}`);
  }
  return readJson<InboxBody>(res);
}
