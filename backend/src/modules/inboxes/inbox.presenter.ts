/**
 * backend/src/modules/inboxes/inbox.presenter.ts
 *
 * Public JSON shape of an Inbox. `url` is derived from PUBLIC_BASE_URL + id on every read.
 */

import type { Inbox } from './inbox.types';

export type InboxResponse = {
  id: string;
  name: string;
  userId: string;
  url: string;
  createdAt: string;
  updatedAt: string;
};

export function buildInboxUrl(publicBaseUrl: string, inboxId: string): string {
  return `${publicBaseUrl.replace(/\/+$/, '')}/inboxes/${inboxId}`;
}

export function toInboxResponse(inbox: Inbox, publicBaseUrl: string): InboxResponse {
  return {
    id: inbox.id,
    name: inbox.name,
    userId: inbox.userId,
    url: buildInboxUrl(publicBaseUrl, inbox.id),
    createdAt: inbox.createdAt.toISOString(),
    updatedAt: inbox.updatedAt.toISOString(),
  };
}
