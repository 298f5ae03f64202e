/**
 * backend/src/modules/inboxes/inbox.types.ts
 *
 * WHY:
 * - Domain types for the Inboxes module.
 * - An inbox belongs to exactly one user; its public URL is derived, never stored.
 */

export type InboxId = string;

export type Inbox = {
  id: InboxId;
  name: string;
  userId: string;

  createdAt: Date;
  updatedAt: Date;
};
