/**
 * backend/src/modules/inboxes/index.ts
 *
 * WHY:
 * - Public surface of the inboxes module (messages authorize through it).
 */

export { getInboxById } from './queries/inbox.queries';
export { loadOwnedInbox } from './inbox.service';
export { authorize, assertAuthorized } from './policies/inbox-access.policy';
export type { AccessDecision, AccessResource } from './policies/inbox-access.policy';
export { InboxErrors } from './inbox.errors';
export type { Inbox } from './inbox.types';
