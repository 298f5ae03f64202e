/**
 * backend/src/modules/inboxes/policies/inbox-access.policy.ts
 *
 * WHY:
 * - Ownership is the only authorization rule in the system:
 *   an identity may act on an inbox it owns, and on a message whose inbox it owns.
 * - Pure (no DB / no HTTP) so every rule is unit-testable with plain objects.
 *
 * RULES:
 * - Callers load the resource (and check existence) BEFORE calling authorize().
 * - Messages are authorized through their inbox; there is no per-message owner.
 * - The decision carries the reason for logs and the error to throw.
 */

import type { Identity } from '../../../shared/http/require-auth-context';
import { InboxErrors } from '../inbox.errors';

export type InboxLike = Readonly<{
  id: string;
  userId: string;
}>;

export type MessageLike = Readonly<{
  id: string;
  inboxId: string;
}>;

export type AccessResource =
  | { kind: 'inbox'; inbox: InboxLike }
  | { kind: 'message'; message: MessageLike; inbox: InboxLike };

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: 'not_inbox_owner' | 'message_inbox_mismatch'; error: Error };

export function authorize(identity: Identity, resource: AccessResource): AccessDecision {
  if (resource.kind === 'message' && resource.message.inboxId !== resource.inbox.id) {
    // Caller passed the wrong inbox; never grant on a broken chain.
    return {
      allowed: false,
      reason: 'message_inbox_mismatch',
      error: InboxErrors.notOwner({ messageId: resource.message.id }),
    };
  }

  if (resource.inbox.userId !== identity.userId) {
    return {
      allowed: false,
      reason: 'not_inbox_owner',
      error: InboxErrors.notOwner({ inboxId: resource.inbox.id }),
    };
  }

  return { allowed: true };
}

export function assertAuthorized(identity: Identity, resource: AccessResource): void {
  const decision = authorize(identity, resource);
  if (!decision.allowed) throw decision.error;
}
