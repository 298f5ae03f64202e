/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (trail stored in DB).
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction uses a union + escape hatch to catch typos early.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Never import module types here (shared must stay module-agnostic).
 */

export type KnownAuditAction =
  // Auth
  | 'auth.register.success'
  | 'auth.login.success'
  | 'auth.login.failed'
  | 'auth.logout'
  // Users
  | 'user.created'
  | 'user.updated'
  | 'user.deleted'
  // Inboxes
  | 'inbox.created'
  | 'inbox.updated'
  | 'inbox.deleted'
  // Messages
  | 'message.deleted';

export type AuditAction = KnownAuditAction | (string & {});

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context that is identical across every audit event
 * within a single request. userId is filled once the caller is known.
 */
export type AuditContext = {
  userId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

/**
 * Full audit event shape for DB insertion.
 * Used by AuditRepo only (low-level).
 */
export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
