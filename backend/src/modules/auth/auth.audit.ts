/**
 * src/modules/auth/auth.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Auth module.
 * - Keeps audit metadata consistent per domain action.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - No business rules.
 * - Never include passwords, hashes, or session ids in metadata.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditRegisterSuccess(
  writer: AuditWriter,
  data: { userId: string; email: string },
): Promise<void> {
  return writer.append('auth.register.success', {
    userId: data.userId,
    email: data.email,
  });
}

export function auditLoginSuccess(
  writer: AuditWriter,
  data: { userId: string; email: string },
): Promise<void> {
  return writer.append('auth.login.success', {
    userId: data.userId,
    email: data.email,
  });
}

export function auditLoginFailed(
  writer: AuditWriter,
  data: { email: string; reason: string },
): Promise<void> {
  return writer.append('auth.login.failed', {
    email: data.email,
    reason: data.reason,
  });
}

export function auditLogout(writer: AuditWriter, data: { userId: string }): Promise<void> {
  return writer.append('auth.logout', {
    userId: data.userId,
  });
}
