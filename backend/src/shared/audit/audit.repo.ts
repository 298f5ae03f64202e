/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit writer (DB persistence).
 * - Services call this when "user did something meaningful".
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here.
 * - No AppError.
 * - Must work with both DB and transactions (DbExecutor).
 * - Metadata is accepted as plain object and serialized here.
 */

import type { DbExecutor } from '../db/db';
import type { AuditEventInsert, AuditMetadata } from './audit.types';

function serializeMetadata(input: AuditMetadata | undefined): string {
  // JSON.stringify drops undefined values and functions.
  return JSON.stringify(input ?? {});
}

export class AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Returns a repo bound to a different executor (e.g. a transaction).
   * This keeps the "repo instance" pattern while supporting trx usage.
   */
  withDb(db: DbExecutor): AuditRepo {
    return new AuditRepo(db);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        user_id: event.userId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        metadata: serializeMetadata(event.metadata),
      })
      .execute();
  }
}
