/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so services don't repeat it on every audit call.
 * - The context is frozen at construction; build a new writer per transaction.
 * - Thin wrapper over AuditRepo: adds no business logic.
 *
 * RULES:
 * - No module types imported here (shared must stay module-agnostic).
 * - No AppError.
 */

import type { AuditRepo } from './audit.repo';
import type { AuditAction, AuditContext, AuditMetadata } from './audit.types';

const EMPTY_CONTEXT: AuditContext = {
  userId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

export class AuditWriter {
  private readonly repo: AuditRepo;
  private readonly context: Readonly<AuditContext>;

  constructor(repo: AuditRepo, context?: Partial<AuditContext>) {
    this.repo = repo;
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  async append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    await this.repo.append({
      ...this.context,
      action,
      metadata,
    });
  }
}

