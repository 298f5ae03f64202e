/**
 * backend/src/shared/http/audit-context.ts
 *
 * WHY:
 * - Services write audits without touching Fastify; controllers hand them this
 *   request-level context instead.
 */

import type { FastifyRequest } from 'fastify';
import type { AuditContext } from '../audit/audit.types';

export function auditContextOf(req: FastifyRequest): AuditContext {
  return {
    userId: req.authContext?.userId ?? null,
    requestId: req.requestContext.requestId,
    ip: req.requestContext.ip,
    userAgent: req.requestContext.userAgent,
  };
}
