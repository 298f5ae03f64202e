/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin while isolating the login orchestration.
 * - Two-phase audit pattern:
 *   - success audit inside tx
 *   - failure audit outside tx (survives rollback)
 *
 * RULES:
 * - No HTTP concerns here (controller sets the cookie).
 * - No raw SQL here (use queries/repos).
 * - Rate limit before any DB work.
 * - Every failure answers the same INVALID_CREDENTIALS; only the audit reason differs.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { SessionStore } from '../../../../shared/session/session.store';

import { getUserCredentialsByEmail } from '../../../users';
import type { User } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { auditLoginFailed, auditLoginSuccess } from '../../auth.audit';
import { toAuditContext } from '../../auth.types';
import type { AuthSessionResult, LoginParams } from '../../auth.types';
import { getLoginAccountGatingFailure } from '../../policies/login-account-gating.policy';

// ── PII-safe helpers ─────────────────────────────────────────
export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

type LoginFailureContext = {
  userId: string | null;
  email: string;
  reason: string;
  error: Error;
};

export async function executeLoginFlow(
  deps: {
    db: DbExecutor;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    auditRepo: AuditRepo;
    sessionStore: SessionStore;
  },
  params: LoginParams,
): Promise<AuthSessionResult> {
  const email = params.email.toLowerCase();
  const emailKey = deps.tokenHasher.hash(email);

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.login.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  // Filled by the tx callback right before it throws; read after the rollback.
  const failure: { ctx: LoginFailureContext | null } = { ctx: null };

  let user: User;
  try {
    user = await deps.db.transaction().execute(async (trx): Promise<User> => {
      const credentials = await getUserCredentialsByEmail(trx, email);
      if (!credentials) {
        failure.ctx = {
          userId: null,
          email,
          reason: 'user_not_found',
          error: AuthErrors.invalidCredentials(),
        };
        throw failure.ctx.error;
      }

      const gatingFailure = getLoginAccountGatingFailure(credentials.user);
      if (gatingFailure) {
        failure.ctx = {
          userId: credentials.user.id,
          email,
          reason: gatingFailure.reason,
          error: gatingFailure.error,
        };
        throw failure.ctx.error;
      }

      const passwordValid = await deps.passwordHasher.verify(
        params.password,
        credentials.passwordHash,
      );
      if (!passwordValid) {
        failure.ctx = {
          userId: credentials.user.id,
          email,
          reason: 'wrong_password',
          error: AuthErrors.invalidCredentials(),
        };
        throw failure.ctx.error;
      }

      const audit = new AuditWriter(
        deps.auditRepo.withDb(trx),
        toAuditContext(params, credentials.user.id),
      );
      await auditLoginSuccess(audit, {
        userId: credentials.user.id,
        email: credentials.user.email,
      });

      return credentials.user;
    });
  } catch (err) {
    const ctx = failure.ctx;
    if (ctx) {
      const failAudit = new AuditWriter(deps.auditRepo, toAuditContext(params, ctx.userId));
      await auditLoginFailed(failAudit, { email: ctx.email, reason: ctx.reason });

      deps.logger.warn({
        msg: 'auth.login.failed',
        flow: 'auth.login',
        requestId: params.requestId,
        reason: ctx.reason,
        emailKey,
      });
    }

    throw err;
  }

  const { sessionId } = await deps.sessionStore.create({
    userId: user.id,
    now: new Date(),
  });

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: params.requestId,
    userId: user.id,
  });

  return {
    user,
    sessionId,
    maxAgeSeconds: deps.sessionStore.sessionTtlSeconds,
  };
}
