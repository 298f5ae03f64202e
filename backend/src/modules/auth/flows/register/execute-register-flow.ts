/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - Self-service sign-up: same user record as POST /users, plus the auth audit.
 * - Keeps AuthService thin.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Callers that already hold a session are rejected before any work.
 * - Password is hashed before the transaction opens.
 * - Both audits (user.created, auth.register.success) commit with the user row.
 * - Registration does not sign the user in; the client calls /login next.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { Identity } from '../../../../shared/http/require-auth-context';
import { isUniqueViolation } from '../../../../shared/db/pg-errors';

import type { UserRepo } from '../../../users/dal/user.repo';
import { auditUserCreated, toUser, USERS_EMAIL_UNIQUE, UserErrors } from '../../../users';
import type { User } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { auditRegisterSuccess } from '../../auth.audit';
import { toAuditContext } from '../../auth.types';
import type { RegisterParams } from '../../auth.types';
import { emailDomain } from '../login/execute-login-flow';

/** Registration is for anonymous callers only. */
export function assertMayRegister(caller: Identity | null): void {
  if (caller) {
    throw AuthErrors.alreadyAuthenticated({ userId: caller.userId });
  }
}

export async function executeRegisterFlow(
  deps: {
    db: DbExecutor;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    auditRepo: AuditRepo;
    userRepo: UserRepo;
  },
  params: RegisterParams & { caller: Identity | null },
): Promise<User> {
  assertMayRegister(params.caller);

  const email = params.email.toLowerCase();
  const emailKey = deps.tokenHasher.hash(email);

  deps.logger.info({
    msg: 'auth.register.start',
    flow: 'auth.register',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.register.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `register:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.register.perIp,
  });

  const passwordHash = await deps.passwordHasher.hash(params.password);

  let user: User;
  try {
    user = await deps.db.transaction().execute(async (trx) => {
      const row = await deps.userRepo.withDb(trx).insertUser({
        username: params.username,
        email,
        passwordHash,
      });
      const created = toUser(row);

      const audit = new AuditWriter(deps.auditRepo.withDb(trx), toAuditContext(params, created.id));
      await auditUserCreated(audit, created);
      await auditRegisterSuccess(audit, { userId: created.id, email: created.email });

      return created;
    });
  } catch (err) {
    if (isUniqueViolation(err, USERS_EMAIL_UNIQUE)) throw UserErrors.duplicateEmail();
    throw err;
  }

  deps.logger.info({
    msg: 'auth.register.success',
    flow: 'auth.register',
    requestId: params.requestId,
    userId: user.id,
  });

  return user;
}
