/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates register, login, logout and "who am I".
 * - Delegates the multi-step use-cases to flows/ (deep modules).
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Never store/log raw passwords or session ids.
 * - Logout is idempotent: unknown or expired sessions are not an error.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { SessionStore } from '../../shared/session/session.store';
import type { Identity } from '../../shared/http/require-auth-context';

import type { UserRepo } from '../users/dal/user.repo';
import { getUserById } from '../users';
import type { User } from '../users';

import { AuthErrors } from './auth.errors';
import { auditLogout } from './auth.audit';
import { toAuditContext } from './auth.types';
import type { AuthRequestMeta, AuthSessionResult, LoginParams, RegisterParams } from './auth.types';
import { executeLoginFlow } from './flows/login/execute-login-flow';
import { assertMayRegister, executeRegisterFlow } from './flows/register/execute-register-flow';

export class AuthService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      tokenHasher: TokenHasher;
      passwordHasher: PasswordHasher;
      logger: Logger;
      rateLimiter: RateLimiter;
      auditRepo: AuditRepo;
      sessionStore: SessionStore;
      userRepo: UserRepo;
    },
  ) {}

  /** GET /register: tells an anonymous caller to register, refuses a signed-in one. */
  registerPrompt(caller: Identity | null): void {
    assertMayRegister(caller);
  }

  async register(params: RegisterParams & { caller: Identity | null }): Promise<User> {
    return executeRegisterFlow(this.deps, params);
  }

  async login(params: LoginParams): Promise<AuthSessionResult> {
    return executeLoginFlow(this.deps, params);
  }

  /**
   * Destroys the session (if any). `session` is the resolved live session,
   * `rawSessionId` the cookie value even when it no longer resolves.
   */
  async logout(
    params: AuthRequestMeta & { session: Identity | null; rawSessionId: string | null },
  ): Promise<void> {
    const sessionId = params.session?.sessionId ?? params.rawSessionId;
    if (sessionId) {
      await this.deps.sessionStore.destroy(sessionId);
    }

    if (params.session) {
      const audit = new AuditWriter(
        this.deps.auditRepo,
        toAuditContext(params, params.session.userId),
      );
      await auditLogout(audit, { userId: params.session.userId });
    }

    this.deps.logger.info({
      msg: 'auth.logout',
      flow: 'auth.logout',
      requestId: params.requestId,
      userId: params.session?.userId ?? null,
    });
  }

  /**
   * Returns the signed-in user. A session whose user was deleted is treated as no session.
   */
  async getAccount(identity: Identity): Promise<User> {
    const user = await getUserById(this.deps.db, identity.userId);
    if (!user) {
      await this.deps.sessionStore.destroy(identity.sessionId);
      throw AuthErrors.accountGone({ userId: identity.userId });
    }
    return user;
  }
}
