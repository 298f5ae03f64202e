/**
 * backend/src/modules/auth/policies/login-account-gating.policy.ts
 *
 * WHY:
 * - Which accounts may sign in is a security rule; keep it pure + unit-testable.
 *
 * RULES:
 * - Runs on an account that exists; the flow answers a missing one itself
 *   (same INVALID_CREDENTIALS, audit reason user_not_found).
 * - Inactive account -> invalid credentials (anti-enumeration).
 * - The password check runs only after this passes.
 *
 * IMPORTANT:
 * - The login flow needs the reason for the failure audit, so the failure is
 *   returned (not thrown) and the flow throws it after recording context.
 */

import { AuthErrors } from '../auth.errors';

export type LoginAccountLike = Readonly<{
  id: string;
  isActive: boolean;
}>;

export type LoginAccountGatingFailure = { reason: 'user_inactive'; error: Error };

export function getLoginAccountGatingFailure(
  account: LoginAccountLike,
): LoginAccountGatingFailure | null {
  if (!account.isActive) {
    return { reason: 'user_inactive', error: AuthErrors.invalidCredentials() };
  }
  return null;
}
