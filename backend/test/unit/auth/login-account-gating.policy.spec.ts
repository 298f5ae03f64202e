import { describe, it, expect } from 'vitest';
import { getLoginAccountGatingFailure } from '../../../src/modules/auth/policies/login-account-gating.policy';
import { AppError } from '../../../src/shared/http/errors';

describe('getLoginAccountGatingFailure', () => {
  it('returns user_inactive with INVALID_CREDENTIALS for an inactive account', () => {
    const res = getLoginAccountGatingFailure({ id: 'u1', isActive: false });

    expect(res).not.toBeNull();
    expect(res!.reason).toBe('user_inactive');
    expect(res!.error).toBeInstanceOf(AppError);
    const e = res!.error as AppError;
    expect(e.status).toBe(400);
    expect(e.code).toBe('INVALID_CREDENTIALS');
    expect(e.message).toBe('Invalid credentials');
  });

  it('returns null for an active account', () => {
    expect(getLoginAccountGatingFailure({ id: 'u1', isActive: true })).toBeNull();
  });
});
