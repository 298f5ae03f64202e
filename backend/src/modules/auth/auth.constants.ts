/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  register: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
} as const;

export const REGISTER_PROMPT_RESPONSE = { message: 'Register' } as const;

export const LOGOUT_RESPONSE = { message: 'Logout' } as const;
