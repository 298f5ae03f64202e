/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent: `{ message, code }`.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 *
 * NOTE:
 * - UNAUTHENTICATED and UNAUTHORIZED both answer 401 (single-signal contract).
 *   The code is what tells "no session" apart from "not yours".
 */

export const APP_ERROR_CODES = [
  'UNAUTHENTICATED',
  'UNAUTHORIZED',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'DUPLICATE_EMAIL',
  'DUPLICATE_NAME',
  'INVALID_CREDENTIALS',
  'ALREADY_AUTHENTICATED',
  'RATE_LIMITED',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; status: number; meta?: AppErrorMeta }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
  }

  static unauthenticated(message = 'Authentication required', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHENTICATED', status: 401, message, meta });
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta });
  }

  static badRequest(code: AppErrorCode, message: string, meta?: AppErrorMeta) {
    return new AppError({ code, status: 400, message, meta });
  }
}
