/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints: `{ message, code }`.
 * - Internal details (meta, stack traces, driver messages) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - RateLimitError → 429 response.
 * - Fastify client errors (malformed JSON, unsupported content type) → 400.
 * - Unexpected errors (store failures included) → 500 with generic message.
 * - Unknown routes → 404.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Always use withRequestContext(req) so requestId and userId are in every log line.
 */

import type { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import type { AppErrorCode } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  message: string;
  code: string;
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'sessionId',
  'password',
  'passwordHash',
  'secret',
]);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: AppErrorCode, message: string): ErrorResponseBody {
  return { message, code };
}

function isClientError(err: FastifyError): boolean {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Framework-level request errors (bad JSON, empty body with JSON content type, ...)
    if (isClientError(err)) {
      log.warn('request_error', {
        flow: 'http.error',
        fastifyCode: err.code,
        message: err.message,
      });

      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request body'));
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.error', url: req.url });
    return reply.status(404).send(buildResponse('NOT_FOUND', 'Not found'));
  });
}
