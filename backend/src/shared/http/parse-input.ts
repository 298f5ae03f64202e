/**
 * backend/src/shared/http/parse-input.ts
 *
 * WHY:
 * - Every controller validates bodies and path ids the same way.
 *
 * RULES:
 * - Body failures -> 400 VALIDATION_ERROR carrying the first issue's message
 *   (schemas word those messages for clients, e.g. "Email is required").
 * - Path ids are UUIDs; anything else can never match a row, so callers answer 404.
 */

import { z } from 'zod';
import { AppError } from './errors';

const IdParamsSchema = z.object({
  id: z.string().uuid(),
});

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  // No body at all (e.g. empty form post) is treated as an empty object so that
  // field-level messages are reported.
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw AppError.validationError(first?.message ?? 'Invalid request body', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Returns the `:id` path param when it is a UUID, otherwise null.
 */
export function readIdParam(params: unknown): string | null {
  const parsed = IdParamsSchema.safeParse(params);
  return parsed.success ? parsed.data.id : null;
}
