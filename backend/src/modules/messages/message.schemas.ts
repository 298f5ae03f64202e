/**
 * backend/src/modules/messages/message.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Messages module.
 *
 * RULES:
 * - Form posts send strings; `read` accepts "true"/"false" as well as booleans.
 */

import { z } from 'zod';

export const createMessageSchema = z.object({
  subject: z
    .string({ invalid_type_error: 'Subject must be text' })
    .trim()
    .max(500, 'Subject is too long')
    .default(''),
  body: z
    .string({ required_error: 'Body is required', invalid_type_error: 'Body is required' })
    .min(1, 'Body is required'),
});

const readFlag = z.union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')], {
  errorMap: () => ({ message: 'Read must be true or false' }),
});

export const updateMessageSchema = z.object({
  read: readFlag,
});
