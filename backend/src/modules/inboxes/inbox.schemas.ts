/**
 * backend/src/modules/inboxes/inbox.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Inboxes module.
 *
 * RULES:
 * - The URL is server-derived; a client-sent `url` is ignored (zod strips unknown keys).
 */

import { z } from 'zod';

const nameField = z
  .string({ required_error: 'Name is required', invalid_type_error: 'Name is required' })
  .trim()
  .min(1, 'Name is required')
  .max(200, 'Name is too long');

export const createInboxSchema = z.object({
  name: nameField,
});

export const updateInboxSchema = z.object({
  name: nameField,
});
