/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { getUserById, getUserCredentialsByEmail, toUser } from './queries/user.queries';
export { createUserSchema } from './user.schemas';
export { UserErrors } from './user.errors';
export { toUserResponse } from './user.presenter';
export type { UserResponse } from './user.presenter';
export { USERS_EMAIL_UNIQUE } from './user.service';
export { auditUserCreated } from './user.audit';
export type { User, UserCredentials } from './user.types';
