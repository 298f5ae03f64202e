/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are global identities; one email = one user.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - The password hash never leaves the module except through UserCredentials.
 */

export type UserId = string;

export type User = {
  id: UserId;
  username: string;
  email: string;
  isActive: boolean;

  createdAt: Date;
  updatedAt: Date;
};

/** Login-only view: the user plus the stored bcrypt digest. */
export type UserCredentials = {
  user: User;
  passwordHash: string;
};

export type CreateUserInput = {
  username: string;
  email: string;
  password: string;
};

export type UserUpdate = {
  username?: string;
  email?: string;
  password?: string;
};
