/**
 * backend/src/modules/users/user.presenter.ts
 *
 * Public JSON shape of a User. Never includes the password hash.
 */

import type { User } from './user.types';

export type UserResponse = {
  id: string;
  username: string;
  email: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
};

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    isActive: user.isActive,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}
