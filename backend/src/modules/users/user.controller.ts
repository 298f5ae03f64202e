/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for /users.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod (parseBody) and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseBody, readIdParam } from '../../shared/http/parse-input';
import { auditContextOf } from '../../shared/http/audit-context';
import { optionalSession } from '../../shared/http/require-auth-context';

import { createUserSchema, updateUserSchema } from './user.schemas';
import { UserErrors } from './user.errors';
import { toUserResponse } from './user.presenter';
import type { UserService } from './user.service';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = this.requireUserId(req);
    const user = await this.userService.getUser(userId);
    return reply.status(200).send(toUserResponse(user));
  }

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(createUserSchema, req.body);

    const user = await this.userService.createUser({
      ...body,
      audit: auditContextOf(req),
    });

    return reply.status(201).send(toUserResponse(user));
  }

  async updateUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = this.requireUserId(req);
    const update = parseBody(updateUserSchema, req.body);

    const user = await this.userService.updateUser({
      userId,
      update,
      caller: optionalSession(req),
      audit: auditContextOf(req),
    });

    return reply.status(200).send(toUserResponse(user));
  }

  async deleteUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = this.requireUserId(req);

    await this.userService.deleteUser({
      userId,
      caller: optionalSession(req),
      audit: auditContextOf(req),
    });

    return reply.status(204).send();
  }

  private requireUserId(req: FastifyRequest): string {
    const userId = readIdParam(req.params);
    if (!userId) throw UserErrors.notFound();
    return userId;
  }
}
