/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for all auth endpoints.
 * - Sets the session cookie on login, clears it on logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie logic lives in shared/session/set-session-cookie (DRY).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseBody } from '../../shared/http/parse-input';
import { optionalSession, requireSession } from '../../shared/http/require-auth-context';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import { readSessionId } from '../../shared/session/session.middleware';

import { toUserResponse } from '../users';

import { loginSchema, registerSchema } from './auth.schemas';
import { LOGOUT_RESPONSE, REGISTER_PROMPT_RESPONSE } from './auth.constants';
import type { AuthService } from './auth.service';
import type { AuthRequestMeta } from './auth.types';

function requestMeta(req: FastifyRequest): AuthRequestMeta {
  return {
    requestId: req.requestContext.requestId,
    ip: req.requestContext.ip,
    userAgent: req.requestContext.userAgent,
  };
}

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly isProduction: boolean,
  ) {}

  async registerPrompt(req: FastifyRequest, reply: FastifyReply) {
    this.authService.registerPrompt(optionalSession(req));
    return reply.status(200).send(REGISTER_PROMPT_RESPONSE);
  }

  async register(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(registerSchema, req.body);

    const user = await this.authService.register({
      ...requestMeta(req),
      ...body,
      caller: optionalSession(req),
    });

    return reply.status(201).send(toUserResponse(user));
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(loginSchema, req.body);

    const { user, sessionId, maxAgeSeconds } = await this.authService.login({
      ...requestMeta(req),
      email: body.email,
      password: body.password,
    });

    setSessionCookie(reply, sessionId, { isProduction: this.isProduction, maxAgeSeconds });
    return reply.status(200).send(toUserResponse(user));
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    await this.authService.logout({
      ...requestMeta(req),
      session: optionalSession(req),
      rawSessionId: readSessionId(req),
    });

    clearSessionCookie(reply, this.isProduction);
    return reply.status(200).send(LOGOUT_RESPONSE);
  }

  async account(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireSession(req);
    const user = await this.authService.getAccount(identity);
    return reply.status(200).send(toUserResponse(user));
  }
}
