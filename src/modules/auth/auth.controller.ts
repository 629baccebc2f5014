/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Sets the signed session cookie on login, clears it on logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie logic lives in shared/session/set-session-cookie.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { loginSchema } from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import type { AuthService } from './auth.service';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import { requireSession } from '../../shared/http/require-auth-context';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly isProduction: boolean,
  ) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { result, cookieValue } = await this.authService.login({
      username: parsed.data.username,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    setSessionCookie(reply, cookieValue, this.isProduction);
    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    await this.authService.logout({
      sessionId: session.sessionId,
      userId: session.identity.id,
      requestId: req.requestContext.requestId,
    });

    clearSessionCookie(reply, this.isProduction);
    return reply.status(200).send({ status: 'LOGGED_OUT', redirectTo: '/auth/login' });
  }

  me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    return reply.status(200).send({ user: session.identity });
  }
}
