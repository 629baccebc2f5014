/**
 * src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP → UserService for /admin/users.
 *
 * RULES:
 * - Admin role required on every endpoint.
 * - No DB access here. No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { requireSession } from '../../shared/http/require-auth-context';
import type { UserService } from './user.service';
import { UserErrors } from './user.errors';
import { createUserSchema, setUserActiveSchema, userIdParamsSchema } from './user.schemas';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async list(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { role: 'admin' });

    const users = await this.userService.listUsers();
    return reply.status(200).send({ users });
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const { identity } = requireSession(req, { role: 'admin' });

    const parsed = createUserSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const message = parsed.error.issues[0]?.message ?? 'Invalid request body';
      throw UserErrors.invalidInput(message, { issues: parsed.error.issues });
    }

    const user = await this.userService.createUser(identity, parsed.data, {
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send({ user });
  }

  async setActive(req: FastifyRequest, reply: FastifyReply) {
    const { identity } = requireSession(req, { role: 'admin' });

    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) throw UserErrors.notFound();

    const body = setUserActiveSchema.safeParse(req.body ?? {});
    if (!body.success) {
      const message = body.error.issues[0]?.message ?? 'Invalid request body';
      throw UserErrors.invalidInput(message, { issues: body.error.issues });
    }

    const user = await this.userService.setUserActive(
      identity,
      { userId: params.data.id, isActive: body.data.isActive },
      { requestId: req.requestContext.requestId },
    );

    return reply.status(200).send({ user });
  }
}
