/**
 * src/modules/users/user.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.get('/admin/users', controller.list.bind(controller));
  app.post('/admin/users', controller.create.bind(controller));
  app.patch('/admin/users/:id/active', controller.setActive.bind(controller));
}
