/**
 * src/modules/admin/admin.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { AdminController } from './admin.controller';

export function registerAdminRoutes(app: FastifyInstance, controller: AdminController) {
  app.get('/admin', controller.dashboard.bind(controller));
}
