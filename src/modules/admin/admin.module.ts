/**
 * src/modules/admin/admin.module.ts
 *
 * WHY:
 * - Admin dashboard wiring. Depends on the users and records modules' services.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { UserService } from '../users/user.service';
import type { RecordService } from '../records/record.service';
import { AdminService } from './admin.service';
import { AdminController } from './admin.controller';
import { registerAdminRoutes } from './admin.routes';

export type AdminModule = ReturnType<typeof createAdminModule>;

export function createAdminModule(deps: {
  userService: UserService;
  recordService: RecordService;
}) {
  const adminService = new AdminService(deps);
  const controller = new AdminController(adminService);

  return {
    adminService,
    registerRoutes(app: FastifyInstance) {
      registerAdminRoutes(app, controller);
    },
  };
}
