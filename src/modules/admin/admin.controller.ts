/**
 * src/modules/admin/admin.controller.ts
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { requireSession } from '../../shared/http/require-auth-context';
import type { AdminService } from './admin.service';

export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  async dashboard(req: FastifyRequest, reply: FastifyReply) {
    const { identity } = requireSession(req, { role: 'admin' });

    const dashboard = await this.adminService.getDashboard(identity);
    return reply.status(200).send(dashboard);
  }
}
