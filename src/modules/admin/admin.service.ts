/**
 * src/modules/admin/admin.service.ts
 *
 * WHY:
 * - The admin landing page aggregates users and record statistics from two modules.
 *
 * RULES:
 * - Read-only.
 * - The access policy is asked even though the route already requires the admin
 *   role, so the rule lives in one place.
 */

import type { UserIdentity } from '../users/user.types';
import type { UserService } from '../users/user.service';
import type { RecordService } from '../records/record.service';
import { assertAuthorized } from '../access/policies/access.policy';
import type { AdminDashboard } from './admin.types';

export class AdminService {
  constructor(
    private readonly deps: {
      userService: UserService;
      recordService: RecordService;
    },
  ) {}

  async getDashboard(actor: UserIdentity): Promise<AdminDashboard> {
    assertAuthorized(actor, 'admin.dashboard', null);

    const [users, countsByUnit, totalRecords] = await Promise.all([
      this.deps.userService.listUsers(),
      this.deps.recordService.countByUnit(),
      this.deps.recordService.countAll(),
    ]);

    return { users, totalUsers: users.length, countsByUnit, totalRecords };
  }
}
