/**
 * src/modules/admin/admin.types.ts
 */

import type { PublicUser } from '../users/user.types';
import type { UnitCounts } from '../records/record.types';

export type AdminDashboard = {
  users: PublicUser[];
  totalUsers: number;
  countsByUnit: UnitCounts;
  totalRecords: number;
};
