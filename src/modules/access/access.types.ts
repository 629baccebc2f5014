/**
 * src/modules/access/access.types.ts
 *
 * WHY:
 * - The closed set of actions the access policy can be asked about,
 *   and the shape of its decision.
 */

export const ACCESS_ACTIONS = [
  'record.create',
  'record.view',
  'admin.dashboard',
  'user.manage',
] as const;

export type AccessAction = (typeof ACCESS_ACTIONS)[number];

export type AccessDenyReason = 'admin only' | 'invalid unit' | 'unit mismatch';

export type AccessDecision = { allowed: true } | { allowed: false; reason: AccessDenyReason };
