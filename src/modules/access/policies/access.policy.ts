/**
 * src/modules/access/policies/access.policy.ts
 *
 * WHY:
 * - Who may do what to which unit is a business/security rule.
 * - Keep it pure + unit-testable (no DB, no HTTP).
 * - The same function gates the create path and the read/filter path.
 *
 * RULES (evaluated in order, first match wins):
 * 1. admin → allow everything.
 * 2. admin.dashboard / user.manage → deny non-admins ("admin only"), whatever the unit.
 * 3. target unit is not a concrete unit → deny ("invalid unit").
 * 4. operator with unit "Both" → allow either concrete unit.
 * 5. operator with a concrete unit → allow only that unit ("unit mismatch" otherwise).
 */

import { isConcreteUnit } from '../../users/user.types';
import type { UserIdentity } from '../../users/user.types';
import type { AccessAction, AccessDecision } from '../access.types';
import { AccessErrors } from '../access.errors';

export type AccessSubject = Pick<UserIdentity, 'id' | 'role' | 'unit'>;

const ADMIN_ONLY_ACTIONS: ReadonlySet<AccessAction> = new Set<AccessAction>([
  'admin.dashboard',
  'user.manage',
]);

export function authorize(
  identity: AccessSubject,
  action: AccessAction,
  targetUnit: string | null,
): AccessDecision {
  if (identity.role === 'admin') return { allowed: true };

  if (ADMIN_ONLY_ACTIONS.has(action)) return { allowed: false, reason: 'admin only' };

  if (targetUnit === null || !isConcreteUnit(targetUnit)) {
    return { allowed: false, reason: 'invalid unit' };
  }

  if (identity.unit === 'Both') return { allowed: true };

  return identity.unit === targetUnit
    ? { allowed: true }
    : { allowed: false, reason: 'unit mismatch' };
}

/**
 * Throws the generic 403 when the policy denies. The deny reason travels in
 * the error meta so the error handler logs it.
 */
export function assertAuthorized(
  identity: AccessSubject,
  action: AccessAction,
  targetUnit: string | null,
): void {
  const decision = authorize(identity, action, targetUnit);
  if (!decision.allowed) {
    throw AccessErrors.denied({
      action,
      targetUnit,
      reason: decision.reason,
      userId: identity.id,
    });
  }
}
