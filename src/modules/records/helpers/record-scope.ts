/**
 * src/modules/records/helpers/record-scope.ts
 *
 * WHY:
 * - Decides which unit filter a listing actually runs with.
 *   A requested filter can only narrow what the caller may see, never widen it.
 *
 * RULES:
 * - non-admin with a concrete unit → always their own unit (request ignored).
 * - otherwise a requested concrete unit the policy allows → that unit.
 * - otherwise null (the caller's full permitted scope).
 */

import { CONCRETE_UNITS, isConcreteUnit } from '../../users/user.types';
import type { ConcreteUnit, UserIdentity } from '../../users/user.types';
import { authorize } from '../../access/policies/access.policy';

export function resolveRecordScope(
  identity: Pick<UserIdentity, 'id' | 'role' | 'unit'>,
  requestedUnit: string | null | undefined,
): ConcreteUnit | null {
  if (identity.role !== 'admin' && isConcreteUnit(identity.unit)) {
    return identity.unit;
  }

  const requested = requestedUnit?.trim() ?? '';
  if (isConcreteUnit(requested) && authorize(identity, 'record.view', requested).allowed) {
    return requested;
  }

  return null;
}

/** Concrete units the identity may create records for / view. */
export function permittedUnits(identity: Pick<UserIdentity, 'role' | 'unit'>): ConcreteUnit[] {
  if (identity.role === 'admin' || identity.unit === 'Both') return [...CONCRETE_UNITS];
  return [identity.unit];
}
