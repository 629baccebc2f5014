/**
 * src/modules/records/helpers/normalize-record.ts
 *
 * WHY:
 * - Turns a raw submission into a NormalizedRecord, or says exactly why not.
 * - Pure (no DB, no HTTP), so every branch is unit-tested directly.
 *
 * RULES (checked in this order):
 * 1. cardId trimmed, empty → "card id required".
 * 2. unit trimmed, empty → "unit required"; not a concrete unit → "invalid unit".
 * 3. access policy must allow record.create on that unit (403 otherwise).
 * 4. passwords split/trimmed/empties dropped; 0 → "at least one password required",
 *    more than five → "maximum five passwords".
 */

import type { AppError } from '../../../shared/http/errors';
import { isConcreteUnit } from '../../users/user.types';
import type { UserIdentity } from '../../users/user.types';
import { authorize } from '../../access/policies/access.policy';
import { AccessErrors } from '../../access/access.errors';
import { RecordErrors } from '../record.errors';
import { MAX_PASSWORDS_PER_RECORD } from '../record.types';
import type { NormalizedRecord } from '../record.types';
import { encodePasswords, splitPasswords } from './password-list';

export type NormalizeRecordInput = {
  cardId: string;
  unit: string;
  passwords: string;
};

export type NormalizeFailureReason =
  | 'card_id_required'
  | 'unit_required'
  | 'invalid_unit'
  | 'unit_mismatch'
  | 'passwords_required'
  | 'too_many_passwords';

export type NormalizeRecordResult =
  | { ok: true; record: NormalizedRecord }
  | { ok: false; reason: NormalizeFailureReason; error: AppError };

export function normalizeRecord(
  identity: Pick<UserIdentity, 'id' | 'role' | 'unit'>,
  input: NormalizeRecordInput,
): NormalizeRecordResult {
  const cardId = input.cardId.trim();
  if (!cardId) {
    return { ok: false, reason: 'card_id_required', error: RecordErrors.cardIdRequired() };
  }

  const unit = input.unit.trim();
  if (!unit) {
    return { ok: false, reason: 'unit_required', error: RecordErrors.unitRequired() };
  }
  if (!isConcreteUnit(unit)) {
    return { ok: false, reason: 'invalid_unit', error: RecordErrors.invalidUnit({ unit }) };
  }

  const decision = authorize(identity, 'record.create', unit);
  if (!decision.allowed) {
    return {
      ok: false,
      reason: 'unit_mismatch',
      error: AccessErrors.denied({
        action: 'record.create',
        targetUnit: unit,
        reason: decision.reason,
        userId: identity.id,
      }),
    };
  }

  const passwords = splitPasswords(input.passwords);
  if (passwords.length === 0) {
    return { ok: false, reason: 'passwords_required', error: RecordErrors.passwordsRequired() };
  }
  if (passwords.length > MAX_PASSWORDS_PER_RECORD) {
    return {
      ok: false,
      reason: 'too_many_passwords',
      error: RecordErrors.tooManyPasswords({ count: passwords.length }),
    };
  }

  return {
    ok: true,
    record: {
      cardId,
      unit,
      passwords,
      passwordsEncoded: encodePasswords(passwords),
      ownerUserId: identity.id,
    },
  };
}
