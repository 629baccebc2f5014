/**
 * src/modules/records/helpers/decode-record.ts
 *
 * Stored row → CardRecord. Fails (without throwing) when the unit is not a
 * concrete unit or the password list is not 1..5 non-empty strings.
 */

import { isConcreteUnit } from '../../users/user.types';
import type { CardRecord, StoredRecord } from '../record.types';
import { decodePasswords } from './password-list';

export type DecodeRecordResult = { ok: true; record: CardRecord } | { ok: false; error: string };

export function decodeRecord(row: StoredRecord): DecodeRecordResult {
  const { unit } = row;
  if (!isConcreteUnit(unit)) {
    return { ok: false, error: `unknown unit: ${unit}` };
  }

  const decoded = decodePasswords(row.passwordsEncoded);
  if (!decoded.ok) {
    return { ok: false, error: decoded.error };
  }

  return {
    ok: true,
    record: {
      id: row.id,
      cardId: row.cardId,
      unit,
      passwords: decoded.passwords,
      ownerUserId: row.ownerUserId,
      createdAt: row.createdAt,
    },
  };
}
