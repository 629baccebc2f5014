/**
 * src/modules/records/record.types.ts
 *
 * WHY:
 * - Domain types for card records.
 * - StoredRecord is what the DAL hands back (password list still encoded);
 *   CardRecord is what callers see after decoding.
 *
 * RULES:
 * - Records are immutable after insert (no update/delete types).
 * - Avoid leaking DB naming (snake_case) outside the DAL.
 */

import type { ConcreteUnit } from '../users/user.types';

export const MAX_PASSWORDS_PER_RECORD = 5;
export const MAX_CARD_ID_LENGTH = 100;
export const MAX_PASSWORD_LENGTH = 100;

export type CardRecord = {
  id: string;
  cardId: string;
  unit: ConcreteUnit;
  passwords: string[];
  ownerUserId: string;
  createdAt: Date;
};

/** Validated submission, ready for insert. */
export type NormalizedRecord = {
  cardId: string;
  unit: ConcreteUnit;
  passwords: string[];
  passwordsEncoded: string;
  ownerUserId: string;
};

/** A row as persisted. `unit` and `passwordsEncoded` are not trusted until decoded. */
export type StoredRecord = {
  id: string;
  cardId: string;
  unit: string;
  passwordsEncoded: string;
  ownerUserId: string;
  createdAt: Date;
};

export type UnitCounts = Record<ConcreteUnit, number>;

export type RecordExport = {
  filename: string;
  content: Buffer;
  rowCount: number;
};
