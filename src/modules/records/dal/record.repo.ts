/**
 * src/modules/records/dal/record.repo.ts
 *
 * WHY:
 * - Services depend on the RecordRepo interface, not on Kysely.
 * - KyselyRecordRepo is the Postgres implementation; tests use an in-memory one.
 *
 * RULES:
 * - Append-only: there is no update or delete.
 * - Rows come back with passwords still encoded; decoding (and skipping bad
 *   rows) is the service's job.
 * - Driver failures surface as StorageError. No AppError. No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { runStorage } from '../../../shared/db/storage-error';
import type { ConcreteUnit } from '../../users/user.types';
import type { NormalizedRecord, StoredRecord } from '../record.types';
import {
  countAllRecordsSql,
  countRecordsByUnitSql,
  selectRecordByIdSql,
  selectRecordsNewestFirstSql,
} from './record.query-sql';
import type { CardRecordRow } from './record.query-sql';

export interface RecordRepo {
  insertRecord(record: NormalizedRecord): Promise<StoredRecord>;
  listNewestFirst(filter: { unit: ConcreteUnit | null }): Promise<StoredRecord[]>;
  findById(recordId: string): Promise<StoredRecord | undefined>;
  countByUnit(): Promise<Array<{ unit: string; count: number }>>;
  countAll(): Promise<number>;
}

export function toStoredRecord(row: CardRecordRow): StoredRecord {
  return {
    id: row.id,
    cardId: row.card_id,
    unit: row.unit,
    passwordsEncoded: row.passwords,
    ownerUserId: row.owner_user_id,
    createdAt: row.created_at,
  };
}

export class KyselyRecordRepo implements RecordRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertRecord(record: NormalizedRecord): Promise<StoredRecord> {
    return runStorage('records.insert', async () => {
      const row = await this.db
        .insertInto('card_records')
        .values({
          card_id: record.cardId,
          unit: record.unit,
          passwords: record.passwordsEncoded,
          owner_user_id: record.ownerUserId,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return toStoredRecord(row);
    });
  }

  async listNewestFirst(filter: { unit: ConcreteUnit | null }): Promise<StoredRecord[]> {
    return runStorage('records.list', async () => {
      const rows = await selectRecordsNewestFirstSql(this.db, filter);
      return rows.map(toStoredRecord);
    });
  }

  async findById(recordId: string): Promise<StoredRecord | undefined> {
    return runStorage('records.findById', async () => {
      const row = await selectRecordByIdSql(this.db, recordId);
      return row ? toStoredRecord(row) : undefined;
    });
  }

  async countByUnit(): Promise<Array<{ unit: string; count: number }>> {
    return runStorage('records.countByUnit', () => countRecordsByUnitSql(this.db));
  }

  async countAll(): Promise<number> {
    return runStorage('records.countAll', () => countAllRecordsSql(this.db));
  }
}
