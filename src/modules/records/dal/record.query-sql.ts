/**
 * src/modules/records/dal/record.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for card records (raw Kysely access).
 *
 * RULES:
 * - No AppError.
 * - No policies: the unit filter is decided by the caller (record-scope.ts).
 * - Listing order is fixed: newest first, id as tie-breaker.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CardRecordsTable } from '../../../shared/db/schema';

export type CardRecordRow = Selectable<CardRecordsTable>;

export async function selectRecordsNewestFirstSql(
  db: DbExecutor,
  filter: { unit: string | null },
): Promise<CardRecordRow[]> {
  let query = db.selectFrom('card_records').selectAll();

  if (filter.unit !== null) {
    query = query.where('unit', '=', filter.unit);
  }

  return query.orderBy('created_at', 'desc').orderBy('id', 'desc').execute();
}

export async function selectRecordByIdSql(
  db: DbExecutor,
  recordId: string,
): Promise<CardRecordRow | undefined> {
  return db.selectFrom('card_records').selectAll().where('id', '=', recordId).executeTakeFirst();
}

export async function countRecordsByUnitSql(
  db: DbExecutor,
): Promise<Array<{ unit: string; count: number }>> {
  const rows = await db
    .selectFrom('card_records')
    .select((eb) => ['unit', eb.fn.countAll<string>().as('count')])
    .groupBy('unit')
    .execute();

  // pg returns bigint aggregates as strings
  return rows.map((r) => ({ unit: r.unit, count: Number(r.count) }));
}

export async function countAllRecordsSql(db: DbExecutor): Promise<number> {
  const row = await db
    .selectFrom('card_records')
    .select((eb) => eb.fn.countAll<string>().as('count'))
    .executeTakeFirstOrThrow();

  return Number(row.count);
}
