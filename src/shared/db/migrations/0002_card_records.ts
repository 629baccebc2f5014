/**
 * src/shared/db/migrations/0002_card_records.ts
 *
 * Card records: one card id, one concrete unit, 1..5 passwords (JSON text).
 * Records are immutable after insert.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('card_records')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('card_id', 'text', (col) => col.notNull())
    .addColumn('unit', 'text', (col) => col.notNull())
    .addColumn('passwords', 'text', (col) => col.notNull())
    .addColumn('owner_user_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint('card_records_unit_check', sql`unit IN ('Unit A', 'Unit B')`)
    .addCheckConstraint('card_records_card_id_not_empty', sql`length(trim(card_id)) > 0`)
    .execute();

  // Listing is always newest-first, optionally filtered by unit.
  await db.schema
    .createIndex('card_records_unit_created_at_idx')
    .on('card_records')
    .columns(['unit', 'created_at'])
    .execute();

  await db.schema
    .createIndex('card_records_created_at_idx')
    .on('card_records')
    .column('created_at')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('card_records').ifExists().execute();
}
