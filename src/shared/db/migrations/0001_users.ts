/**
 * src/shared/db/migrations/0001_users.ts
 *
 * Users: login identity, home unit and role.
 * - username uniqueness is enforced here (repos map 23505 to a typed result).
 * - is_active is the soft-delete flag; rows are never physically removed.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  // gen_random_uuid()
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('username', 'text', (col) => col.notNull().unique())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('full_name', 'text', (col) => col.notNull())
    .addColumn('unit', 'text', (col) => col.notNull())
    .addColumn('role', 'text', (col) => col.notNull().defaultTo('operator'))
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('last_login_at', 'timestamptz')
    .addCheckConstraint('users_unit_check', sql`unit IN ('Unit A', 'Unit B', 'Both')`)
    .addCheckConstraint('users_role_check', sql`role IN ('admin', 'operator')`)
    .addCheckConstraint('users_username_not_empty', sql`length(trim(username)) > 0`)
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
