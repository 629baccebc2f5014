/**
 * src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type every query.
 * - Two tables only, so the interfaces are maintained by hand next to the migrations.
 *
 * RULES:
 * - Keep aligned with src/shared/db/migrations/*.
 * - snake_case lives here and in the DAL only; domain types are camelCase.
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface UsersTable {
  id: Generated<string>;
  username: string;
  password_hash: string;
  full_name: string;
  unit: string;
  role: string;
  is_active: Generated<boolean>;
  created_at: Timestamp;
  last_login_at: ColumnType<Date | null, Date | string | null | undefined, Date | string | null>;
}

export interface CardRecordsTable {
  id: Generated<string>;
  card_id: string;
  unit: string;
  /** JSON array of 1..5 non-empty strings, stored as text. */
  passwords: string;
  owner_user_id: string;
  created_at: Timestamp;
}

export interface DB {
  users: UsersTable;
  card_records: CardRecordsTable;
}
