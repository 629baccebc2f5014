/**
 * src/shared/db/migrations/index.ts
 *
 * Ordered migration registry. Keys sort lexically; add new files here.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_card_records';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_card_records': m0002,
};
