/**
 * src/modules/records/helpers/password-list.ts
 *
 * WHY:
 * - A record's passwords travel as one comma-separated form field and are stored
 *   as a JSON array in a single text column. Both directions live here.
 *
 * RULES:
 * - split: on ",", trim each entry, drop empties, keep order and duplicates.
 * - encode/decode are exact inverses for any valid list (1..5 non-empty strings).
 * - decode never throws; a bad stored value is reported, the caller decides.
 */

import { z } from 'zod';
import { MAX_PASSWORDS_PER_RECORD } from '../record.types';

export const PasswordListSchema = z
  .array(z.string().min(1))
  .min(1)
  .max(MAX_PASSWORDS_PER_RECORD);

export type DecodePasswordsResult =
  | { ok: true; passwords: string[] }
  | { ok: false; error: string };

export function splitPasswords(raw: string): string[] {
  return raw
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function encodePasswords(passwords: readonly string[]): string {
  return JSON.stringify(passwords);
}

export function decodePasswords(encoded: string): DecodePasswordsResult {
  let json: unknown;
  try {
    json = JSON.parse(encoded);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : 'invalid JSON' };
  }

  const parsed = PasswordListSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => i.message).join('; ') };
  }

  return { ok: true, passwords: parsed.data };
}
