/**
 * src/modules/records/helpers/records-csv.ts
 *
 * WHY:
 * - CSV rendering for the records export, kept pure so the quoting rules are unit-tested.
 *
 * FORMAT:
 * - Header: id,card_id,unit,passwords,created_at,owning_user_id
 * - passwords joined with "; ", created_at as ISO-8601 (UTC).
 * - RFC 4180: a field containing comma, double quote, CR or LF is wrapped in
 *   double quotes and inner quotes are doubled. Every line ends with CRLF.
 */

import type { CardRecord } from '../record.types';

export const RECORDS_CSV_HEADER = [
  'id',
  'card_id',
  'unit',
  'passwords',
  'created_at',
  'owning_user_id',
] as const;

export const PASSWORD_JOINER = '; ';

const CSV_LINE_END = '\r\n';
const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function toCsvLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',') + CSV_LINE_END;
}

/** Throws if the record cannot be rendered (e.g. an invalid date). */
export function renderRecordLine(record: CardRecord): string {
  return toCsvLine([
    record.id,
    record.cardId,
    record.unit,
    record.passwords.join(PASSWORD_JOINER),
    record.createdAt.toISOString(),
    record.ownerUserId,
  ]);
}

export type CsvSkip = { recordId: string; error: string };

/**
 * Renders header + one line per record. A record that fails to render is
 * left out and reported through onSkip.
 */
export function buildRecordsCsv(
  records: readonly CardRecord[],
  onSkip: (skip: CsvSkip) => void,
): { csv: string; rowCount: number } {
  const lines = [toCsvLine(RECORDS_CSV_HEADER)];
  let rowCount = 0;

  for (const record of records) {
    try {
      lines.push(renderRecordLine(record));
      rowCount += 1;
    } catch (err) {
      onSkip({ recordId: record.id, error: err instanceof Error ? err.message : String(err) });
    }
  }

  return { csv: lines.join(''), rowCount };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** `records_YYYYMMDD_HHMMSS.csv` in UTC. */
export function exportFilename(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad2(now.getUTCMonth() + 1)}${pad2(now.getUTCDate())}`;
  const time = `${pad2(now.getUTCHours())}${pad2(now.getUTCMinutes())}${pad2(now.getUTCSeconds())}`;
  return `records_${date}_${time}.csv`;
}
