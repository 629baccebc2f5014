import { randomUUID } from 'node:crypto';
import type { RecordRepo } from '../../src/modules/records/dal/record.repo';
import type { NormalizedRecord, StoredRecord } from '../../src/modules/records/record.types';
import type { ConcreteUnit } from '../../src/modules/users/user.types';

/**
 * In-process stand-in for KyselyRecordRepo.
 * - Ordering matches the SQL: created_at desc, id desc.
 * - seedRaw() writes a row as-is (e.g. a corrupted password column).
 */
export class InMemRecordRepo implements RecordRepo {
  private readonly rows: StoredRecord[] = [];
  private lastCreatedMs = 0;

  private nextCreatedAt(): Date {
    this.lastCreatedMs = Math.max(Date.now(), this.lastCreatedMs + 1);
    return new Date(this.lastCreatedMs);
  }

  seedRaw(row: Omit<StoredRecord, 'id' | 'createdAt'>): StoredRecord {
    const stored: StoredRecord = { id: randomUUID(), createdAt: this.nextCreatedAt(), ...row };
    this.rows.push(stored);
    return { ...stored };
  }

  insertRecord(record: NormalizedRecord): Promise<StoredRecord> {
    return Promise.resolve(
      this.seedRaw({
        cardId: record.cardId,
        unit: record.unit,
        passwordsEncoded: record.passwordsEncoded,
        ownerUserId: record.ownerUserId,
      }),
    );
  }

  listNewestFirst(filter: { unit: ConcreteUnit | null }): Promise<StoredRecord[]> {
    const rows = this.rows
      .filter((r) => filter.unit === null || r.unit === filter.unit)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id));
    return Promise.resolve(rows.map((r) => ({ ...r })));
  }

  findById(recordId: string): Promise<StoredRecord | undefined> {
    const row = this.rows.find((r) => r.id === recordId);
    return Promise.resolve(row ? { ...row } : undefined);
  }

  countByUnit(): Promise<Array<{ unit: string; count: number }>> {
    const counts = new Map<string, number>();
    for (const r of this.rows) counts.set(r.unit, (counts.get(r.unit) ?? 0) + 1);
    return Promise.resolve([...counts].map(([unit, count]) => ({ unit, count })));
  }

  countAll(): Promise<number> {
    return Promise.resolve(this.rows.length);
  }
}
