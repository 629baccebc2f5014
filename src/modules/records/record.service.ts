/**
 * src/modules/records/record.service.ts
 *
 * WHY:
 * - Create, list, look up, count and export card records.
 * - Every read goes through resolveRecordScope / the access policy, so a caller
 *   never sees a record outside their units.
 *
 * RULES:
 * - No raw DB access (RecordRepo only).
 * - A stored row that cannot be decoded is skipped and logged at warn, never fatal.
 * - Never log password values (counts only).
 */

import type { Logger } from '../../shared/logger/logger';
import { isConcreteUnit } from '../users/user.types';
import type { UserIdentity } from '../users/user.types';
import { authorize } from '../access/policies/access.policy';
import type { RecordRepo } from './dal/record.repo';
import { RecordErrors } from './record.errors';
import type { CardRecord, RecordExport, StoredRecord, UnitCounts } from './record.types';
import { normalizeRecord } from './helpers/normalize-record';
import type { NormalizeRecordInput } from './helpers/normalize-record';
import { permittedUnits, resolveRecordScope } from './helpers/record-scope';
import { decodeRecord } from './helpers/decode-record';
import { buildRecordsCsv, exportFilename } from './helpers/records-csv';

export type RecordServiceDeps = {
  recordRepo: RecordRepo;
  logger: Logger;
  now?: () => Date;
};

export class RecordService {
  constructor(private readonly deps: RecordServiceDeps) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private decodeRows(rows: readonly StoredRecord[], flow: string): CardRecord[] {
    const records: CardRecord[] = [];

    for (const row of rows) {
      const decoded = decodeRecord(row);
      if (decoded.ok) {
        records.push(decoded.record);
        continue;
      }

      this.deps.logger.warn({
        msg: 'records.decode.skipped',
        flow,
        recordId: row.id,
        error: decoded.error,
      });
    }

    return records;
  }

  async createRecord(
    identity: UserIdentity,
    input: NormalizeRecordInput,
    ctx: { requestId: string },
  ): Promise<CardRecord> {
    const result = normalizeRecord(identity, input);

    if (!result.ok) {
      this.deps.logger.warn({
        msg: 'records.create.rejected',
        flow: 'records.create',
        requestId: ctx.requestId,
        userId: identity.id,
        reason: result.reason,
      });
      throw result.error;
    }

    const stored = await this.deps.recordRepo.insertRecord(result.record);

    this.deps.logger.info({
      msg: 'records.create.success',
      flow: 'records.create',
      requestId: ctx.requestId,
      userId: identity.id,
      recordId: stored.id,
      unit: result.record.unit,
      passwordCount: result.record.passwords.length,
    });

    return {
      id: stored.id,
      cardId: result.record.cardId,
      unit: result.record.unit,
      passwords: result.record.passwords,
      ownerUserId: result.record.ownerUserId,
      createdAt: stored.createdAt,
    };
  }

  /** Newest first, limited to what the identity may see (see record-scope.ts). */
  async listRecords(
    identity: UserIdentity,
    requestedUnit: string | null | undefined,
  ): Promise<CardRecord[]> {
    const unit = resolveRecordScope(identity, requestedUnit);
    const rows = await this.deps.recordRepo.listNewestFirst({ unit });
    return this.decodeRows(rows, 'records.list');
  }

  /** A record outside the caller's units is reported as not found. */
  async getRecord(identity: UserIdentity, recordId: string): Promise<CardRecord> {
    const row = await this.deps.recordRepo.findById(recordId);
    if (!row) throw RecordErrors.notFound({ recordId });

    const [record] = this.decodeRows([row], 'records.get');
    if (!record) throw RecordErrors.notFound({ recordId, reason: 'undecodable' });

    const decision = authorize(identity, 'record.view', record.unit);
    if (!decision.allowed) {
      throw RecordErrors.notFound({ recordId, reason: decision.reason });
    }

    return record;
  }

  async countByUnit(): Promise<UnitCounts> {
    const counts: UnitCounts = { 'Unit A': 0, 'Unit B': 0 };

    for (const { unit, count } of await this.deps.recordRepo.countByUnit()) {
      if (isConcreteUnit(unit)) counts[unit] = count;
    }

    return counts;
  }

  /** Per-unit totals, limited to the units the identity may see. */
  async countPermittedByUnit(identity: UserIdentity): Promise<Partial<UnitCounts>> {
    const counts = await this.countByUnit();
    const permitted: Partial<UnitCounts> = {};

    for (const unit of permittedUnits(identity)) {
      permitted[unit] = counts[unit];
    }

    return permitted;
  }

  async countAll(): Promise<number> {
    return this.deps.recordRepo.countAll();
  }

  /**
   * CSV of everything the identity may see. No filter widening: the listing
   * runs under the identity's own scope.
   */
  async exportCsv(identity: UserIdentity, ctx: { requestId: string }): Promise<RecordExport> {
    const records = await this.listRecords(identity, null);

    const { csv, rowCount } = buildRecordsCsv(records, (skip) => {
      this.deps.logger.warn({
        msg: 'records.export.row_skipped',
        flow: 'records.export',
        requestId: ctx.requestId,
        recordId: skip.recordId,
        error: skip.error,
      });
    });

    this.deps.logger.info({
      msg: 'records.export.success',
      flow: 'records.export',
      requestId: ctx.requestId,
      userId: identity.id,
      rowCount,
      unit: identity.unit,
    });

    return {
      filename: exportFilename(this.now()),
      content: Buffer.from(csv, 'utf8'),
      rowCount,
    };
  }
}
