/**
 * src/modules/records/record.controller.ts
 *
 * WHY:
 * - Maps HTTP → RecordService for the records endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (unit checks live in access policy / normalizer).
 * - Every endpoint requires a session.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { requireSession } from '../../shared/http/require-auth-context';
import { withRequestContext } from '../../shared/logger/with-context';
import type { RecordService } from './record.service';
import { RecordErrors } from './record.errors';
import { createRecordSchema, listRecordsQuerySchema, recordIdParamsSchema } from './record.schemas';
import { resolveRecordScope } from './helpers/record-scope';

export class RecordController {
  constructor(private readonly recordService: RecordService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const { identity } = requireSession(req);

    const parsed = createRecordSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw RecordErrors.invalidInput({ issues: parsed.error.issues });
    }

    const record = await this.recordService.createRecord(identity, parsed.data, {
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send({ record, message: 'Record saved.', redirectTo: '/' });
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const { identity } = requireSession(req);

    const parsed = listRecordsQuerySchema.safeParse(req.query ?? {});
    const requestedUnit = parsed.success ? parsed.data.unit : undefined;

    const [records, countsByUnit] = await Promise.all([
      this.recordService.listRecords(identity, requestedUnit),
      this.recordService.countPermittedByUnit(identity),
    ]);

    return reply.status(200).send({
      unit: resolveRecordScope(identity, requestedUnit),
      records,
      countsByUnit,
    });
  }

  async getById(req: FastifyRequest, reply: FastifyReply) {
    const { identity } = requireSession(req);

    const parsed = recordIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw RecordErrors.notFound();
    }

    const record = await this.recordService.getRecord(identity, parsed.data.id);
    return reply.status(200).send({ record });
  }

  async exportCsv(req: FastifyRequest, reply: FastifyReply) {
    const { identity } = requireSession(req);

    const file = await this.recordService.exportCsv(identity, {
      requestId: req.requestContext.requestId,
    });

    withRequestContext(req).info('records.export.sent', {
      flow: 'records.export',
      filename: file.filename,
      rowCount: file.rowCount,
    });

    return reply
      .status(200)
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${file.filename}"`)
      .send(file.content);
  }
}
