/**
 * src/modules/records/record.module.ts
 *
 * WHY:
 * - Encapsulates Records module wiring.
 * - The admin module consumes recordService for dashboard counts.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { RecordRepo } from './dal/record.repo';
import { RecordService } from './record.service';
import { RecordController } from './record.controller';
import { registerRecordRoutes } from './record.routes';

export type RecordModule = ReturnType<typeof createRecordModule>;

export function createRecordModule(deps: { recordRepo: RecordRepo; logger: Logger }) {
  const recordService = new RecordService({
    recordRepo: deps.recordRepo,
    logger: deps.logger,
  });

  const controller = new RecordController(recordService);

  return {
    recordService,
    registerRoutes(app: FastifyInstance) {
      registerRecordRoutes(app, controller);
    },
  };
}
