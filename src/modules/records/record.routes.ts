/**
 * src/modules/records/record.routes.ts
 *
 * RULES:
 * - No business logic here.
 * - /records/export is a static path; Fastify matches it before /records/:id.
 */

import type { FastifyInstance } from 'fastify';
import type { RecordController } from './record.controller';

export function registerRecordRoutes(app: FastifyInstance, controller: RecordController) {
  app.post('/records', controller.create.bind(controller));
  app.get('/records', controller.list.bind(controller));
  app.get('/records/export', controller.exportCsv.bind(controller));
  app.get('/records/:id', controller.getById.bind(controller));
}
