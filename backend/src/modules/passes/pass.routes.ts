/**
 * backend/src/modules/passes/pass.routes.ts
 *
 * RULES:
 * - No business logic here.
 * - Static paths are registered before /passes/:passId.
 */

import type { FastifyInstance } from 'fastify';
import type { PassController } from './pass.controller';

export function registerPassRoutes(app: FastifyInstance, controller: PassController) {
  app.post('/passes', controller.requestPass.bind(controller));
  app.post('/passes/issue', controller.issuePass.bind(controller));
  app.post('/passes/verify', controller.verifyCode.bind(controller));

  app.get('/passes/mine', controller.listMine.bind(controller));
  app.get('/passes/school', controller.listSchool.bind(controller));
  app.get('/passes/pending', controller.listPending.bind(controller));
  app.get('/passes/:passId', controller.getPass.bind(controller));

  app.post('/passes/:passId/decision', controller.decidePass.bind(controller));
  app.post('/passes/:passId/activate', controller.activatePass.bind(controller));
  app.post('/passes/:passId/complete', controller.completePass.bind(controller));
  app.post('/passes/:passId/revoke', controller.revokePass.bind(controller));
}
