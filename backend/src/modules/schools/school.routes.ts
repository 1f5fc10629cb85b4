/**
 * backend/src/modules/schools/school.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { SchoolController } from './school.controller';

export function registerSchoolRoutes(app: FastifyInstance, controller: SchoolController) {
  app.get('/schools/me', controller.getSchool.bind(controller));
  app.patch('/schools/me', controller.updateSettings.bind(controller));
  app.get('/schools/me/locations', controller.listLocations.bind(controller));
  app.post('/schools/me/locations', controller.createLocation.bind(controller));
}
