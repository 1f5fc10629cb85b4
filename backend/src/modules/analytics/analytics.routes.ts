import type { FastifyInstance } from 'fastify';
import type { AnalyticsController } from './analytics.controller';

export function registerAnalyticsRoutes(app: FastifyInstance, controller: AnalyticsController) {
  app.get('/dashboard', controller.getDashboard.bind(controller));
}
