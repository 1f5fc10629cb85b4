/**
 * backend/src/modules/analytics/analytics.controller.ts
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requestMeta, requireActor } from '../../shared/http/require-auth-context';
import { dashboardQuerySchema } from './analytics.schemas';
import type { AnalyticsService } from './analytics.service';

export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  async getDashboard(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);

    const parsed = dashboardQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      const issues = parsed.error.issues;
      throw AppError.validationError('Invalid query', { issues }, { issues });
    }

    const dashboard = await this.analyticsService.getDashboardMetrics(
      actor,
      parsed.data.window,
      requestMeta(req),
    );
    return reply.status(200).send({ dashboard });
  }
}
