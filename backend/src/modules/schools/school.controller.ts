/**
 * backend/src/modules/schools/school.controller.ts
 *
 * RULES:
 * - No DB access here. No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requestMeta, requireActor } from '../../shared/http/require-auth-context';
import { createLocationSchema, updateSchoolSettingsSchema } from './school.schemas';
import type { SchoolService } from './school.service';

export class SchoolController {
  constructor(private readonly schoolService: SchoolService) {}

  async getSchool(req: FastifyRequest, reply: FastifyReply) {
    const school = await this.schoolService.getSchool(requireActor(req));
    return reply.status(200).send({ school });
  }

  async updateSettings(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);

    const parsed = updateSchoolSettingsSchema.safeParse(req.body);
    if (!parsed.success) {
      const issues = parsed.error.issues;
      throw AppError.validationError('Invalid request body', { issues }, { issues });
    }

    const school = await this.schoolService.updateSettings(actor, parsed.data, requestMeta(req));
    return reply.status(200).send({ school });
  }

  async listLocations(req: FastifyRequest, reply: FastifyReply) {
    const locations = await this.schoolService.listLocations(requireActor(req));
    return reply.status(200).send({ locations });
  }

  async createLocation(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);

    const parsed = createLocationSchema.safeParse(req.body);
    if (!parsed.success) {
      const issues = parsed.error.issues;
      throw AppError.validationError('Invalid request body', { issues }, { issues });
    }

    const location = await this.schoolService.createLocation(actor, parsed.data, requestMeta(req));
    return reply.status(201).send({ location });
  }
}
