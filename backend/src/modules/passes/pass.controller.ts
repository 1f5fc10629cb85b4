/**
 * backend/src/modules/passes/pass.controller.ts
 *
 * WHY:
 * - Maps HTTP -> PassService call.
 *
 * RULES:
 * - No DB access here. No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z, ZodTypeAny } from 'zod';
import { AppError } from '../../shared/http/errors';
import { requestMeta, requireActor } from '../../shared/http/require-auth-context';
import {
  decidePassSchema,
  issuePassSchema,
  listSchoolPassesQuerySchema,
  passIdParamsSchema,
  requestPassSchema,
  revokePassSchema,
  verifyCodeSchema,
} from './pass.schemas';
import type { PassService } from './pass.service';

function parseOrThrow<S extends ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(`Invalid ${what}`, { issues: parsed.error.issues }, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export class PassController {
  constructor(private readonly passService: PassService) {}

  async requestPass(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const body = parseOrThrow(requestPassSchema, req.body, 'request body');
    const pass = await this.passService.requestPass(actor, body, requestMeta(req));
    return reply.status(201).send({ pass });
  }

  async issuePass(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const body = parseOrThrow(issuePassSchema, req.body, 'request body');
    const pass = await this.passService.issuePass(actor, body, requestMeta(req));
    return reply.status(201).send({ pass });
  }

  async decidePass(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const { passId } = parseOrThrow(passIdParamsSchema, req.params, 'pass id');
    const body = parseOrThrow(decidePassSchema, req.body, 'request body');
    const pass = await this.passService.decidePass(
      actor,
      { passId, decision: body.decision, notes: body.notes ?? null },
      requestMeta(req),
    );
    return reply.status(200).send({ pass });
  }

  async activatePass(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const { passId } = parseOrThrow(passIdParamsSchema, req.params, 'pass id');
    const pass = await this.passService.activatePass(actor, passId, requestMeta(req));
    return reply.status(200).send({ pass });
  }

  async completePass(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const { passId } = parseOrThrow(passIdParamsSchema, req.params, 'pass id');
    const pass = await this.passService.completePass(actor, passId, requestMeta(req));
    return reply.status(200).send({ pass });
  }

  async revokePass(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const { passId } = parseOrThrow(passIdParamsSchema, req.params, 'pass id');
    const body = parseOrThrow(revokePassSchema, req.body, 'request body');
    const pass = await this.passService.revokePass(actor, passId, body.notes, requestMeta(req));
    return reply.status(200).send({ pass });
  }

  async verifyCode(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const body = parseOrThrow(verifyCodeSchema, req.body, 'request body');
    const summary = await this.passService.verifyCode(actor, body.code, requestMeta(req));
    return reply.status(200).send({ pass: summary });
  }

  async getPass(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const { passId } = parseOrThrow(passIdParamsSchema, req.params, 'pass id');
    const pass = await this.passService.getPass(actor, passId, requestMeta(req));
    return reply.status(200).send({ pass });
  }

  async listMine(req: FastifyRequest, reply: FastifyReply) {
    const passes = await this.passService.listMyPasses(requireActor(req), requestMeta(req));
    return reply.status(200).send({ passes });
  }

  async listSchool(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(req);
    const query = parseOrThrow(listSchoolPassesQuerySchema, req.query, 'query');
    const passes = await this.passService.listSchoolPasses(
      actor,
      query.status ? [query.status] : undefined,
      requestMeta(req),
    );
    return reply.status(200).send({ passes });
  }

  async listPending(req: FastifyRequest, reply: FastifyReply) {
    const passes = await this.passService.listPendingPasses(requireActor(req), requestMeta(req));
    return reply.status(200).send({ passes });
  }
}
