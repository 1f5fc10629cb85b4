/**
 * backend/src/modules/passes/pass.schemas.ts
 *
 * WHY:
 * - Request validation for pass endpoints.
 *
 * RULES:
 * - Timestamps are ISO-8601 with an explicit offset; they become Dates here.
 * - Students never send durations or staff flags (strict objects reject them).
 */

import { z } from 'zod';
import { MAX_PASS_MINUTES } from '../schools';
import { PASS_STATUSES } from './pass.types';

const isoDateTime = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const notes = z.string().trim().max(500);

export const requestPassSchema = z
  .object({
    locationId: z.string().uuid(),
    requestedStartTime: isoDateTime.optional(),
    requestedEndTime: isoDateTime.optional(),
    reason: notes.optional(),
  })
  .strict();

export const issuePassSchema = z
  .object({
    studentId: z.string().uuid(),
    locationId: z.string().uuid(),
    requestedStartTime: isoDateTime.optional(),
    requestedEndTime: isoDateTime.optional(),
    durationMinutes: z.number().int().min(1).max(MAX_PASS_MINUTES).optional(),
    isSummons: z.boolean().optional(),
    isEarlyRelease: z.boolean().optional(),
    notes: notes.optional(),
  })
  .strict();

export const decidePassSchema = z
  .object({
    decision: z.enum(['approve', 'deny']),
    notes: notes.optional(),
  })
  .strict();

export const revokePassSchema = z
  .object({
    notes: notes.min(1),
  })
  .strict();

export const verifyCodeSchema = z
  .object({
    code: z.string().trim().min(1).max(32),
  })
  .strict();

export const passIdParamsSchema = z.object({
  passId: z.string().uuid(),
});

export const listSchoolPassesQuerySchema = z.object({
  status: z.enum(PASS_STATUSES).optional(),
});

export type RequestPassInput = z.infer<typeof requestPassSchema>;
export type IssuePassInput = z.infer<typeof issuePassSchema>;
