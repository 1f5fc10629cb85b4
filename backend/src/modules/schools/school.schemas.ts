/**
 * backend/src/modules/schools/school.schemas.ts
 *
 * WHY:
 * - Request validation for school settings and locations.
 * - preApprovedRuleSchema is also used to parse the stored jsonb column.
 */

import { z } from 'zod';

export const MAX_PASS_MINUTES = 240;

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const minutesSchema = z.number().int().min(1).max(MAX_PASS_MINUTES);

export const preApprovedRuleSchema = z
  .object({
    duration: minutesSchema,
    requiresApproval: z.boolean().optional(),
    summonsOnly: z.boolean().optional(),
    earlyReleaseOnly: z.boolean().optional(),
  })
  .refine((r) => !(r.summonsOnly && r.earlyReleaseOnly), {
    message: 'A rule cannot be both summons-only and early-release-only',
  });

export const preApprovedRulesSchema = z
  .record(z.string().trim().min(1).max(100), preApprovedRuleSchema)
  .transform((rules) => {
    const out: Record<string, z.infer<typeof preApprovedRuleSchema>> = {};
    for (const [name, rule] of Object.entries(rules)) {
      out[name.trim().toLowerCase()] = rule;
    }
    return out;
  });

export const updateSchoolSettingsSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    timezone: z.string().min(1).refine(isValidTimezone, 'Unknown IANA timezone').optional(),
    concurrentPassLimit: z.number().int().min(1).max(500).optional(),
    defaultPassDuration: minutesSchema.optional(),
    activationWindowMinutes: z.number().int().min(1).max(180).optional(),
    overdueGraceMinutes: z.number().int().min(0).max(120).optional(),
    preApprovedRules: preApprovedRulesSchema.optional(),
  })
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, { message: 'Nothing to update' });

export const createLocationSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    description: z.string().trim().max(500).nullable().optional(),
    roomNumber: z.string().trim().max(50).nullable().optional(),
    defaultDuration: minutesSchema.nullable().optional(),
    requiresApproval: z.boolean().optional(),
    summonsOnly: z.boolean().optional(),
    earlyReleaseOnly: z.boolean().optional(),
  })
  .strict()
  .refine((l) => !(l.summonsOnly && l.earlyReleaseOnly), {
    message: 'A location cannot be both summons-only and early-release-only',
  });

export type UpdateSchoolSettingsInput = z.infer<typeof updateSchoolSettingsSchema>;
export type CreateLocationInput = z.infer<typeof createLocationSchema>;
