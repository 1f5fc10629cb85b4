/**
 * backend/src/modules/schools/policies/location-rules.policy.ts
 *
 * WHY:
 * - A location's effective kind and allotted time come from three places
 *   (location flags, the school's pre-approved rules, school defaults).
 *   Resolving them in one pure function keeps every flow on the same answer.
 *
 * RULES:
 * - Pure functions only.
 * - Pre-approved rules match on the trimmed, lower-cased location name.
 */

import type { Location, LocationKind, PreApprovedRule, School } from '../school.types';

export type LocationRules = Readonly<{
  kind: LocationKind;
  allottedMinutes: number;
  rule: PreApprovedRule | null;
}>;

export function ruleKey(locationName: string): string {
  return locationName.trim().toLowerCase();
}

export function resolveLocationKind(flags: {
  requiresApproval: boolean;
  summonsOnly: boolean;
  earlyReleaseOnly: boolean;
}): LocationKind {
  if (flags.summonsOnly) return 'summons_only';
  if (flags.earlyReleaseOnly) return 'early_release_only';
  if (flags.requiresApproval) return 'approval_required';
  return 'pre_approved';
}

export function resolveLocationRules(school: School, location: Location): LocationRules {
  const rule = school.preApprovedRules[ruleKey(location.name)] ?? null;

  const kind = resolveLocationKind({
    requiresApproval: rule?.requiresApproval ?? location.requiresApproval,
    summonsOnly: rule?.summonsOnly ?? location.summonsOnly,
    earlyReleaseOnly: rule?.earlyReleaseOnly ?? location.earlyReleaseOnly,
  });

  const allottedMinutes = rule?.duration ?? location.defaultDuration ?? school.defaultPassDuration;

  return { kind, allottedMinutes, rule };
}

