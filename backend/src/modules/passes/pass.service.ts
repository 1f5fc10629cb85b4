/**
 * backend/src/modules/passes/pass.service.ts
 *
 * WHY:
 * - Entry point for every pass operation. Resolves the school snapshot once,
 *   then hands off to the flow that owns the operation.
 *
 * RULES:
 * - No raw DB access here; flows talk to PassStore.
 * - The snapshot is read before the school lock and treated as immutable for the call.
 */

import type { RequestMeta } from '../../shared/http/require-auth-context';
import type { Actor } from '../access';
import { assertSchoolExists, type School, type SchoolStore } from '../schools';

import type { Pass, PassStatus, VerifiedPassSummary } from './pass.types';
import type { PassFlowContext, PassFlowDeps } from './flows/pass-flow.types';
import type { IssuePassInput, RequestPassInput } from './pass.schemas';
import { executeCreatePassFlow, type CreatePassParams } from './flows/create/execute-create-pass-flow';
import { executeDecidePassFlow, type DecidePassParams } from './flows/decide/execute-decide-pass-flow';
import { executeActivatePassFlow } from './flows/activate/execute-activate-pass-flow';
import { executeCompletePassFlow } from './flows/complete/execute-complete-pass-flow';
import { executeRevokePassFlow } from './flows/revoke/execute-revoke-pass-flow';
import { executeVerifyCodeFlow } from './flows/verify/execute-verify-code-flow';
import { executeGetPassFlow, executeListPassesFlow } from './flows/read/execute-read-passes-flow';
import {
  executeLoadPassWindowFlow,
  type PassWindow,
} from './flows/read/execute-load-pass-window-flow';
import {
  executeExpirySweepFlow,
  type ExpirySweepResult,
} from './flows/expire/execute-expiry-sweep-flow';

export type PassServiceDeps = PassFlowDeps & Readonly<{ schoolStore: SchoolStore }>;

export class PassService {
  constructor(private readonly deps: PassServiceDeps) {}

  private async context(actor: Actor, meta: RequestMeta): Promise<PassFlowContext> {
    const snapshot = await this.deps.schoolStore.getSnapshot(actor.schoolId);
    assertSchoolExists(snapshot, actor.schoolId);
    return { actor, snapshot, meta };
  }

  async createPass(actor: Actor, params: CreatePassParams, meta: RequestMeta): Promise<Pass> {
    return executeCreatePassFlow(this.deps, await this.context(actor, meta), params);
  }

  async requestPass(actor: Actor, input: RequestPassInput, meta: RequestMeta): Promise<Pass> {
    return this.createPass(
      actor,
      {
        origin: 'self_request',
        locationId: input.locationId,
        startTime: input.requestedStartTime,
        endTime: input.requestedEndTime,
        studentReason: input.reason ?? null,
      },
      meta,
    );
  }

  async issuePass(actor: Actor, input: IssuePassInput, meta: RequestMeta): Promise<Pass> {
    return this.createPass(
      actor,
      {
        origin: 'staff_issue',
        studentId: input.studentId,
        locationId: input.locationId,
        startTime: input.requestedStartTime,
        endTime: input.requestedEndTime,
        durationMinutes: input.durationMinutes,
        isSummons: input.isSummons,
        isEarlyRelease: input.isEarlyRelease,
        staffNotes: input.notes ?? null,
      },
      meta,
    );
  }

  async decidePass(actor: Actor, params: DecidePassParams, meta: RequestMeta): Promise<Pass> {
    return executeDecidePassFlow(this.deps, await this.context(actor, meta), params);
  }

  async activatePass(actor: Actor, passId: string, meta: RequestMeta): Promise<Pass> {
    return executeActivatePassFlow(this.deps, await this.context(actor, meta), { passId });
  }

  async completePass(actor: Actor, passId: string, meta: RequestMeta): Promise<Pass> {
    return executeCompletePassFlow(this.deps, await this.context(actor, meta), { passId });
  }

  async revokePass(actor: Actor, passId: string, notes: string, meta: RequestMeta): Promise<Pass> {
    return executeRevokePassFlow(this.deps, await this.context(actor, meta), { passId, notes });
  }

  async verifyCode(actor: Actor, code: string, meta: RequestMeta): Promise<VerifiedPassSummary> {
    return executeVerifyCodeFlow(this.deps, await this.context(actor, meta), { code });
  }

  async getPass(actor: Actor, passId: string, meta: RequestMeta): Promise<Pass> {
    return executeGetPassFlow(this.deps, await this.context(actor, meta), { passId });
  }

  async listMyPasses(actor: Actor, meta: RequestMeta): Promise<Pass[]> {
    return executeListPassesFlow(this.deps, await this.context(actor, meta), { kind: 'mine' });
  }

  async listSchoolPasses(
    actor: Actor,
    statuses: readonly PassStatus[] | undefined,
    meta: RequestMeta,
  ): Promise<Pass[]> {
    return executeListPassesFlow(this.deps, await this.context(actor, meta), {
      kind: 'school',
      statuses,
    });
  }

  async listPendingPasses(actor: Actor, meta: RequestMeta): Promise<Pass[]> {
    return executeListPassesFlow(this.deps, await this.context(actor, meta), { kind: 'pending' });
  }

  /** Unguarded: callers authorize the dashboard before loading its passes. */
  async loadWindow(school: School, since: Date): Promise<PassWindow> {
    return executeLoadPassWindowFlow(this.deps, { school, since });
  }

  async expireDuePasses(): Promise<ExpirySweepResult> {
    return executeExpirySweepFlow(this.deps);
  }
}
