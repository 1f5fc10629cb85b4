import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import { expectAppError } from '../../helpers/build-test-app';
import { TEST_META } from '../../helpers/in-mem-env';
import { createPassWorld } from '../../helpers/pass-world';

describe('admission', () => {
  it('turns students away at capacity and admits them once a slot frees up', async () => {
    const w = await createPassWorld({ school: { concurrentPassLimit: 1 } });

    const alicePass = await w.passService.requestPass(
      w.actors.alice,
      { locationId: w.locations.nurse.id },
      TEST_META,
    );
    await w.passService.activatePass(w.actors.alice, alicePass.id, TEST_META);

    const bobPass = await w.passService.requestPass(w.actors.bob, { locationId: w.locations.nurse.id }, TEST_META);
    const err = await expectAppError(w.passService.activatePass(w.actors.bob, bobPass.id, TEST_META));

    expect(err.code).toBe('CONFLICT');
    expect(err.details).toEqual({ reason: 'AT_CAPACITY', activeCount: 1, limit: 1 });
    expect((await w.passService.getPass(w.actors.bob, bobPass.id, TEST_META)).status).toBe('approved');

    w.env.clock.advanceMinutes(5);
    await w.passService.completePass(w.actors.alice, alicePass.id, TEST_META);

    const admitted = await w.passService.activatePass(w.actors.bob, bobPass.id, TEST_META);
    expect(admitted.status).toBe('active');
  });

  it('never admits more than the limit under parallel activations', async () => {
    const w = await createPassWorld({ school: { concurrentPassLimit: 2 } });
    const students = [w.actors.alice, w.actors.bob, w.actors.carol];

    const passes = await Promise.all(
      students.map((actor) =>
        w.passService.requestPass(actor, { locationId: w.locations.nurse.id }, TEST_META),
      ),
    );

    const results = await Promise.allSettled(
      passes.map((pass, i) => w.passService.activatePass(students[i] ?? w.actors.alice, pass.id, TEST_META)),
    );

    const activated = results.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []));
    const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));

    expect(activated).toHaveLength(2);
    expect(new Set(activated.map((p) => p.verificationCode)).size).toBe(2);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(AppError);
    expect(rejected[0]).toMatchObject({ code: 'CONFLICT', details: { reason: 'AT_CAPACITY' } });

    const active = await w.passService.listSchoolPasses(w.actors.teacher, ['active'], TEST_META);
    expect(active).toHaveLength(2);
  });

  it('lets exactly one of two racing decisions win', async () => {
    const w = await createPassWorld();
    const pending = await w.passService.requestPass(
      w.actors.alice,
      { locationId: w.locations.bathroom.id },
      TEST_META,
    );

    const results = await Promise.allSettled([
      w.passService.decidePass(w.actors.teacher, { passId: pending.id, decision: 'approve' }, TEST_META),
      w.passService.decidePass(w.actors.otherTeacher, { passId: pending.id, decision: 'deny' }, TEST_META),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    const decisions = [...w.env.auditLog.list('pass.approved'), ...w.env.auditLog.list('pass.denied')];
    expect(decisions).toHaveLength(1);
  });
});
