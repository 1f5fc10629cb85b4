import { describe, it, expect } from 'vitest';
import { expectAppError } from '../../helpers/build-test-app';
import { TEST_META } from '../../helpers/in-mem-env';
import { T0 } from '../../helpers/manual-clock';
import { createPassWorld, type PassWorld } from '../../helpers/pass-world';
import { addMinutes } from '../../../src/shared/time/clock';

async function activeNursePass(w: PassWorld) {
  const pass = await w.passService.requestPass(w.actors.alice, { locationId: w.locations.nurse.id }, TEST_META);
  return w.passService.activatePass(w.actors.alice, pass.id, TEST_META);
}

describe('pass expiry', () => {
  it('expires an unused request when it is next read', async () => {
    const w = await createPassWorld();
    const pending = await w.passService.requestPass(
      w.actors.alice,
      { locationId: w.locations.bathroom.id },
      TEST_META,
    );

    w.env.clock.advanceMinutes(16);
    const read = await w.passService.getPass(w.actors.teacher, pending.id, TEST_META);

    expect(read.status).toBe('expired');
    expect(read.expiredAt).toEqual(addMinutes(T0, 16));
    expect(read.actualEndTime).toBeNull();
  });

  it('keeps a request usable on the last minute of its window', async () => {
    const w = await createPassWorld();
    const pass = await w.passService.requestPass(w.actors.alice, { locationId: w.locations.nurse.id }, TEST_META);

    w.env.clock.advanceMinutes(15);
    const active = await w.passService.activatePass(w.actors.alice, pass.id, TEST_META);
    expect(active.status).toBe('active');
  });

  it('activation after the window returns the expired pass', async () => {
    const w = await createPassWorld();
    const pass = await w.passService.requestPass(w.actors.alice, { locationId: w.locations.nurse.id }, TEST_META);

    w.env.clock.advanceMinutes(16);
    const result = await w.passService.activatePass(w.actors.alice, pass.id, TEST_META);

    expect(result.status).toBe('expired');
    expect(result.verificationCode).toBeNull();
    expect(w.env.auditLog.list('pass.activated')).toHaveLength(0);
  });

  it('activating an overdue active pass again hands back the expired pass', async () => {
    const w = await createPassWorld();
    const active = await activeNursePass(w);
    expect(active.verificationCode).not.toBeNull();

    w.env.clock.advanceMinutes(60);
    const again = await w.passService.activatePass(w.actors.alice, active.id, TEST_META);

    expect(again.status).toBe('expired');
    expect(again.verificationCode).toBeNull();
    expect(again.expiredAt).toEqual(addMinutes(T0, 60));
    expect(w.env.auditLog.list('pass.expired')).toHaveLength(1);

    const read = await w.passService.getPass(w.actors.alice, active.id, TEST_META);
    expect(read).toEqual(again);
  });

  it('activating a live active pass again changes nothing', async () => {
    const w = await createPassWorld();
    const active = await activeNursePass(w);

    w.env.clock.advanceMinutes(5);
    const again = await w.passService.activatePass(w.actors.alice, active.id, TEST_META);

    expect(again).toEqual(active);
    expect(w.env.auditLog.list('pass.activated')).toHaveLength(1);
  });

  it('completing within the overdue grace still counts', async () => {
    const w = await createPassWorld();
    const active = await activeNursePass(w);

    w.env.clock.advanceMinutes(25);
    const done = await w.passService.completePass(w.actors.alice, active.id, TEST_META);
    expect(done.durationMinutes).toBe(25);
  });

  it('completing after the grace reports the expiry and frees the slot', async () => {
    const w = await createPassWorld({ school: { concurrentPassLimit: 1 } });
    const active = await activeNursePass(w);

    w.env.clock.advanceMinutes(26);
    const err = await expectAppError(w.passService.completePass(w.actors.alice, active.id, TEST_META));
    expect(err.code).toBe('INVALID_STATE');
    expect(err.details).toEqual({
      reason: 'PASS_EXPIRED',
      passId: active.id,
      expiredAt: addMinutes(T0, 26).toISOString(),
    });

    const stored = await w.passService.getPass(w.actors.teacher, active.id, TEST_META);
    expect(stored.status).toBe('expired');
    expect(stored.actualEndTime).toBeNull();
    expect(stored.durationMinutes).toBeNull();

    const next = await w.passService.requestPass(w.actors.bob, { locationId: w.locations.nurse.id }, TEST_META);
    expect((await w.passService.activatePass(w.actors.bob, next.id, TEST_META)).status).toBe('active');
  });

  it('a stale open pass does not block a new request', async () => {
    const w = await createPassWorld();
    const stale = await w.passService.requestPass(w.actors.alice, { locationId: w.locations.nurse.id }, TEST_META);

    w.env.clock.advanceMinutes(16);
    const fresh = await w.passService.requestPass(
      w.actors.alice,
      { locationId: w.locations.bathroom.id },
      TEST_META,
    );

    expect(fresh.status).toBe('pending');
    expect((await w.passService.getPass(w.actors.alice, stale.id, TEST_META)).status).toBe('expired');
  });

  it('deciding an elapsed request reports the expiry', async () => {
    const w = await createPassWorld();
    const pending = await w.passService.requestPass(
      w.actors.alice,
      { locationId: w.locations.bathroom.id },
      TEST_META,
    );

    w.env.clock.advanceMinutes(20);
    const err = await expectAppError(
      w.passService.decidePass(w.actors.teacher, { passId: pending.id, decision: 'approve' }, TEST_META),
    );
    expect(err.details?.reason).toBe('PASS_EXPIRED');
  });

  it('the sweep expires passes nobody reads', async () => {
    const w = await createPassWorld();
    await w.passService.requestPass(w.actors.bob, { locationId: w.locations.bathroom.id }, TEST_META);
    await activeNursePass(w);

    w.env.clock.advanceMinutes(16);
    expect(await w.passService.expireDuePasses()).toEqual({
      schoolsScanned: 1,
      expired: 1,
      failedSchools: 0,
    });

    w.env.clock.advanceMinutes(10);
    expect(await w.passService.expireDuePasses()).toEqual({
      schoolsScanned: 1,
      expired: 1,
      failedSchools: 0,
    });

    expect(await w.passService.expireDuePasses()).toEqual({
      schoolsScanned: 0,
      expired: 0,
      failedSchools: 0,
    });

    const expiries = w.env.auditLog.list('pass.expired');
    expect(expiries).toHaveLength(2);
    expect(expiries.every((e) => e.userId === null)).toBe(true);
  });

  it('the sweeper runs the sweep on demand', async () => {
    const w = await createPassWorld();
    await w.passService.requestPass(w.actors.bob, { locationId: w.locations.bathroom.id }, TEST_META);

    w.env.clock.advanceMinutes(16);
    await w.deps.passes.expirySweeper.tick();

    expect(w.env.auditLog.list('pass.expired')).toHaveLength(1);
  });
});
