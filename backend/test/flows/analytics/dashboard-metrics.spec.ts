import { describe, it, expect } from 'vitest';
import { TEST_CONFIG } from '../../helpers/build-test-app';
import { TEST_META } from '../../helpers/in-mem-env';
import { T0 } from '../../helpers/manual-clock';
import { createPassWorld, type PassWorld } from '../../helpers/pass-world';
import { addMinutes } from '../../../src/shared/time/clock';

/** Alice: bathroom, approved by the teacher, out 12 minutes. Bob: nurse, auto-approved, still out. */
async function seedActivity(w: PassWorld) {
  const alice = await w.passService.requestPass(
    w.actors.alice,
    { locationId: w.locations.bathroom.id },
    TEST_META,
  );
  await w.passService.decidePass(w.actors.teacher, { passId: alice.id, decision: 'approve' }, TEST_META);
  await w.passService.activatePass(w.actors.alice, alice.id, TEST_META);

  const bob = await w.passService.requestPass(w.actors.bob, { locationId: w.locations.nurse.id }, TEST_META);
  await w.passService.activatePass(w.actors.bob, bob.id, TEST_META);

  w.env.clock.advanceMinutes(12);
  await w.passService.completePass(w.actors.alice, alice.id, TEST_META);
}

describe('getDashboardMetrics', () => {
  it('gives administrators the school view with live occupancy', async () => {
    const w = await createPassWorld();
    await seedActivity(w);

    const dashboard = await w.analyticsService.getDashboardMetrics(w.actors.admin, '7d', TEST_META);

    expect(dashboard).toEqual({
      scope: 'school',
      window: '7d',
      generatedAt: addMinutes(T0, 12),
      school: {
        grantedCount: 2,
        completedCount: 1,
        requestCount: 2,
        avgAbsenceMinutes: { status: 'OK', value: 12, sampleSize: 1 },
        avgGrantedPerTeacher: { status: 'OK', value: 1, sampleSize: 1 },
        peakRequestHours: { status: 'OK', value: [{ hour: 14, count: 2 }], sampleSize: 2 },
      },
      occupancy: { activeNow: 1, limit: 5 },
    });
  });

  it('gives teachers their own figures beside the school', async () => {
    const w = await createPassWorld();
    await seedActivity(w);

    const dashboard = await w.analyticsService.getDashboardMetrics(w.actors.teacher, '7d', TEST_META);

    expect(dashboard).toEqual({
      scope: 'teacher',
      window: '7d',
      generatedAt: addMinutes(T0, 12),
      teacher: {
        grantedCount: 1,
        completedCount: 1,
        avgAbsenceMinutes: { status: 'OK', value: 12, sampleSize: 1 },
      },
      schoolComparison: {
        avgGrantedPerTeacher: { status: 'OK', value: 1, sampleSize: 1 },
        avgAbsenceMinutes: { status: 'OK', value: 12, sampleSize: 1 },
      },
    });
  });

  it('withholds averages a teacher has no data for', async () => {
    const w = await createPassWorld();
    await seedActivity(w);

    const dashboard = await w.analyticsService.getDashboardMetrics(w.actors.otherTeacher, '7d', TEST_META);
    if (dashboard.scope !== 'teacher') throw new Error('expected the teacher dashboard');

    expect(dashboard.teacher).toEqual({
      grantedCount: 0,
      completedCount: 0,
      avgAbsenceMinutes: { status: 'INSUFFICIENT_DATA', sampleSize: 0, required: 1 },
    });
  });

  it('applies the configured minimum sample', async () => {
    const w = await createPassWorld({ config: { ...TEST_CONFIG, analytics: { minSample: 3 } } });
    await seedActivity(w);

    const dashboard = await w.analyticsService.getDashboardMetrics(w.actors.admin, '30d', TEST_META);
    if (dashboard.scope !== 'school') throw new Error('expected the school dashboard');

    expect(dashboard.school.completedCount).toBe(1);
    expect(dashboard.school.avgAbsenceMinutes).toEqual({
      status: 'INSUFFICIENT_DATA',
      sampleSize: 1,
      required: 3,
    });
  });

  it('leaves passes older than the window out', async () => {
    const w = await createPassWorld();
    await seedActivity(w);

    w.env.clock.advanceMinutes(8 * 24 * 60);
    const week = await w.analyticsService.getDashboardMetrics(w.actors.admin, '7d', TEST_META);
    const month = await w.analyticsService.getDashboardMetrics(w.actors.admin, '30d', TEST_META);
    if (week.scope !== 'school' || month.scope !== 'school') throw new Error('expected school dashboards');

    expect(week.school.requestCount).toBe(0);
    expect(week.school.peakRequestHours).toEqual({
      status: 'INSUFFICIENT_DATA',
      sampleSize: 0,
      required: 1,
    });
    expect(month.school.requestCount).toBe(2);
    // bob never came back: expired on load, slot freed
    expect(month.occupancy.activeNow).toBe(0);
  });

  it('gives students their recent passes and the one they are out on', async () => {
    const w = await createPassWorld();
    await seedActivity(w);
    const [bobPass] = await w.passService.listMyPasses(w.actors.bob, TEST_META);

    const dashboard = await w.analyticsService.getDashboardMetrics(w.actors.bob, '7d', TEST_META);

    expect(bobPass?.status).toBe('active');
    expect(dashboard).toEqual({
      scope: 'student',
      window: '7d',
      generatedAt: addMinutes(T0, 12),
      recentPasses: [bobPass],
      activePass: bobPass,
      totalPasses: 1,
    });
  });

  it('expires an overdue pass before a student sees it', async () => {
    const w = await createPassWorld();
    await seedActivity(w);

    w.env.clock.advanceMinutes(30);
    const dashboard = await w.analyticsService.getDashboardMetrics(w.actors.bob, '7d', TEST_META);
    if (dashboard.scope !== 'student') throw new Error('expected the student dashboard');

    expect(dashboard.activePass).toBeNull();
    expect(dashboard.recentPasses.map((p) => p.status)).toEqual(['expired']);
    expect(w.env.auditLog.list('pass.expired')).toHaveLength(1);
  });

  it('keeps older passes in the history but out of the window total', async () => {
    const w = await createPassWorld();
    await seedActivity(w);

    w.env.clock.advanceMinutes(8 * 24 * 60);
    const dashboard = await w.analyticsService.getDashboardMetrics(w.actors.alice, '7d', TEST_META);
    if (dashboard.scope !== 'student') throw new Error('expected the student dashboard');

    expect(dashboard.totalPasses).toBe(0);
    expect(dashboard.recentPasses.map((p) => p.status)).toEqual(['completed']);
    expect(dashboard.activePass).toBeNull();
  });
});
