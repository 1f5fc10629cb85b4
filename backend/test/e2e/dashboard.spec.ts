import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { createInMemEnv, seedSchool } from '../helpers/in-mem-env';

const HOST = 'edison.localhost:3000';

describe('GET /dashboard', () => {
  it('returns the school dashboard to administrators', async () => {
    const env = createInMemEnv();
    const { users } = await seedSchool(env);
    const t = await buildTestApp({ env });

    try {
      const res = await t.app.inject({
        method: 'GET',
        url: '/dashboard?window=30d',
        headers: { host: HOST, cookie: await t.sessionCookie(users.admin) },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().dashboard).toEqual({
        scope: 'school',
        window: '30d',
        generatedAt: '2026-03-02T14:00:00.000Z',
        school: {
          grantedCount: 0,
          completedCount: 0,
          requestCount: 0,
          avgAbsenceMinutes: { status: 'INSUFFICIENT_DATA', sampleSize: 0, required: 1 },
          avgGrantedPerTeacher: { status: 'INSUFFICIENT_DATA', sampleSize: 0, required: 1 },
          peakRequestHours: { status: 'INSUFFICIENT_DATA', sampleSize: 0, required: 1 },
        },
        occupancy: { activeNow: 0, limit: 5 },
      });
    } finally {
      await t.close();
    }
  });

  it('defaults to the 7 day window for teachers', async () => {
    const env = createInMemEnv();
    const { users } = await seedSchool(env);
    const t = await buildTestApp({ env });

    try {
      const res = await t.app.inject({
        method: 'GET',
        url: '/dashboard',
        headers: { host: HOST, cookie: await t.sessionCookie(users.teacher) },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().dashboard).toMatchObject({ scope: 'teacher', window: '7d' });
    } finally {
      await t.close();
    }
  });

  it('rejects unknown windows', async () => {
    const env = createInMemEnv();
    const { users } = await seedSchool(env);
    const t = await buildTestApp({ env });

    try {
      const bad = await t.app.inject({
        method: 'GET',
        url: '/dashboard?window=1y',
        headers: { host: HOST, cookie: await t.sessionCookie(users.admin) },
      });
      expect(bad.statusCode).toBe(400);
    } finally {
      await t.close();
    }
  });

  it('shows students their pass history', async () => {
    const env = createInMemEnv();
    const { users, locations } = await seedSchool(env);
    const t = await buildTestApp({ env });

    try {
      const cookie = await t.sessionCookie(users.alice);
      const created = await t.app.inject({
        method: 'POST',
        url: '/passes',
        headers: { host: HOST, cookie },
        payload: { locationId: locations.bathroom.id },
      });
      expect(created.statusCode).toBe(201);

      const res = await t.app.inject({
        method: 'GET',
        url: '/dashboard',
        headers: { host: HOST, cookie },
      });

      expect(res.statusCode).toBe(200);
      const dashboard = res.json().dashboard;
      expect(dashboard).toMatchObject({ scope: 'student', window: '7d', activePass: null, totalPasses: 1 });
      expect(dashboard.recentPasses).toHaveLength(1);
      expect(dashboard.recentPasses[0]).toMatchObject({
        id: created.json().pass.id,
        status: 'pending',
      });
    } finally {
      await t.close();
    }
  });
});
