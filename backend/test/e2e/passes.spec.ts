import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { createInMemEnv, seedSchool, type SeededSchool } from '../helpers/in-mem-env';

const HOST = 'edison.localhost:3000';

describe('pass endpoints', () => {
  let t: Awaited<ReturnType<typeof buildTestApp>>;
  let seeded: SeededSchool;

  beforeEach(async () => {
    const env = createInMemEnv();
    seeded = await seedSchool(env);
    t = await buildTestApp({ env });
  });

  afterEach(async () => {
    await t.close();
  });

  async function as(user: keyof SeededSchool['users']) {
    return { host: HOST, cookie: await t.sessionCookie(seeded.users[user]) };
  }

  it('rejects anonymous callers', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/passes',
      headers: { host: HOST },
      payload: { locationId: seeded.locations.nurse.id },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Authentication required' } });
  });

  it('ignores a session on another school subdomain', async () => {
    const res = await t.app.inject({
      method: 'GET',
      url: '/passes/mine',
      headers: { host: 'lincoln.localhost:3000', cookie: await t.sessionCookie(seeded.users.alice) },
    });
    expect(res.statusCode).toBe(401);
  });

  it('validates request bodies', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/passes',
      headers: await as('alice'),
      payload: { locationId: 'not-a-uuid', durationMinutes: 90 },
    });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.message).toBe('Invalid request body');
    expect(Array.isArray(body.error.details.issues)).toBe(true);
  });

  it('runs a pass from request to check-in', async () => {
    const created = await t.app.inject({
      method: 'POST',
      url: '/passes',
      headers: await as('alice'),
      payload: { locationId: seeded.locations.nurse.id, reason: 'Headache' },
    });
    expect(created.statusCode).toBe(201);
    const passId: string = created.json().pass.id;
    expect(created.json().pass.status).toBe('approved');

    const activated = await t.app.inject({
      method: 'POST',
      url: `/passes/${passId}/activate`,
      headers: await as('alice'),
    });
    expect(activated.statusCode).toBe(200);
    const code: string = activated.json().pass.verificationCode;

    const verified = await t.app.inject({
      method: 'POST',
      url: '/passes/verify',
      headers: await as('teacher'),
      payload: { code },
    });
    expect(verified.statusCode).toBe(200);
    expect(verified.json().pass).toMatchObject({
      passId,
      status: 'active',
      studentName: 'Alice Johnson',
      locationName: 'Nurse',
    });

    t.env.clock.advanceMinutes(9);
    const completed = await t.app.inject({
      method: 'POST',
      url: `/passes/${passId}/complete`,
      headers: await as('alice'),
    });
    expect(completed.statusCode).toBe(200);
    expect(completed.json().pass).toMatchObject({ status: 'completed', durationMinutes: 9, verificationCode: null });
  });

  it('lets staff decide pending requests', async () => {
    const created = await t.app.inject({
      method: 'POST',
      url: '/passes',
      headers: await as('bob'),
      payload: { locationId: seeded.locations.bathroom.id },
    });
    const passId: string = created.json().pass.id;

    const pending = await t.app.inject({ method: 'GET', url: '/passes/pending', headers: await as('teacher') });
    expect(pending.json().passes.map((p: { id: string }) => p.id)).toEqual([passId]);

    const decided = await t.app.inject({
      method: 'POST',
      url: `/passes/${passId}/decision`,
      headers: await as('teacher'),
      payload: { decision: 'deny', notes: 'After the quiz' },
    });
    expect(decided.statusCode).toBe(200);
    expect(decided.json().pass).toMatchObject({ status: 'denied', approvalNotes: 'After the quiz' });
  });

  it('answers a forbidden action with the structured denial', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/passes/issue',
      headers: await as('alice'),
      payload: { studentId: seeded.users.bob.id, locationId: seeded.locations.bathroom.id },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      error: {
        code: 'FORBIDDEN',
        message: 'Only staff can issue passes.',
        details: {
          reason: 'MISSING_CAPABILITY',
          role: 'student',
          requiredCapability: 'pass.issue',
          suggestedSurface: 'student.passes',
        },
      },
    });
  });

  it('reports capacity conflicts as 409', async () => {
    await t.app.inject({
      method: 'PATCH',
      url: '/schools/me',
      headers: await as('admin'),
      payload: { concurrentPassLimit: 1 },
    });

    for (const student of ['alice', 'bob'] as const) {
      const created = await t.app.inject({
        method: 'POST',
        url: '/passes',
        headers: await as(student),
        payload: { locationId: seeded.locations.nurse.id },
      });
      const res = await t.app.inject({
        method: 'POST',
        url: `/passes/${created.json().pass.id}/activate`,
        headers: await as(student),
      });

      if (student === 'alice') {
        expect(res.statusCode).toBe(200);
      } else {
        expect(res.statusCode).toBe(409);
        expect(res.json().error.details).toEqual({ reason: 'AT_CAPACITY', activeCount: 1, limit: 1 });
      }
    }
  });

  it('rejects a malformed pass id', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/passes/nope', headers: await as('teacher') });
    expect(res.statusCode).toBe(400);
  });
});
