import { describe, it, expect } from 'vitest';
import { expectAppError, TEST_CONFIG } from '../../helpers/build-test-app';
import { TEST_META } from '../../helpers/in-mem-env';
import { createPassWorld } from '../../helpers/pass-world';
import type { AppConfig } from '../../../src/app/config';
import { RateLimitError } from '../../../src/shared/security/rate-limit';

const LIMITED_CONFIG: AppConfig = {
  ...TEST_CONFIG,
  nodeEnv: 'development',
  passes: { ...TEST_CONFIG.passes, requestLimit: { limit: 2, windowSeconds: 900 } },
};

describe('student request limit', () => {
  it('spends quota only on requests that are stored', async () => {
    const w = await createPassWorld({ config: LIMITED_CONFIG });
    const bathroom = { locationId: w.locations.bathroom.id };

    const first = await w.passService.requestPass(w.actors.alice, bathroom, TEST_META);

    // refused before anything is stored: neither spends quota
    const duplicate = await expectAppError(w.passService.requestPass(w.actors.alice, bathroom, TEST_META));
    expect(duplicate.status).toBe(409);
    const tooLate = await expectAppError(
      w.passService.requestPass(
        w.actors.alice,
        { ...bathroom, requestedStartTime: new Date(w.env.clock.now().getTime() - 60 * 60_000) },
        TEST_META,
      ),
    );
    expect(tooLate.status).toBe(400);

    await w.passService.decidePass(w.actors.teacher, { passId: first.id, decision: 'deny' }, TEST_META);
    const second = await w.passService.requestPass(w.actors.alice, bathroom, TEST_META);
    expect(second.status).toBe('pending');

    await w.passService.decidePass(w.actors.teacher, { passId: second.id, decision: 'deny' }, TEST_META);
    await expect(w.passService.requestPass(w.actors.alice, bathroom, TEST_META)).rejects.toBeInstanceOf(
      RateLimitError,
    );
  });

  it('counts each student separately', async () => {
    const w = await createPassWorld({ config: LIMITED_CONFIG });

    await w.passService.requestPass(w.actors.alice, { locationId: w.locations.bathroom.id }, TEST_META);
    const bob = await w.passService.requestPass(w.actors.bob, { locationId: w.locations.bathroom.id }, TEST_META);

    expect(bob.studentId).toBe(w.actors.bob.userId);
  });
});
