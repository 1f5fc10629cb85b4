/**
 * backend/src/modules/passes/expiry/expiry-sweeper.ts
 *
 * WHY:
 * - Runs the expiry sweep on an interval for the lifetime of the server.
 *
 * RULES:
 * - Never overlaps itself: a tick that finds the previous one still running is skipped.
 * - The timer is unref'd so it never keeps the process alive on its own.
 * - stop() waits for an in-flight sweep so shutdown doesn't cut a transaction in half.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { ExpirySweepResult } from '../flows/expire/execute-expiry-sweep-flow';

export class ExpirySweeper {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly deps: {
      sweep: () => Promise<ExpirySweepResult>;
      intervalMs: number;
      logger: Logger;
    },
  ) {}

  start(): void {
    if (this.timer || this.deps.intervalMs <= 0) return;

    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        this.deps.logger.error('pass.expiry_sweep.tick_failed', { flow: 'passes.expiry_sweep', err });
      });
    }, this.deps.intervalMs);
    this.timer.unref();

    this.deps.logger.info('pass.expiry_sweep.started', {
      flow: 'passes.expiry_sweep',
      intervalMs: this.deps.intervalMs,
    });
  }

  async tick(): Promise<void> {
    if (this.inFlight) return;

    this.inFlight = this.runOnce();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  private async runOnce(): Promise<void> {
    const startedAt = Date.now();
    const result = await this.deps.sweep();

    if (result.expired > 0 || result.failedSchools > 0) {
      this.deps.logger.info('pass.expiry_sweep.completed', {
        flow: 'passes.expiry_sweep',
        ...result,
        tookMs: Date.now() - startedAt,
      });
    }
  }
}
