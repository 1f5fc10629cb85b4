/**
 * src/shared/messaging/log-queue.ts
 *
 * WHY:
 * - Delivery adapters (push, displays) are not wired yet. Until they are, the
 *   production queue writes each message as a structured log line so
 *   downstream tooling can pick it up from the log stream.
 * - Swapping in a real transport happens in di.ts only.
 */

import type { Logger } from '../logger/logger';
import type { Queue, QueueMessage } from './queue';

export class LogQueue implements Queue {
  constructor(private readonly logger: Logger) {}

  enqueue(message: QueueMessage): Promise<void> {
    this.logger.info('queue.enqueued', { flow: 'messaging', message });
    return Promise.resolve();
  }
}
