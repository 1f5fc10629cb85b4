/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what the service enqueued.
 * - drain() is the test contract: call it after the request completes and
 *   assert on the returned messages.
 *
 * RULES:
 * - drain() is only used by tests; production code never calls it.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
