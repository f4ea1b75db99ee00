/**
 * Death Channel
 *
 * Carries death notices from node monitors to a single consumer. Notices are
 * handed to the consumer one at a time, in arrival order, so two nodes dying
 * together never interleave their removal and replacement steps.
 */

import type { DeathNotice } from '../types.js';
import { describeError, log } from '../logger.js';

export type DeathHandler = (notice: DeathNotice) => Promise<void>;

export class DeathChannel {
  private queue: DeathNotice[] = [];
  private handler: DeathHandler | null = null;
  private draining: Promise<void> | null = null;
  private closed = false;

  /** Register the consumer. Notices pushed before this are delivered now. */
  subscribe(handler: DeathHandler): void {
    if (this.handler) throw new Error('DeathChannel already has a consumer');
    this.handler = handler;
    this.drain();
  }

  push(notice: DeathNotice): void {
    if (this.closed) {
      log(`[Deaths] Channel closed, dropping notice for ${notice.node.id} (${notice.reason})`);
      return;
    }
    this.queue.push(notice);
    this.drain();
  }

  get pending(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.draining !== null;
  }

  /** Resolves once every queued notice has been handled. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Refuse further notices; resolves once the queue is handled. */
  async close(): Promise<void> {
    this.closed = true;
    await this.idle();
  }

  private drain(): void {
    const handler = this.handler;
    if (!handler || this.draining || this.queue.length === 0) return;

    this.draining = (async () => {
      let notice = this.queue.shift();
      while (notice) {
        try {
          await handler(notice);
        } catch (err) {
          log(`[Deaths] Handler failed for ${notice.node.id}: ${describeError(err)}`);
        }
        notice = this.queue.shift();
      }
      this.draining = null;
    })();
  }
}
