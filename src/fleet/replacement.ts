/**
 * Replacement Controller
 *
 * Consumes death notices. Each dead node is removed from the registry and,
 * with keep-running on, exactly one replacement launch is attempted. A failed
 * replacement is reported and not retried; the fleet runs below target until
 * the next death.
 */

import type { DeathNotice } from '../types.js';
import type { FleetRegistry } from './registry.js';
import type { DeathChannel } from './death-channel.js';
import type { NodeLauncher } from './launcher.js';
import type { FleetEventSink } from '../services/events.js';
import type { Notifier } from '../services/notify.js';
import { describeError, log } from '../logger.js';

export interface ReplacementOptions {
  targetCount: number;
  keepRunning: boolean;
}

export interface ReplacementDeps {
  registry: FleetRegistry;
  launcher: NodeLauncher;
  deaths: DeathChannel;
  events: FleetEventSink;
  notify: Notifier;
}

/** One handled death, kept for status output */
export interface ReplacementRecord {
  deadNodeId: string;
  reason: DeathNotice['reason'];
  at: string;
  replacementId?: string;
  error?: string;
}

export class ReplacementController {
  private readonly history: ReplacementRecord[] = [];
  private closed = false;
  private emptyWaiters: Array<() => void> = [];

  constructor(
    private readonly options: ReplacementOptions,
    private readonly deps: ReplacementDeps,
  ) {
    deps.deaths.subscribe(notice => this.handleDeath(notice));
  }

  get targetCount(): number {
    return this.options.targetCount;
  }

  get keepRunning(): boolean {
    return this.options.keepRunning;
  }

  /** Stop launching replacements; resolves when the death being handled is done. */
  async close(): Promise<void> {
    this.closed = true;
    await this.deps.deaths.close();
  }

  /**
   * Resolves once no node is tracked and no death is waiting to be handled.
   * With keep-running on the fleet is never considered finished, so this
   * never resolves; the process then runs until it is signalled.
   */
  whenEmpty(): Promise<void> {
    const { registry, deaths } = this.deps;
    if (!this.options.keepRunning && registry.size === 0 && !deaths.busy && deaths.pending === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.emptyWaiters.push(resolve);
    });
  }

  getHistory(): ReplacementRecord[] {
    return [...this.history];
  }

  private async handleDeath(notice: DeathNotice): Promise<void> {
    const { registry, launcher, events, notify } = this.deps;
    const dead = notice.node;

    const removed = registry.remove(dead.id);
    log(`[Replace] ${dead.hostname} (ID: ${dead.id}) died (${notice.reason})${removed ? ', removed from fleet' : ''}`);

    const record: ReplacementRecord = {
      deadNodeId: dead.id,
      reason: notice.reason,
      at: notice.at.toISOString(),
    };
    this.history.push(record);

    await events.publish({
      eventType: 'NODE_DEAD',
      severity: 'CRITICAL',
      nodeId: dead.id,
      nodeType: dead.type,
      message: `${dead.hostname} died (${notice.reason})`,
      details: { reason: notice.reason, launchedAt: dead.launchedAt.toISOString() },
    });
    await notify(`Node ${dead.hostname} (${dead.type}) died: ${notice.reason}`);

    if (!this.options.keepRunning || this.closed) {
      log(`[Replace] Not replacing ${dead.id} (${this.closed ? 'shutting down' : 'keep-running disabled'}), ${registry.size}/${this.options.targetCount} nodes left`);
      this.checkEmpty();
      return;
    }

    log(`[Replace] Fleet at ${registry.size}/${this.options.targetCount}, launching replacement`);
    try {
      const replacement = await launcher.launch();
      record.replacementId = replacement.id;
      log(`[Replace] ${replacement.hostname} (${replacement.type}) replaces ${dead.hostname}`);
    } catch (err) {
      record.error = describeError(err);
      log(`[Replace] Replacement for ${dead.id} failed: ${record.error}`);
      await events.publish({
        eventType: 'LAUNCH_FAILED',
        severity: 'CRITICAL',
        nodeId: dead.id,
        message: record.error,
      });
      await notify(`Could not replace ${dead.hostname}: ${record.error}`);
    }
    this.checkEmpty();
  }

  private checkEmpty(): void {
    if (this.deps.registry.size > 0 || this.deps.deaths.pending > 0) return;

    if (this.options.keepRunning) {
      log(`[Replace] Fleet is empty (0/${this.options.targetCount}); keep-running is set, waiting for a signal`);
      return;
    }
    for (const resolve of this.emptyWaiters.splice(0)) resolve();
  }
}
