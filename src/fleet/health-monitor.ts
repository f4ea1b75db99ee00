/**
 * Per-node health monitor.
 *
 * Waits out the boot delay, then runs an initial burst of up to `maxStrikes`
 * back-to-back checks. Once the node has passed a check it is polled once
 * per interval; each failed poll is one strike and `maxStrikes` consecutive
 * strikes kill the node. A node the provider no longer lists as running is
 * dead as well (expired), without a stop call.
 *
 * stop() aborts the loop wherever it is suspended. A check that completes
 * after the abort is discarded.
 */

import type { Config } from '../config.js';
import type { DeathReason, FleetNode, MonitorHandle, ProviderClient } from '../types.js';
import type { FleetRegistry } from './registry.js';
import type { DeathChannel } from './death-channel.js';
import type { FleetEventSink } from '../services/events.js';
import { LIVE_STATUSES } from '../types.js';
import { NodeNotFoundError, ProviderStopError } from '../errors.js';
import { describeError, log } from '../logger.js';
import { sleep } from './sleep.js';

export interface MonitorTiming {
  bootDelayMs: number;
  pollIntervalMs: number;
  checkTimeoutMs: number;
  maxStrikes: number;
}

export function monitorTiming(
  config: Pick<Config, 'bootDelaySeconds' | 'pollIntervalSeconds' | 'healthCheckTimeoutSeconds' | 'maxStrikes'>,
): MonitorTiming {
  return {
    bootDelayMs: config.bootDelaySeconds * 1000,
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    checkTimeoutMs: config.healthCheckTimeoutSeconds * 1000,
    maxStrikes: config.maxStrikes,
  };
}

export interface HealthMonitorDeps {
  provider: ProviderClient;
  registry: FleetRegistry;
  deaths: DeathChannel;
  timing: MonitorTiming;
  events: FleetEventSink;
}

export class HealthMonitor implements MonitorHandle {
  private readonly abort = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(
    private readonly node: Pick<FleetNode, 'id' | 'hostname' | 'type'>,
    private readonly deps: HealthMonitorDeps,
  ) {}

  get done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  start(): void {
    if (this.loop || this.stopped) return;
    this.loop = this.run();
  }

  /** Force the node to `stopped` and halt. Never calls the provider. */
  stop(): void {
    if (this.stopped) return;

    const current = this.deps.registry.get(this.node.id);
    if (current && LIVE_STATUSES.has(current.status)) {
      this.deps.registry.transition(this.node.id, 'stopped');
    }
    this.abort.abort();
  }

  private get label(): string {
    return `${this.node.hostname} (${this.node.type}, ID: ${this.node.id})`;
  }

  private async run(): Promise<void> {
    const { timing } = this.deps;
    const signal = this.abort.signal;

    try {
      log(`[Monitor] Watching ${this.label}, first check in ${timing.bootDelayMs / 1000}s`);
      await sleep(timing.bootDelayMs, signal);

      if (!(await this.initialBurst())) {
        log(`[Monitor] ${this.label} failed all ${timing.maxStrikes} boot checks`);
        await this.die('health-checks-failed');
        return;
      }

      for (;;) {
        await sleep(timing.pollIntervalMs, signal);

        if (await this.vanished()) {
          await this.die('expired');
          return;
        }

        const node = await this.check();
        if (node.consecutiveFailures === 0) {
          log(`[Monitor] ${this.label} is healthy`);
        } else if (node.consecutiveFailures >= timing.maxStrikes) {
          log(`[Monitor] ${this.label} failed ${node.consecutiveFailures} consecutive checks`);
          await this.die('health-checks-failed');
          return;
        } else {
          log(`[Monitor] ${this.label} unhealthy (strike ${node.consecutiveFailures}/${timing.maxStrikes})`);
        }
      }
    } catch (err) {
      if (signal.aborted) {
        log(`[Monitor] Monitoring stopped for ${this.label}`);
        return;
      }
      log(`[Monitor] Monitor for ${this.label} crashed: ${describeError(err)}`);
    }
  }

  /** Back-to-back checks until one passes or the strikes run out. */
  private async initialBurst(): Promise<boolean> {
    const { maxStrikes } = this.deps.timing;
    for (let attempt = 1; attempt <= maxStrikes; attempt++) {
      const node = await this.check();
      if (node.consecutiveFailures === 0) {
        log(`[Monitor] ${this.label} is up and running`);
        return true;
      }
      log(`[Monitor] Health check failed for ${this.label} (attempt ${attempt}/${maxStrikes})`);
    }
    return false;
  }

  /** One health check, recorded in the registry. Timeouts and transport errors count as failures. */
  private async check(): Promise<FleetNode> {
    const { provider, registry, timing } = this.deps;
    const signal = this.abort.signal;

    const current = registry.get(this.node.id);
    if (!current) throw new NodeNotFoundError(this.node.id);

    let passed: boolean;
    try {
      passed = (await provider.checkHealth(current, timing.checkTimeoutMs, signal)) === 'healthy';
    } catch (err) {
      signal.throwIfAborted();
      log(`[Monitor] ${describeError(err)}`);
      passed = false;
    }
    signal.throwIfAborted();

    const node = registry.recordCheck(this.node.id, passed);
    if (passed) return registry.transition(this.node.id, 'healthy');
    if (node.status === 'booting') return node;
    return registry.transition(this.node.id, 'unhealthy');
  }

  /** True when the provider's running listing no longer has this workload. */
  private async vanished(): Promise<boolean> {
    const signal = this.abort.signal;

    let running: string[];
    try {
      running = await this.deps.provider.listRunning();
    } catch (err) {
      signal.throwIfAborted();
      log(`[Monitor] Could not list running workloads for ${this.label}, skipping expiry check: ${describeError(err)}`);
      return false;
    }
    signal.throwIfAborted();

    if (running.includes(this.node.id)) return false;
    log(`[Monitor] ${this.label} is no longer running on the provider, considering it expired`);
    return true;
  }

  private async die(reason: DeathReason): Promise<void> {
    const { provider, registry, deaths, events } = this.deps;
    const node = registry.transition(this.node.id, 'dead');

    if (reason === 'health-checks-failed') {
      log(`[Monitor] Stopping failed node ${this.label}`);
      try {
        await provider.stopNode(this.node.id);
        log(`[Monitor] Stopped failed node ${this.label}`);
      } catch (err) {
        const error = new ProviderStopError(this.node.id, err);
        log(`[Monitor] ${error.message}, continuing removal`);
        await events.publish({
          eventType: 'NODE_STOP_FAILED',
          severity: 'WARNING',
          nodeId: this.node.id,
          nodeType: this.node.type,
          message: error.message,
        });
      }
    }

    deaths.push({ node, reason, at: new Date() });
  }
}
