/**
 * Fleet Supervisor
 *
 * Wires the fleet together and runs the main control flow: credential probe,
 * initial fill, launch summary, and shutdown.
 */

import type { Config } from '../config.js';
import type { FleetNode, ProviderClient } from '../types.js';
import type { FleetEventSink } from '../services/events.js';
import type { Notifier } from '../services/notify.js';
import { FleetRegistry } from './registry.js';
import { TypeAlternator } from './type-alternator.js';
import { DeathChannel } from './death-channel.js';
import { NodeLauncher } from './launcher.js';
import { ReplacementController } from './replacement.js';
import { ShutdownCoordinator, type ShutdownSummary } from './shutdown.js';
import { monitorTiming } from './health-monitor.js';
import { sleep } from './sleep.js';
import { ProviderApiError, StartupError } from '../errors.js';
import { describeError, log } from '../logger.js';

export type SupervisorConfig = Pick<
  Config,
  | 'nodes'
  | 'keepRunning'
  | 'typePolicy'
  | 'noRm'
  | 'pollIntervalSeconds'
  | 'bootDelaySeconds'
  | 'healthCheckTimeoutSeconds'
  | 'maxStrikes'
  | 'launchSpacingSeconds'
>;

export interface LaunchSummary {
  requested: number;
  launched: FleetNode[];
  failures: string[];
}

export class FleetSupervisor {
  readonly registry = new FleetRegistry();
  readonly alternator: TypeAlternator;
  readonly launcher: NodeLauncher;
  readonly controller: ReplacementController;
  private readonly coordinator: ShutdownCoordinator;
  /** Aborted by shutdown(); ends the initial fill */
  private readonly closing = new AbortController();
  private filling: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: SupervisorConfig,
    private readonly provider: ProviderClient,
    events: FleetEventSink,
    notify: Notifier,
  ) {
    const deaths = new DeathChannel();
    this.alternator = new TypeAlternator(config.typePolicy);
    this.launcher = new NodeLauncher({
      provider,
      registry: this.registry,
      alternator: this.alternator,
      deaths,
      timing: monitorTiming(config),
      events,
    });
    this.controller = new ReplacementController(
      { targetCount: config.nodes, keepRunning: config.keepRunning },
      { registry: this.registry, launcher: this.launcher, deaths, events, notify },
    );
    this.coordinator = new ShutdownCoordinator(config.noRm, {
      provider,
      registry: this.registry,
      controller: this.controller,
      events,
    });
  }

  /** Resolves when every node has died and nothing is left to replace. Never resolves with keep-running. */
  whenEmpty(): Promise<void> {
    return this.controller.whenEmpty();
  }

  /**
   * Verify the credential and launch the initial fleet. Throws StartupError
   * if the provider rejects us or no node could be launched. A shutdown()
   * during the fill ends it early; start() then returns what was launched.
   */
  async start(): Promise<LaunchSummary> {
    await this.probeCredential();

    const { nodes, typePolicy, keepRunning } = this.config;
    log(`[Supervisor] Launching ${nodes} nodes (keep running: ${keepRunning}, type: ${typePolicy})`);
    log(`[Supervisor] Node health polling interval: ${this.config.pollIntervalSeconds} seconds`);

    const summary: LaunchSummary = { requested: nodes, launched: [], failures: [] };
    this.filling = this.fill(summary);
    await this.filling;

    if (this.closing.signal.aborted) {
      log(`[Supervisor] Initial launch interrupted after ${summary.launched.length}/${nodes} nodes`);
      return summary;
    }
    if (summary.launched.length === 0) {
      throw new StartupError(`Could not launch any of ${nodes} nodes: ${summary.failures.join('; ')}`);
    }

    this.logSummary(summary);
    return summary;
  }

  /**
   * Ends any initial fill in progress, waits for a launch already sent to the
   * provider, then hands over to the shutdown coordinator.
   */
  async shutdown(): Promise<ShutdownSummary> {
    this.closing.abort();
    await this.filling;
    return this.coordinator.shutdown();
  }

  private async fill(summary: LaunchSummary): Promise<void> {
    const { nodes, keepRunning } = this.config;
    await this.launchMany(nodes, summary, 'node');

    const missing = nodes - summary.launched.length;
    if (keepRunning && missing > 0 && summary.launched.length > 0 && !this.closing.signal.aborted) {
      log(`[Supervisor] ${summary.launched.length}/${nodes} launched, retrying ${missing} once`);
      await this.launchMany(missing, summary, 'top-up node');
    }
  }

  private async probeCredential(): Promise<void> {
    try {
      const running = await this.provider.listRunning();
      log(`[Supervisor] Provider reachable, ${running.length} workloads already running`);
    } catch (err) {
      const reason = err instanceof ProviderApiError && err.isAuthFailure
        ? 'API key was rejected'
        : describeError(err);
      throw new StartupError(`Provider check failed: ${reason}`, { cause: err });
    }
  }

  private async launchMany(count: number, summary: LaunchSummary, what: string): Promise<void> {
    const spacingMs = this.config.launchSpacingSeconds * 1000;
    for (let i = 0; i < count; i++) {
      if (i > 0 && spacingMs > 0 && !(await this.pause(spacingMs))) return;
      if (this.closing.signal.aborted) return;

      log(`[Supervisor] Launching ${what} ${i + 1}/${count}...`);
      try {
        summary.launched.push(await this.launcher.launch());
      } catch (err) {
        const message = describeError(err);
        summary.failures.push(message);
        log(`[Supervisor] ${what} ${i + 1} failed: ${message}`);
      }
    }
  }

  /** False when shutdown interrupted the pause. */
  private async pause(ms: number): Promise<boolean> {
    try {
      await sleep(ms, this.closing.signal);
      return true;
    } catch (err) {
      if (this.closing.signal.aborted) return false;
      throw err;
    }
  }

  private logSummary(summary: LaunchSummary): void {
    log('[Supervisor] === Launch Summary ===');
    log(`[Supervisor] Requested: ${summary.requested} nodes`);
    log(`[Supervisor] Successful: ${summary.launched.length} nodes`);
    summary.launched.forEach((node, idx) => {
      log(`[Supervisor] ${idx + 1}. ${node.hostname} (Type: ${node.type}, Expires: ${node.expiresAt.toISOString()})`);
    });
  }
}
