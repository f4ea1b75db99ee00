/**
 * Shutdown Coordinator
 *
 * Stops replacements, halts every monitor, then (unless no-rm) stops each
 * tracked node once. Per-node stop failures are logged and skipped.
 */

import type { ProviderClient } from '../types.js';
import type { FleetRegistry } from './registry.js';
import type { ReplacementController } from './replacement.js';
import type { FleetEventSink } from '../services/events.js';
import { ProviderStopError } from '../errors.js';
import { log } from '../logger.js';

export interface ShutdownSummary {
  /** Nodes tracked when shutdown began */
  tracked: number;
  stopped: number;
  failed: number;
  /** Left running on the provider because of no-rm */
  left: number;
}

export interface ShutdownDeps {
  provider: ProviderClient;
  registry: FleetRegistry;
  controller: ReplacementController;
  events: FleetEventSink;
}

export class ShutdownCoordinator {
  private result: Promise<ShutdownSummary> | null = null;

  constructor(
    private readonly noRm: boolean,
    private readonly deps: ShutdownDeps,
  ) {}

  /** Safe to call more than once; later calls get the first call's summary. */
  shutdown(): Promise<ShutdownSummary> {
    this.result ??= this.run();
    return this.result;
  }

  private async run(): Promise<ShutdownSummary> {
    const { provider, registry, controller, events } = this.deps;

    log('[Shutdown] Shutting down monitoring...');
    await controller.close();

    const nodes = registry.list();
    const monitors = nodes.flatMap(n => {
      const monitor = registry.monitorOf(n.id);
      return monitor ? [monitor] : [];
    });
    for (const monitor of monitors) monitor.stop();
    await Promise.all(monitors.map(m => m.done));

    const summary: ShutdownSummary = { tracked: nodes.length, stopped: 0, failed: 0, left: 0 };

    if (this.noRm) {
      summary.left = nodes.filter(n => registry.get(n.id)?.status !== 'dead').length;
      log(`[Shutdown] Leaving ${summary.left} workloads running (--no-rm is set)`);
      for (const node of nodes) registry.remove(node.id);
      return summary;
    }

    log(`[Shutdown] Stopping all ${nodes.length} tracked workloads (use --no-rm to keep them running)`);
    for (const node of nodes) {
      // A dead node was already stopped (or expired) by its monitor
      if (registry.get(node.id)?.status === 'dead') {
        registry.remove(node.id);
        continue;
      }

      log(`[Shutdown] Stopping ${node.hostname} (ID: ${node.id})...`);
      try {
        const receipt = await provider.stopNode(node.id);
        summary.stopped++;
        const when = receipt.stoppedAt ? ` at ${receipt.stoppedAt.toISOString()}` : '';
        log(`[Shutdown] Stopped ${node.hostname}${when} (Refund: ${receipt.refund ?? 0})`);
      } catch (err) {
        summary.failed++;
        const error = new ProviderStopError(node.id, err);
        log(`[Shutdown] ${error.message}`);
        await events.publish({
          eventType: 'NODE_STOP_FAILED',
          severity: 'WARNING',
          nodeId: node.id,
          nodeType: node.type,
          message: error.message,
        });
      }
      registry.remove(node.id);
    }

    log(`[Shutdown] Done: ${summary.stopped} stopped, ${summary.failed} failed`);
    return summary;
  }
}
