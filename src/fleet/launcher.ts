/**
 * Node Launcher
 *
 * Launches a workload, registers it and starts its monitor. Registration and
 * monitor start happen in one synchronous step after the provider answers.
 */

import type { FleetNode, NodeHandle, NodeType, ProviderClient } from '../types.js';
import type { FleetRegistry } from './registry.js';
import type { DeathChannel } from './death-channel.js';
import type { TypeAlternator } from './type-alternator.js';
import type { FleetEventSink } from '../services/events.js';
import type { MonitorTiming } from './health-monitor.js';
import { HealthMonitor } from './health-monitor.js';
import { LaunchError } from '../errors.js';
import { log } from '../logger.js';

export interface NodeLauncherDeps {
  provider: ProviderClient;
  registry: FleetRegistry;
  alternator: TypeAlternator;
  deaths: DeathChannel;
  timing: MonitorTiming;
  events: FleetEventSink;
}

export class NodeLauncher {
  constructor(private readonly deps: NodeLauncherDeps) {}

  /**
   * Launch one node. Without a requested type the alternator decides.
   * Throws LaunchError when the provider refuses.
   */
  async launch(requestedType?: NodeType): Promise<FleetNode> {
    const { provider, registry, alternator, events } = this.deps;
    const type = requestedType ?? alternator.next();

    log(`[Launcher] Launching ${type} node...`);
    let handle: NodeHandle;
    try {
      handle = await provider.launchNode(type);
    } catch (err) {
      throw new LaunchError(type, err);
    }

    const node: FleetNode = {
      id: handle.id,
      hostname: handle.hostname,
      type,
      status: 'booting',
      consecutiveFailures: 0,
      launchedAt: new Date(),
      expiresAt: handle.expiresAt,
    };

    const monitor = new HealthMonitor(node, this.deps);
    registry.add(node, monitor);
    monitor.start();

    log(`[Launcher] Launched ${node.hostname} (${type}, ID: ${node.id})`);
    await events.publish({
      eventType: 'NODE_LAUNCHED',
      nodeId: node.id,
      nodeType: type,
      message: `Launched ${node.hostname}`,
      details: { hostname: node.hostname, expiresAt: node.expiresAt.toISOString() },
    });

    return { ...node };
  }
}
