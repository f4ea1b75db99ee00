/**
 * Fleet Registry
 *
 * The single owner of tracked node state. Nodes enter together with their
 * monitor and leave through remove(); every status change goes through
 * transition(), which enforces the lifecycle graph below. Callers only ever
 * see copies.
 *
 * ```
 * booting   → healthy, dead, stopped
 * healthy   → unhealthy, dead, stopped
 * unhealthy → healthy, dead, stopped
 * dead, stopped: terminal
 * ```
 */

import type { FleetNode, MonitorHandle, NodeStatus } from '../types.js';
import { LIVE_STATUSES } from '../types.js';
import { InvalidTransitionError, NodeNotFoundError } from '../errors.js';

export const VALID_TRANSITIONS: Record<NodeStatus, readonly NodeStatus[]> = {
  booting: ['healthy', 'dead', 'stopped'],
  healthy: ['unhealthy', 'dead', 'stopped'],
  unhealthy: ['healthy', 'dead', 'stopped'],
  dead: [],
  stopped: [],
};

export function isValidTransition(from: NodeStatus, to: NodeStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

interface Entry {
  node: FleetNode;
  monitor: MonitorHandle;
}

export class FleetRegistry {
  private entries = new Map<string, Entry>();

  /** Track a node together with the monitor that owns its health state. */
  add(node: FleetNode, monitor: MonitorHandle): void {
    if (this.entries.has(node.id)) {
      throw new Error(`Node ${node.id} is already tracked`);
    }
    this.entries.set(node.id, { node: { ...node }, monitor });
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): FleetNode | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry.node } : undefined;
  }

  monitorOf(id: string): MonitorHandle | undefined {
    return this.entries.get(id)?.monitor;
  }

  list(): FleetNode[] {
    return [...this.entries.values()].map(e => ({ ...e.node }));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Nodes whose monitor is still checking them. */
  get liveCount(): number {
    let n = 0;
    for (const { node } of this.entries.values()) {
      if (LIVE_STATUSES.has(node.status)) n++;
    }
    return n;
  }

  /**
   * Move a node to a new status. A transition to the status it already has
   * is a no-op.
   */
  transition(id: string, to: NodeStatus): FleetNode {
    const node = this.require(id);
    if (node.status !== to) {
      if (!isValidTransition(node.status, to)) {
        throw new InvalidTransitionError(id, node.status, to);
      }
      node.status = to;
      if (!LIVE_STATUSES.has(to)) node.consecutiveFailures = 0;
    }
    return { ...node };
  }

  /**
   * Record a health check result. Success resets the strike counter; failure
   * adds one. Returns the updated copy.
   */
  recordCheck(id: string, passed: boolean): FleetNode {
    const node = this.require(id);
    if (!LIVE_STATUSES.has(node.status)) {
      throw new InvalidTransitionError(id, node.status, node.status);
    }
    node.consecutiveFailures = passed ? 0 : node.consecutiveFailures + 1;
    return { ...node };
  }

  remove(id: string): boolean {
    return this.entries.delete(id);
  }

  private require(id: string): FleetNode {
    const entry = this.entries.get(id);
    if (!entry) throw new NodeNotFoundError(id);
    return entry.node;
  }
}
