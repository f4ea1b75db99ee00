/**
 * In-process stand-ins for the provider API and the event sink, used by the
 * fleet tests. Workload ids are handed out in order: wl-1, wl-2, …
 */

import type { FleetNode, HealthVerdict, NodeHandle, NodeType, ProviderClient, StopReceipt } from '../types.js';
import type { FleetEvent, FleetEventSink } from '../services/events.js';
import { HealthCheckError, ProviderApiError } from '../errors.js';
import { sleep } from '../fleet/sleep.js';

type ScriptedResult = HealthVerdict | 'error';

export class FakeProvider implements ProviderClient {
  /** Every launch attempt, including refused ones */
  readonly launches: NodeType[] = [];
  readonly stops: string[] = [];
  readonly checks: string[] = [];
  readonly running = new Set<string>();

  /** Nodes that fail every check */
  readonly down = new Set<string>();
  /** Nodes whose checks never answer until aborted */
  readonly hanging = new Set<string>();
  readonly stopFailures = new Set<string>();

  failNextLaunches = 0;
  /** How long each launch takes to answer */
  launchDelayMs = 0;
  listError: Error | null = null;

  private seq = 0;
  private scripts = new Map<string, ScriptedResult[]>();

  /** Queue results for the next checks of a node; afterwards `down` decides. */
  script(id: string, ...results: ScriptedResult[]): void {
    this.scripts.set(id, [...(this.scripts.get(id) ?? []), ...results]);
  }

  async launchNode(type: NodeType): Promise<NodeHandle> {
    this.launches.push(type);
    if (this.launchDelayMs > 0) await sleep(this.launchDelayMs);
    if (this.failNextLaunches > 0) {
      this.failNextLaunches--;
      throw new ProviderApiError('POST', '/launch', 503, 'no capacity');
    }
    const n = ++this.seq;
    const id = `wl-${n}`;
    this.running.add(id);
    return { id, hostname: `node-${n}.test`, expiresAt: new Date(Date.now() + 3_600_000) };
  }

  async stopNode(id: string): Promise<StopReceipt> {
    this.stops.push(id);
    if (this.stopFailures.has(id)) {
      throw new ProviderApiError('POST', '/stop', 500, 'stop failed');
    }
    this.running.delete(id);
    return { refund: 0 };
  }

  async checkHealth(
    node: Pick<FleetNode, 'id' | 'hostname'>,
    _timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<HealthVerdict> {
    this.checks.push(node.id);

    if (this.hanging.has(node.id)) {
      return new Promise((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('check aborted')), { once: true });
      });
    }

    const next = this.scripts.get(node.id)?.shift();
    if (next === 'error') {
      throw new HealthCheckError(node.id, 'connection refused');
    }
    if (next) return next;
    return this.down.has(node.id) ? 'unhealthy' : 'healthy';
  }

  async listRunning(): Promise<string[]> {
    if (this.listError) throw this.listError;
    return [...this.running];
  }
}

export class RecordingEvents implements FleetEventSink {
  readonly events: FleetEvent[] = [];

  async publish(event: FleetEvent): Promise<void> {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map(e => e.eventType);
  }
}
