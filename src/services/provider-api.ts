/**
 * Compute provider HTTP API client.
 *
 * Launches, stops and lists workloads, and health-checks a workload by
 * requesting its public hostname.
 */

import type { Config } from '../config.js';
import type { FleetNode, HealthVerdict, NodeHandle, NodeType, ProviderClient, StopReceipt } from '../types.js';
import { HealthCheckError, ProviderApiError } from '../errors.js';
import { describeError } from '../logger.js';

type ProviderConfig = Pick<Config, 'apiKey' | 'apiUrl' | 'origin' | 'workloadPrefix' | 'runtimeSeconds' | 'requestTimeoutSeconds'>;

interface LaunchResponse {
  workload: string;
  node: string;
}

interface WorkloadSummary {
  workload: string;
}

export class ComputeApiClient implements ProviderClient {
  constructor(private readonly config: ProviderConfig) {}

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const res = await fetch(`${this.config.apiUrl}${path}`, {
      method: 'POST',
      headers: {
        'X-C3-API-KEY': this.config.apiKey,
        'Content-Type': 'application/json',
        Origin: this.config.origin,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.requestTimeoutSeconds * 1000),
    });

    if (!res.ok) {
      throw new ProviderApiError('POST', path, res.status, await res.text());
    }
    return res.json();
  }

  workloadType(type: NodeType): string {
    return `${this.config.workloadPrefix}:${type}`;
  }

  async launchNode(type: NodeType): Promise<NodeHandle> {
    const expires = Math.floor(Date.now() / 1000) + this.config.runtimeSeconds;
    const data = await this.post('/launch', { type: this.workloadType(type), expires });

    if (!isLaunchResponse(data)) {
      throw new Error(`Unexpected /launch response: ${JSON.stringify(data)}`);
    }
    return {
      id: data.workload,
      hostname: data.node,
      expiresAt: new Date(expires * 1000),
    };
  }

  async stopNode(id: string): Promise<StopReceipt> {
    const data = await this.post('/stop', { workload: id });
    const receipt: StopReceipt = {};
    if (isRecord(data)) {
      if (typeof data.stopped === 'number') receipt.stoppedAt = new Date(data.stopped * 1000);
      if (typeof data.refund_amount === 'number') receipt.refund = data.refund_amount;
    }
    return receipt;
  }

  async listRunning(): Promise<string[]> {
    const data = await this.post('/workloads', { running: true });
    if (!Array.isArray(data)) {
      throw new Error(`Unexpected /workloads response: ${JSON.stringify(data)}`);
    }
    return data.filter(isWorkloadSummary).map(w => w.workload);
  }

  async checkHealth(
    node: Pick<FleetNode, 'id' | 'hostname'>,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<HealthVerdict> {
    const timeout = AbortSignal.timeout(timeoutMs);
    try {
      const res = await fetch(`https://${node.hostname}`, {
        headers: { 'X-C3-API-KEY': this.config.apiKey },
        signal: signal ? AbortSignal.any([timeout, signal]) : timeout,
      });
      // Drain so the socket can be reused
      await res.arrayBuffer();
      return res.status === 200 ? 'healthy' : 'unhealthy';
    } catch (err) {
      const detail = timeout.aborted ? `timed out after ${timeoutMs}ms` : describeError(err);
      throw new HealthCheckError(node.id, detail, { cause: err });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isLaunchResponse(value: unknown): value is LaunchResponse {
  return isRecord(value) && typeof value.workload === 'string' && typeof value.node === 'string';
}

function isWorkloadSummary(value: unknown): value is WorkloadSummary {
  return isRecord(value) && typeof value.workload === 'string';
}
