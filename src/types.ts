/** Node sizing variants offered by the provider */
export type NodeType = 'fast' | 'large';

export const NODE_TYPES: NodeType[] = ['fast', 'large'];

/** Launch policy: a fixed type, or round-robin over NODE_TYPES */
export type TypePolicy = NodeType | 'alternate';

export type NodeStatus = 'booting' | 'healthy' | 'unhealthy' | 'dead' | 'stopped';

/** Statuses in which a node is still being health-checked */
export const LIVE_STATUSES = new Set<NodeStatus>(['booting', 'healthy', 'unhealthy']);

/** A tracked node (the provider calls these workloads) */
export interface FleetNode {
  id: string;
  hostname: string;
  type: NodeType;
  status: NodeStatus;
  consecutiveFailures: number;
  launchedAt: Date;
  expiresAt: Date;
}

/** What the provider hands back for a freshly launched workload */
export interface NodeHandle {
  id: string;
  hostname: string;
  expiresAt: Date;
}

export interface StopReceipt {
  stoppedAt?: Date;
  refund?: number;
}

export type HealthVerdict = 'healthy' | 'unhealthy';

/** Provider operations the supervisor relies on */
export interface ProviderClient {
  launchNode(type: NodeType): Promise<NodeHandle>;
  stopNode(id: string): Promise<StopReceipt>;
  checkHealth(node: Pick<FleetNode, 'id' | 'hostname'>, timeoutMs: number, signal?: AbortSignal): Promise<HealthVerdict>;
  /** Ids of the workloads the provider currently reports as running */
  listRunning(): Promise<string[]>;
}

export type DeathReason = 'health-checks-failed' | 'expired';

/** Sent by a monitor once its node is dead */
export interface DeathNotice {
  node: FleetNode;
  reason: DeathReason;
  at: Date;
}

/** The registry's view of a running monitor */
export interface MonitorHandle {
  stop(): void;
  readonly done: Promise<void>;
}
