import type { NodeStatus, NodeType } from './types.js';
import { describeError } from './logger.js';

/** Fatal: the process cannot start supervising (config, credential, empty initial fill). */
export class StartupError extends Error {
  readonly name = 'StartupError' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Non-2xx answer from the provider API. */
export class ProviderApiError extends Error {
  readonly name = 'ProviderApiError' as const;
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Provider ${method} ${path} failed (${status}): ${body}`);
  }

  get isAuthFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

export class LaunchError extends Error {
  readonly name = 'LaunchError' as const;
  constructor(readonly nodeType: NodeType, cause: unknown) {
    super(`Failed to launch ${nodeType} node: ${describeError(cause)}`, { cause });
  }
}

/** A health check that timed out or could not reach the node. Counts as a strike. */
export class HealthCheckError extends Error {
  readonly name = 'HealthCheckError' as const;
  constructor(readonly nodeId: string, detail: string, options?: { cause?: unknown }) {
    super(`Health check for ${nodeId} failed: ${detail}`, options);
  }
}

export class ProviderStopError extends Error {
  readonly name = 'ProviderStopError' as const;
  constructor(readonly nodeId: string, cause: unknown) {
    super(`Failed to stop ${nodeId}: ${describeError(cause)}`, { cause });
  }
}

export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError' as const;
  constructor(nodeId: string, from: NodeStatus, to: NodeStatus) {
    super(`Invalid transition for ${nodeId}: ${from} → ${to}`);
  }
}

export class NodeNotFoundError extends Error {
  readonly name = 'NodeNotFoundError' as const;
  constructor(nodeId: string) {
    super(`Node not found: ${nodeId}`);
  }
}

