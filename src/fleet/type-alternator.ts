import type { NodeType, TypePolicy } from '../types.js';
import { NODE_TYPES } from '../types.js';

/**
 * Picks the type for each launch. Under 'alternate' the sequence is
 * fleet-wide (fast, large, fast, …) no matter which node a launch replaces.
 */
export class TypeAlternator {
  private launches = 0;

  constructor(readonly policy: TypePolicy) {}

  next(): NodeType {
    if (this.policy !== 'alternate') return this.policy;
    const type = NODE_TYPES[this.launches % NODE_TYPES.length] ?? 'fast';
    this.launches++;
    return type;
  }

  /** How many types the alternating sequence has handed out. */
  get issued(): number {
    return this.launches;
  }
}
