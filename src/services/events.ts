/**
 * Event Publisher
 *
 * Appends fleet events (launches, deaths, failed replacements, supervisor
 * lifecycle) to the fleet_events table. The table is an audit trail only;
 * nothing reads it back into the supervisor.
 */

import pg from 'pg';
import type { Config } from '../config.js';
import type { NodeType } from '../types.js';
import { describeError, log } from '../logger.js';

const { Pool } = pg;

export type FleetEventType =
  | 'NODE_LAUNCHED'
  | 'NODE_DEAD'
  | 'NODE_STOP_FAILED'
  | 'LAUNCH_FAILED'
  | 'SUPERVISOR_START'
  | 'SUPERVISOR_STOP';

export type EventSeverity = 'INFO' | 'WARNING' | 'CRITICAL';

export interface FleetEvent {
  eventType: FleetEventType;
  severity?: EventSeverity;
  nodeId?: string;
  nodeType?: NodeType;
  message?: string;
  details?: Record<string, unknown>;
}

/** Where fleet components report events. */
export interface FleetEventSink {
  publish(event: FleetEvent): Promise<void>;
}

export const INSERT_EVENT_SQL = `INSERT INTO fleet_events
         (event_type, severity, node_id, node_type, message, details)
         VALUES ($1, $2, $3, $4, $5, $6)`;

export function eventParams(event: FleetEvent): Array<string | null> {
  return [
    event.eventType,
    event.severity ?? 'INFO',
    event.nodeId ?? null,
    event.nodeType ?? null,
    event.message ?? null,
    event.details ? JSON.stringify(event.details) : null,
  ];
}

/**
 * Event publisher that writes directly to Postgres.
 * Disables itself if Postgres is unavailable.
 */
export class EventPublisher implements FleetEventSink {
  private pool: pg.Pool | null = null;
  private postgresAvailable: boolean = true;

  constructor(config: Pick<Config, 'postgresUrl'>) {
    this.initPostgres(config);
  }

  get enabled(): boolean {
    return this.pool !== null && this.postgresAvailable;
  }

  private initPostgres(config: Pick<Config, 'postgresUrl'>): void {
    if (!config.postgresUrl) {
      log('[Events] No Postgres URL configured, event publishing disabled');
      this.postgresAvailable = false;
      return;
    }

    try {
      this.pool = new Pool({
        connectionString: config.postgresUrl,
        max: 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
      });

      this.pool.on('error', (err) => {
        log(`[Events] Postgres pool error: ${err.message}`);
        this.postgresAvailable = false;
      });
    } catch (err) {
      log(`[Events] Failed to initialize Postgres: ${describeError(err)}`);
      this.postgresAvailable = false;
    }
  }

  /**
   * Insert one event. Never throws.
   */
  async publish(event: FleetEvent): Promise<void> {
    if (!this.pool || !this.postgresAvailable) {
      return;
    }

    try {
      await this.pool.query(INSERT_EVENT_SQL, eventParams(event));
      log(`[Events] Published ${event.eventType}${event.nodeId ? ` (${event.nodeId})` : ''}`);
    } catch (err) {
      if (err instanceof Error && err.message.includes('does not exist')) {
        log('[Events] fleet_events table does not exist, disabling event publishing');
        this.postgresAvailable = false;
      } else {
        log(`[Events] Failed to publish event: ${describeError(err)}`);
      }
    }
  }

  async publishLifecycle(started: boolean, details?: Record<string, unknown>): Promise<void> {
    await this.publish({
      eventType: started ? 'SUPERVISOR_START' : 'SUPERVISOR_STOP',
      severity: 'INFO',
      message: started ? 'Fleet supervisor started' : 'Fleet supervisor stopped',
      details,
    });
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
