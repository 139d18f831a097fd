/**
 * Exploration event domain model.
 *
 * Events are emitted as stable, versioned records for downstream consumers
 * (progress displays, audit logs, test harnesses).
 */

/** Event types emitted while exploring. */
export type ExplorationEventType =
  | 'session.started'
  | 'session.completed'
  | 'session.limit-reached'
  | 'session.interrupted'
  | 'session.faulted'
  | 'session.canceled'
  | 'run.started'
  | 'run.terminated'
  | 'run.failed'
  | 'run.skipped';

/** An exploration event with stable schema. */
export interface ExplorationEvent {
  id: string;
  type: ExplorationEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  sessionId: string;
  runId?: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Only deliver events of this session. */
  sessionId?: string;
  /** Filter by event types. */
  eventTypes?: ExplorationEventType[];
  /** Callback for event delivery. */
  callback: (event: ExplorationEvent) => void;
}

export const EVENT_SCHEMA_VERSION = '1.0.0';
