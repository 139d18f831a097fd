/**
 * Exploration event publisher.
 *
 * Emits stable, versioned exploration events, persists them to an event
 * store and delivers them to subscribers.
 */

import { v4 as uuid } from 'uuid';
import {
  EVENT_SCHEMA_VERSION,
  EventSubscription,
  ExplorationEvent,
  ExplorationEventType,
} from '../domain/events';
import { ExplorationReport, RunRecord } from '../domain/exploration';
import { EventStore, createMemoryEventStore } from '../storage/event-store';
import { logger } from '../logger';

const log = logger.child({ module: 'publisher' });

/** The exploration event publisher. */
export class ExplorationEventPublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(private store: EventStore = createMemoryEventStore()) {}

  /** Publish a session lifecycle event carrying the session's report counters. */
  publishSessionEvent<T>(
    report: ExplorationReport<T>,
    eventType: ExplorationEventType,
    extra?: Record<string, unknown>,
  ): ExplorationEvent {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      sessionId: report.sessionId,
      payload: {
        status: report.status,
        runCount: report.runCount,
        failedRunCount: report.failedRunCount,
        skippedRunCount: report.skippedRunCount,
        liveNodes: report.tree.live,
        ...extra,
      },
    });
  }

  /** Publish a run lifecycle event. */
  publishRunEvent<T>(sessionId: string, run: RunRecord<T>, eventType: ExplorationEventType): ExplorationEvent {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      sessionId,
      runId: run.id,
      payload: {
        runIndex: run.index,
        status: run.status,
        path: [...run.path],
        choiceCount: run.choices.length,
        durationMs: run.durationMs,
        error: run.error,
      },
    });
  }

  /** Publish an arbitrary event. */
  publishEvent(event: ExplorationEvent): ExplorationEvent {
    const stored = this.store.create(event);

    for (const sub of this.subscriptions) {
      if (this.matchesSubscription(event, sub)) {
        try {
          sub.callback(event);
        } catch (err) {
          // Subscriber failures must not reach the exploration loop.
          log.warn('Event subscriber threw', { subscriptionId: sub.id, eventType: event.type, error: String(err) });
        }
      }
    }

    return stored;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query events by session, optionally filtered by type. */
  getEventsBySession(sessionId: string, eventTypes?: ExplorationEventType[]): ExplorationEvent[] {
    return this.store.listBySession(sessionId, { eventTypes, limit: Number.MAX_SAFE_INTEGER });
  }

  /** Query events by run. */
  getEventsByRun(runId: string): ExplorationEvent[] {
    return this.store.listByRun(runId, { limit: Number.MAX_SAFE_INTEGER });
  }

  /** Number of events the store currently keeps. */
  storedEventCount(): number {
    return this.store.count();
  }

  private matchesSubscription(event: ExplorationEvent, sub: EventSubscription): boolean {
    if (sub.sessionId && event.sessionId !== sub.sessionId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
