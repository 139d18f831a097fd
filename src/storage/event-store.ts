/**
 * Event storage.
 *
 * Exploration runs synchronously, so the store contract is synchronous too.
 * The in-memory implementation indexes events by session and by run, and
 * hands out copies so callers cannot mutate stored events. Given maxEvents,
 * it keeps only the newest events.
 */

import { ExplorationEvent, ExplorationEventType } from '../domain/events';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for exploration events. */
export interface EventStore {
  create(event: ExplorationEvent): ExplorationEvent;
  listBySession(
    sessionId: string,
    options?: ListOptions & { eventTypes?: ExplorationEventType[] },
  ): ExplorationEvent[];
  listByRun(runId: string, options?: ListOptions): ExplorationEvent[];
  /** Number of stored events. */
  count(): number;
  clear(): void;
}

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function appendIndex(index: Map<string, ExplorationEvent[]>, key: string, event: ExplorationEvent): void {
  const events = index.get(key) ?? [];
  events.push(event);
  index.set(key, events);
}

/** The evicted event is always the oldest one under its key. */
function dropOldest(index: Map<string, ExplorationEvent[]>, key: string): void {
  const events = index.get(key);
  if (!events) return;
  events.shift();
  if (events.length === 0) index.delete(key);
}

export interface MemoryEventStoreOptions {
  /** Oldest events are evicted beyond this many. Unbounded when undefined. */
  maxEvents?: number;
}

class MemoryEventStore implements EventStore {
  private data: ExplorationEvent[] = [];
  private sessionIndex = new Map<string, ExplorationEvent[]>();
  private runIndex = new Map<string, ExplorationEvent[]>();

  constructor(private maxEvents?: number) {}

  create(event: ExplorationEvent): ExplorationEvent {
    const stored = structuredClone(event);
    this.data.push(stored);
    appendIndex(this.sessionIndex, stored.sessionId, stored);
    if (stored.runId) {
      appendIndex(this.runIndex, stored.runId, stored);
    }
    if (this.maxEvents !== undefined) {
      while (this.data.length > this.maxEvents) {
        this.evictOldest();
      }
    }
    return structuredClone(event);
  }

  listBySession(
    sessionId: string,
    options?: ListOptions & { eventTypes?: ExplorationEventType[] },
  ): ExplorationEvent[] {
    let items = this.sessionIndex.get(sessionId) ?? [];
    const eventTypes = options?.eventTypes;
    if (eventTypes?.length) {
      items = items.filter((e) => eventTypes.includes(e.type));
    }
    return applyListOptions(items, options).map((e) => structuredClone(e));
  }

  listByRun(runId: string, options?: ListOptions): ExplorationEvent[] {
    const items = this.runIndex.get(runId) ?? [];
    return applyListOptions(items, options).map((e) => structuredClone(e));
  }

  count(): number {
    return this.data.length;
  }

  clear(): void {
    this.data = [];
    this.sessionIndex.clear();
    this.runIndex.clear();
  }

  private evictOldest(): void {
    const oldest = this.data.shift();
    if (!oldest) return;
    dropOldest(this.sessionIndex, oldest.sessionId);
    if (oldest.runId) {
      dropOldest(this.runIndex, oldest.runId);
    }
  }
}

/** Create an in-memory event store. */
export function createMemoryEventStore(options: MemoryEventStoreOptions = {}): EventStore {
  return new MemoryEventStore(options.maxEvents);
}
