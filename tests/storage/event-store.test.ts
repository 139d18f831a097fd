/**
 * MemoryEventStore keeps its own copies: mutating an event after storing it,
 * or mutating a listed event, must not change what is stored.
 */

import { createMemoryEventStore } from '../../src/storage/event-store';
import type { ExplorationEvent, ExplorationEventType } from '../../src/domain/events';

function makeEvent(id: string, type: ExplorationEventType, runId?: string, sessionId = 'exp_1'): ExplorationEvent {
  return {
    id,
    type,
    schemaVersion: '1.0.0',
    timestamp: '2024-01-01T00:00:00Z',
    sessionId,
    runId,
    payload: { path: [0, 1] },
  };
}

describe('MemoryEventStore', () => {
  it('indexes events by session and run, in insertion order', () => {
    const store = createMemoryEventStore();
    store.create(makeEvent('e1', 'session.started'));
    store.create(makeEvent('e2', 'run.started', 'run_1'));
    store.create(makeEvent('e3', 'run.started', 'run_2', 'exp_2'));
    store.create(makeEvent('e4', 'run.terminated', 'run_1'));

    expect(store.count()).toBe(4);
    expect(store.listBySession('exp_1').map((e) => e.id)).toEqual(['e1', 'e2', 'e4']);
    expect(store.listByRun('run_1').map((e) => e.id)).toEqual(['e2', 'e4']);
    expect(store.listBySession('exp_missing')).toEqual([]);
  });

  it('filters by type and pages with offset and limit', () => {
    const store = createMemoryEventStore();
    for (let i = 0; i < 5; i++) {
      store.create(makeEvent(`r${i}`, 'run.terminated', `run_${i}`));
    }
    store.create(makeEvent('c', 'session.completed'));

    expect(store.listBySession('exp_1', { eventTypes: ['session.completed'] }).map((e) => e.id)).toEqual(['c']);
    expect(
      store.listBySession('exp_1', { eventTypes: ['run.terminated'], offset: 1, limit: 2 }).map((e) => e.id),
    ).toEqual(['r1', 'r2']);
  });

  it('returns at most 100 events by default', () => {
    const store = createMemoryEventStore();
    for (let i = 0; i < 120; i++) {
      store.create(makeEvent(`e${i}`, 'run.started', 'run_1'));
    }
    expect(store.listByRun('run_1')).toHaveLength(100);
    expect(store.listByRun('run_1', { limit: 500 })).toHaveLength(120);
  });

  it('is not affected by mutating the original or a listed event', () => {
    const store = createMemoryEventStore();
    const original = makeEvent('e1', 'run.started', 'run_1');
    const returned = store.create(original);

    original.payload.path = [9];
    returned.payload.path = [8];
    store.listByRun('run_1')[0].payload.path = [7];

    expect(store.listByRun('run_1')[0].payload).toEqual({ path: [0, 1] });
  });

  it('evicts the oldest events beyond maxEvents', () => {
    const store = createMemoryEventStore({ maxEvents: 3 });
    store.create(makeEvent('e1', 'session.started'));
    store.create(makeEvent('e2', 'run.started', 'run_1'));
    store.create(makeEvent('e3', 'run.terminated', 'run_1'));
    store.create(makeEvent('e4', 'session.started', undefined, 'exp_2'));
    store.create(makeEvent('e5', 'run.started', 'run_2', 'exp_2'));

    expect(store.count()).toBe(3);
    expect(store.listBySession('exp_1').map((e) => e.id)).toEqual(['e3']);
    expect(store.listBySession('exp_2').map((e) => e.id)).toEqual(['e4', 'e5']);
    expect(store.listByRun('run_1').map((e) => e.id)).toEqual(['e3']);
  });

  it('keeps nothing with maxEvents 0 but still returns the created event', () => {
    const store = createMemoryEventStore({ maxEvents: 0 });
    const returned = store.create(makeEvent('e1', 'run.started', 'run_1'));

    expect(returned.id).toBe('e1');
    expect(store.count()).toBe(0);
    expect(store.listByRun('run_1')).toEqual([]);
  });

  it('clear removes every event and index', () => {
    const store = createMemoryEventStore();
    store.create(makeEvent('e1', 'run.started', 'run_1'));
    store.clear();

    expect(store.count()).toBe(0);
    expect(store.listBySession('exp_1')).toEqual([]);
    expect(store.listByRun('run_1')).toEqual([]);
  });
});
