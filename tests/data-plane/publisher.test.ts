/**
 * Tests for the ExplorationEventPublisher.
 *
 * Verifies that:
 * - Events are persisted and delivered to subscribers
 * - Subscriber callback errors don't interrupt publishing
 * - Subscription filtering works correctly
 * - Unsubscribe removes the subscription
 */

import { createMemoryEventStore } from '../../src/storage/event-store';
import { ExplorationEventPublisher } from '../../src/data-plane/publisher';
import { RunStatus, SessionStatus } from '../../src/domain/exploration';
import type { ExplorationReport, RunRecord } from '../../src/domain/exploration';
import type { ExplorationEvent } from '../../src/domain/events';
import { EVENT_SCHEMA_VERSION } from '../../src/domain/events';
import { LogEntry, LogLevel, setLogHandler } from '../../src/logger';

function createMockRun(overrides?: Partial<RunRecord<string>>): RunRecord<string> {
  return {
    id: 'run_1',
    index: 0,
    status: RunStatus.Running,
    choices: [{ n: 2, index: 1 }, { n: 1, index: 0 }],
    path: [1],
    ...overrides,
  };
}

function createMockReport(overrides?: Partial<ExplorationReport<string>>): ExplorationReport<string> {
  return {
    sessionId: 'exp_1',
    status: SessionStatus.Exploring,
    complete: false,
    runCount: 3,
    failedRunCount: 1,
    skippedRunCount: 0,
    runs: [],
    tree: { allocated: 4, live: 3, unexplored: 1, branch: 1, done: 1, depth: 1 },
    ...overrides,
  };
}

describe('ExplorationEventPublisher', () => {
  it('persists events to the store', () => {
    const store = createMemoryEventStore();
    const publisher = new ExplorationEventPublisher(store);

    const event = publisher.publishRunEvent('exp_1', createMockRun(), 'run.started');

    expect(event.type).toBe('run.started');
    expect(event.runId).toBe('run_1');
    expect(event.sessionId).toBe('exp_1');
    expect(event.schemaVersion).toBe(EVENT_SCHEMA_VERSION);
    expect(event.id).toMatch(/^evt_/);

    const stored = store.listByRun('run_1');
    expect(stored).toHaveLength(1);
    expect(stored[0].type).toBe('run.started');
  });

  it('builds run payloads from the record', () => {
    const publisher = new ExplorationEventPublisher();
    const event = publisher.publishRunEvent(
      'exp_1',
      createMockRun({ status: RunStatus.Terminated, durationMs: 4 }),
      'run.terminated',
    );

    expect(event.payload).toEqual({
      runIndex: 0,
      status: 'terminated',
      path: [1],
      choiceCount: 2,
      durationMs: 4,
      error: undefined,
    });
  });

  it('builds session payloads from the report', () => {
    const publisher = new ExplorationEventPublisher();
    const event = publisher.publishSessionEvent(createMockReport(), 'session.limit-reached', { maxRuns: 3 });

    expect(event.runId).toBeUndefined();
    expect(event.payload).toEqual({
      status: 'exploring',
      runCount: 3,
      failedRunCount: 1,
      skippedRunCount: 0,
      liveNodes: 3,
      maxRuns: 3,
    });
  });

  it('delivers events to matching subscribers', () => {
    const publisher = new ExplorationEventPublisher();
    const received: ExplorationEvent[] = [];

    publisher.subscribe({ id: 'sub_1', sessionId: 'exp_1', callback: (event) => received.push(event) });

    publisher.publishRunEvent('exp_1', createMockRun(), 'run.started');
    publisher.publishRunEvent('exp_2', createMockRun({ id: 'run_2' }), 'run.started');

    expect(received).toHaveLength(1);
    expect(received[0].sessionId).toBe('exp_1');
  });

  it('filters by event type', () => {
    const publisher = new ExplorationEventPublisher();
    const received: string[] = [];

    publisher.subscribe({
      id: 'sub_1',
      eventTypes: ['run.failed'],
      callback: (event) => received.push(event.type),
    });

    publisher.publishRunEvent('exp_1', createMockRun(), 'run.started');
    publisher.publishRunEvent('exp_1', createMockRun({ status: RunStatus.Failed }), 'run.failed');

    expect(received).toEqual(['run.failed']);
  });

  it('keeps publishing when a subscriber throws', () => {
    const warnings: LogEntry[] = [];
    setLogHandler((entry) => warnings.push(entry));
    try {
      const publisher = new ExplorationEventPublisher();
      const received: string[] = [];

      publisher.subscribe({
        id: 'sub_bad',
        callback: () => {
          throw new Error('subscriber broke');
        },
      });
      publisher.subscribe({ id: 'sub_good', callback: (event) => received.push(event.type) });

      expect(() => publisher.publishRunEvent('exp_1', createMockRun(), 'run.started')).not.toThrow();
      expect(received).toEqual(['run.started']);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({
        level: LogLevel.Warn,
        message: 'Event subscriber threw',
        context: { module: 'publisher', subscriptionId: 'sub_bad', error: 'Error: subscriber broke' },
      });
    } finally {
      setLogHandler(() => undefined);
    }
  });

  it('unsubscribe removes the subscription', () => {
    const publisher = new ExplorationEventPublisher();
    const received: string[] = [];

    const unsubscribe = publisher.subscribe({ id: 'sub_1', callback: (event) => received.push(event.type) });
    publisher.publishRunEvent('exp_1', createMockRun(), 'run.started');
    unsubscribe();
    publisher.publishRunEvent('exp_1', createMockRun(), 'run.terminated');

    expect(received).toEqual(['run.started']);
  });

  it('queries events by session and type', () => {
    const publisher = new ExplorationEventPublisher();
    publisher.publishSessionEvent(createMockReport(), 'session.started');
    publisher.publishRunEvent('exp_1', createMockRun(), 'run.started');
    publisher.publishRunEvent('exp_1', createMockRun(), 'run.terminated');

    expect(publisher.getEventsBySession('exp_1').map((e) => e.type)).toEqual([
      'session.started',
      'run.started',
      'run.terminated',
    ]);
    expect(publisher.getEventsBySession('exp_1', ['run.terminated'])).toHaveLength(1);
    expect(publisher.getEventsByRun('run_1')).toHaveLength(2);
  });
});
