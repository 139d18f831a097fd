/**
 * choicewalk — exhaustive path exploration for nondeterministic programs.
 *
 * Wraps a re-runnable program that makes its nondeterministic decisions
 * through a single choice port, and re-runs it until every path of its
 * execution tree has been executed exactly once.
 */

export * from './domain';
export * from './engine';
export { ExplorationEventPublisher } from './data-plane/publisher';
export { EventStore, ListOptions, MemoryEventStoreOptions, createMemoryEventStore } from './storage/event-store';
export {
  LogLevel,
  LogEntry,
  LogHandler,
  Logger,
  createLogger,
  logger,
  setLogHandler,
  setLogLevel,
  parseLogLevel,
  configureLogLevelFromEnv,
} from './logger';
