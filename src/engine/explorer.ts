/**
 * PathExplorer — entry point of the exploration engine.
 *
 * Drives a re-runnable nondeterministic program through every path of its
 * execution tree, each exactly once, in lowest-index-first order.
 *
 * ```ts
 * const explorer = new PathExplorer();
 * const report = explorer.explore((choose) => {
 *   const coin = choose(2);
 *   return coin === 0 ? 'heads' : `tails-${choose(3)}`;
 * });
 * // report.runCount === 4: heads, tails-0, tails-1, tails-2
 * ```
 */

import {
  AsyncTargetProgram,
  ExplorationReport,
  ExploreOptions,
  Solution,
  TargetProgram,
} from '../domain/exploration';
import { ExplorationError, configValidationError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { ExplorationEventPublisher } from '../data-plane/publisher';
import { createMemoryEventStore } from '../storage/event-store';
import { ExplorerConfig, createExplorerConfig, validateExplorerConfig } from './config';
import { AsyncExplorationSession, ExplorationSession, SessionDependencies } from './session';
import { isTerminalSessionStatus } from './state-machine';

export interface PathExplorerOptions {
  config?: Partial<ExplorerConfig>;
  logger?: Logger;
  /**
   * Receives every session's events. When omitted, a private publisher keeps
   * the newest `config.maxEvents` events in memory.
   */
  publisher?: ExplorationEventPublisher;
}

export class PathExplorer {
  readonly config: ExplorerConfig;
  readonly publisher: ExplorationEventPublisher;
  private log: Logger;

  constructor(options: PathExplorerOptions = {}) {
    this.config = createExplorerConfig(options.config);
    this.log = (options.logger ?? rootLogger).child({ module: 'explorer' });

    const validation = validateExplorerConfig(this.config);
    if (!validation.valid) {
      throw new ExplorationError(configValidationError(validation.errors));
    }
    for (const warning of validation.warnings) {
      this.log.warn(warning);
    }

    this.publisher =
      options.publisher ??
      new ExplorationEventPublisher(createMemoryEventStore({ maxEvents: this.config.maxEvents }));
  }

  /** Create a session to drive by hand (step, resume, skip failures, cancel). */
  createSession<T>(program: TargetProgram<T>): ExplorationSession<T> {
    return new ExplorationSession(program, this.dependencies());
  }

  createAsyncSession<T>(program: AsyncTargetProgram<T>): AsyncExplorationSession<T> {
    return new AsyncExplorationSession(program, this.dependencies());
  }

  /** Explore every path of a synchronous program. */
  explore<T>(program: TargetProgram<T>, options?: ExploreOptions): ExplorationReport<T> {
    return this.createSession(program).explore(options);
  }

  /** Explore every path of an asynchronous program, one awaited run at a time. */
  exploreAsync<T>(program: AsyncTargetProgram<T>, options?: ExploreOptions): Promise<ExplorationReport<T>> {
    return this.createAsyncSession(program).explore(options);
  }

  /**
   * Yield each successful run as it happens. Stopping the iteration early, or
   * a failure escaping it, cancels the session.
   */
  *walk<T>(program: TargetProgram<T>): Generator<Solution<T>, ExplorationReport<T>, undefined> {
    const session = this.createSession(program);
    try {
      for (;;) {
        const solution = session.step();
        if (!solution) return session.report();
        yield solution;
      }
    } finally {
      if (!isTerminalSessionStatus(session.status)) {
        session.cancel('walk stopped');
      }
    }
  }

  /** The values of every successful run, in exploration order. */
  enumerate<T>(program: TargetProgram<T>): T[] {
    return Array.from(this.walk(program), (solution) => solution.value);
  }

  private dependencies(): SessionDependencies {
    return { config: this.config, logger: this.log, publisher: this.publisher };
  }
}

/** Pick one element of a non-empty array through the choice port. */
export function pick<E>(choose: (n: number) => number, items: readonly E[]): E {
  if (items.length === 0) {
    throw new RangeError('pick() needs at least one item');
  }
  return items[choose(items.length)];
}
