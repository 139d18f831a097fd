/**
 * Exploration sessions — the driver loop.
 *
 * A session owns one execution tree and re-runs its target program until the
 * tree's root is Done:
 *
 *   prune -> stop if the root is Done -> cursor := root -> run the program,
 *   answering each choice from the tree -> mark the cursor's node Done -> repeat
 *
 * Runs are strictly sequential. Cancellation and the run limit are checked
 * between runs only.
 *
 * A run that throws leaves its path unmarked and interrupts the session with
 * a TargetFailure. The caller then either explores again (the same path runs
 * again) or calls skipFailedRun() to mark that path explored. A
 * ConsistencyFault ends the session for good.
 */

import { v4 as uuid } from 'uuid';
import {
  AsyncTargetProgram,
  ExplorationReport,
  ExploreOptions,
  RunRecord,
  RunStatus,
  SessionStatus,
  Solution,
  TargetProgram,
} from '../domain/exploration';
import { ExplorationEventType } from '../domain/events';
import { NodeState } from '../domain/choice-node';
import {
  ConsistencyFault,
  ExhaustionLimitError,
  ExplorationError,
  TargetFailure,
  TypedError,
  alreadyRunningError,
  configValidationError,
  explorationLimitError,
  noFailedRunError,
  sessionClosedError,
  skipWouldDropPathsError,
  targetFailedError,
} from '../domain/errors';
import { Logger } from '../logger';
import { ExplorationEventPublisher } from '../data-plane/publisher';
import { ExplorerConfig } from './config';
import { ExecutionTree } from './execution-tree';
import { RunContext } from './run-context';
import { transitionRunStatus, transitionSessionStatus } from './state-machine';

/** Collaborators shared by every session an explorer creates. */
export interface SessionDependencies {
  config: ExplorerConfig;
  logger: Logger;
  publisher: ExplorationEventPublisher;
}

interface FailedRun<T> {
  context: RunContext;
  record: RunRecord<T>;
}

/** Lifecycle, bookkeeping and tree handling shared by the sync and async sessions. */
export abstract class SessionCore<T> {
  readonly id = `exp_${uuid()}`;
  readonly tree = new ExecutionTree();
  protected readonly config: ExplorerConfig;
  protected readonly log: Logger;
  private readonly publisher: ExplorationEventPublisher;

  private currentStatus = SessionStatus.Idle;
  private records: RunRecord<T>[] = [];
  private nextRunIndex = 0;
  private runCount = 0;
  private failedRunCount = 0;
  private skippedRunCount = 0;
  private lastFailure?: FailedRun<T>;
  private cancelRequest?: { reason?: string };
  private cancelReason?: string;
  private startedAt?: string;
  private completedAt?: string;
  /** Set for the whole of an explore() or step() call. */
  protected running = false;

  constructor(deps: SessionDependencies) {
    this.config = deps.config;
    this.publisher = deps.publisher;
    this.log = deps.logger.child({ sessionId: this.id });
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  /** Recorded runs in execution order (empty when run recording is off). */
  get runs(): readonly RunRecord<T>[] {
    return this.records;
  }

  report(): ExplorationReport<T> {
    return {
      sessionId: this.id,
      status: this.currentStatus,
      complete: this.currentStatus === SessionStatus.Completed,
      runCount: this.runCount,
      failedRunCount: this.failedRunCount,
      skippedRunCount: this.skippedRunCount,
      runs: [...this.records],
      tree: this.tree.stats(),
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      cancelReason: this.cancelReason,
    };
  }

  /**
   * Stop exploring. Between runs this takes effect immediately; called while
   * the session is exploring (from the program or an event subscriber), it
   * takes effect once the current run has finished. Finished sessions ignore it.
   */
  cancel(reason?: string): void {
    if (this.currentStatus === SessionStatus.Exploring) {
      this.cancelRequest = { reason };
      return;
    }
    if (
      this.currentStatus === SessionStatus.Completed ||
      this.currentStatus === SessionStatus.Faulted ||
      this.currentStatus === SessionStatus.Canceled
    ) {
      return;
    }
    this.applyCancel(reason);
  }

  /**
   * Mark the path of the last failed run as explored so exploration can move
   * past it. Only ever done on request: the engine never skips a failure by itself.
   *
   * Refused when the run failed at a choice point that earlier runs already
   * went past, since marking it Done would drop its unexplored options.
   */
  skipFailedRun(): RunRecord<T> {
    this.assertNotRunning();
    const failure = this.lastFailure;
    if (!failure || this.currentStatus !== SessionStatus.Interrupted) {
      throw new ExplorationError(noFailedRunError(this.id));
    }
    const node = failure.context.cursor;
    if (this.tree.stateOf(node) === NodeState.Branch) {
      throw new ExplorationError(skipWouldDropPathsError(this.id, failure.record.index, node));
    }
    this.lastFailure = undefined;

    this.tree.markDone(failure.context.cursor);
    if (this.config.pruneStrategy === 'path') {
      this.tree.prunePath(failure.context.visited);
    }

    const record = failure.record;
    this.transitionRun(record, RunStatus.Skipped);
    this.skippedRunCount++;
    this.publishRun(record, 'run.skipped');
    this.log.info('Failed run skipped', { runId: record.id, runIndex: record.index, path: record.path });
    return record;
  }

  /**
   * Enter an explore()/step() call. Returns false when there is nothing left
   * to do because the session already completed.
   */
  protected enter(): boolean {
    this.assertNotRunning();
    if (this.currentStatus === SessionStatus.Completed) return false;
    if (this.currentStatus === SessionStatus.Faulted || this.currentStatus === SessionStatus.Canceled) {
      throw new ExplorationError(sessionClosedError(this.id, this.currentStatus));
    }

    this.transitionSession(SessionStatus.Exploring);
    if (!this.startedAt) {
      this.startedAt = new Date().toISOString();
      this.publishSession('session.started');
      this.log.info('Exploration started', { pruneStrategy: this.config.pruneStrategy });
    }
    return true;
  }

  protected resolveLimit(options?: ExploreOptions): { maxRuns?: number; failOnLimit: boolean } {
    const maxRuns = options?.maxRuns ?? this.config.maxRuns;
    if (maxRuns !== undefined && (!Number.isInteger(maxRuns) || maxRuns < 1)) {
      throw new ExplorationError(configValidationError(['maxRuns must be a positive integer']));
    }
    return { maxRuns, failOnLimit: options?.failOnLimit ?? this.config.failOnLimit };
  }

  /**
   * The check between runs: prune, then finish the session if the root is
   * Done or a cancel is pending. Returns true when the session stopped.
   */
  protected settle(): boolean {
    if (this.config.pruneStrategy === 'full') {
      this.tree.prune();
    }
    if (this.tree.isDone()) {
      this.transitionSession(SessionStatus.Completed);
      this.completedAt = new Date().toISOString();
      this.publishSession('session.completed');
      this.log.info('Exploration completed', { runCount: this.runCount, skippedRunCount: this.skippedRunCount });
      return true;
    }
    if (this.cancelRequest) {
      this.applyCancel(this.cancelRequest.reason);
      return true;
    }
    return false;
  }

  protected pause(): void {
    this.transitionSession(SessionStatus.Paused);
  }

  protected stopAtLimit(maxRuns: number, attempted: number, failOnLimit: boolean): ExplorationReport<T> {
    const error = { ...explorationLimitError(maxRuns, attempted), sessionId: this.id };
    this.transitionSession(SessionStatus.LimitReached);
    this.publishSession('session.limit-reached', { maxRuns });
    this.log.warn('Run limit reached before exploration completed', { maxRuns, runCount: this.runCount });
    if (failOnLimit) {
      throw new ExhaustionLimitError(error);
    }
    return this.report();
  }

  /** Start a run: fresh cursor at the root and a Running record. */
  protected openRun(): { context: RunContext; record: RunRecord<T> } {
    this.lastFailure = undefined;
    const record: RunRecord<T> = {
      id: `run_${uuid()}`,
      index: this.nextRunIndex++,
      status: RunStatus.NotStarted,
      choices: [],
      path: [],
    };
    const context = new RunContext(this.tree, record.id);
    this.transitionRun(record, RunStatus.Running);
    record.startedAt = new Date().toISOString();
    if (this.config.recordRuns) {
      this.records.push(record);
    }
    this.publishRun(record, 'run.started');
    return { context, record };
  }

  /** The program returned: its path is explored. */
  protected completeRun(context: RunContext, record: RunRecord<T>, value: T): Solution<T> {
    const fault = context.fault;
    if (fault) {
      // The program swallowed a fault raised by its choice port.
      throw this.failRun(context, record, fault);
    }
    context.close();
    this.captureChoices(context, record);

    this.tree.markDone(context.cursor);
    if (this.config.pruneStrategy === 'path') {
      this.tree.prunePath(context.visited);
    }

    this.transitionRun(record, RunStatus.Terminated);
    record.value = value;
    this.finishTiming(record);
    this.runCount++;
    this.publishRun(record, 'run.terminated');
    this.log.debug('Run terminated', { runId: record.id, runIndex: record.index, path: record.path });
    return { value, run: record };
  }

  /**
   * The program threw. Returns the error to propagate: the ConsistencyFault
   * when the choice port raised one, otherwise a TargetFailure wrapping what
   * the program threw.
   */
  protected failRun(context: RunContext, record: RunRecord<T>, err: unknown): ExplorationError {
    context.close();
    this.captureChoices(context, record);
    this.transitionRun(record, RunStatus.Failed);
    this.finishTiming(record);
    this.failedRunCount++;

    const fault = context.fault ?? (err instanceof ConsistencyFault ? err : undefined);
    if (fault) {
      this.cancelRequest = undefined;
      record.error = this.scoped(fault.typedError, record);
      this.transitionSession(SessionStatus.Faulted);
      this.completedAt = record.completedAt;
      this.publishRun(record, 'run.failed');
      this.publishSession('session.faulted', { error: record.error });
      this.log.error('Consistency fault; exploration stopped', {
        runId: record.id,
        code: fault.code,
        details: fault.typedError.details,
      });
      return fault;
    }

    const failure = new TargetFailure(
      this.scoped(targetFailedError(record.index, [...context.path], err), record),
      err,
    );
    record.error = failure.typedError;
    this.lastFailure = { context, record };
    this.transitionSession(SessionStatus.Interrupted);
    this.publishRun(record, 'run.failed');
    this.publishSession('session.interrupted', { runId: record.id });
    this.log.warn('Target program failed', { runId: record.id, runIndex: record.index, path: record.path });
    if (this.cancelRequest) {
      this.applyCancel(this.cancelRequest.reason);
    }
    return failure;
  }

  private assertNotRunning(): void {
    if (this.running) {
      throw new ExplorationError(alreadyRunningError(this.id));
    }
  }

  private applyCancel(reason?: string): void {
    this.cancelRequest = undefined;
    this.lastFailure = undefined;
    this.transitionSession(SessionStatus.Canceled);
    this.cancelReason = reason;
    this.completedAt = new Date().toISOString();
    this.publishSession('session.canceled', { reason });
    this.log.warn('Exploration canceled', { reason, runCount: this.runCount });
  }

  private captureChoices(context: RunContext, record: RunRecord<T>): void {
    record.choices = [...context.choices];
    record.path = [...context.path];
  }

  private finishTiming(record: RunRecord<T>): void {
    const completedAt = new Date();
    record.completedAt = completedAt.toISOString();
    if (record.startedAt) {
      record.durationMs = completedAt.getTime() - new Date(record.startedAt).getTime();
    }
  }

  private scoped(error: TypedError, record: RunRecord<T>): TypedError {
    return { ...error, sessionId: this.id, runId: record.id };
  }

  private transitionSession(target: SessionStatus): void {
    const result = transitionSessionStatus(this.currentStatus, target);
    if (!result.success) {
      throw new ExplorationError(result.error);
    }
    this.currentStatus = result.newStatus;
  }

  private transitionRun(record: RunRecord<T>, target: RunStatus): void {
    const result = transitionRunStatus(record.status, target);
    if (!result.success) {
      throw new ExplorationError(result.error);
    }
    record.status = result.newStatus;
  }

  private publishSession(eventType: ExplorationEventType, extra?: Record<string, unknown>): void {
    try {
      this.publisher.publishSessionEvent(this.report(), eventType, extra);
    } catch (err) {
      this.log.warn('Failed to publish session event', { eventType, error: String(err) });
    }
  }

  private publishRun(record: RunRecord<T>, eventType: ExplorationEventType): void {
    try {
      this.publisher.publishRunEvent(this.id, record, eventType);
    } catch (err) {
      this.log.warn('Failed to publish run event', { eventType, runId: record.id, error: String(err) });
    }
  }
}

/** A session over a program that runs to completion synchronously. */
export class ExplorationSession<T> extends SessionCore<T> {
  constructor(private program: TargetProgram<T>, deps: SessionDependencies) {
    super(deps);
  }

  /**
   * Run the program along every unexplored path, up to the run limit.
   * Returns the report once the session completes, hits the limit or is
   * canceled; throws TargetFailure or ConsistencyFault when a run fails.
   */
  explore(options?: ExploreOptions): ExplorationReport<T> {
    const { maxRuns, failOnLimit } = this.resolveLimit(options);
    if (!this.enter()) return this.report();

    this.running = true;
    try {
      let attempted = 0;
      while (!this.settle()) {
        if (maxRuns !== undefined && attempted >= maxRuns) {
          return this.stopAtLimit(maxRuns, attempted, failOnLimit);
        }
        attempted++;
        this.runOnce();
      }
      return this.report();
    } finally {
      this.running = false;
    }
  }

  /** Execute at most one run. Returns undefined once there is nothing left to run. */
  step(): Solution<T> | undefined {
    if (!this.enter()) return undefined;
    if (this.settle()) return undefined;

    this.running = true;
    try {
      const solution = this.runOnce();
      if (!this.settle()) this.pause();
      return solution;
    } finally {
      this.running = false;
    }
  }

  private runOnce(): Solution<T> {
    const { context, record } = this.openRun();
    let value: T;
    try {
      value = this.program(context.choose);
    } catch (err) {
      throw this.failRun(context, record, err);
    }
    return this.completeRun(context, record, value);
  }
}

/** A session over a program that completes asynchronously. Runs are still awaited one at a time. */
export class AsyncExplorationSession<T> extends SessionCore<T> {
  constructor(private program: AsyncTargetProgram<T>, deps: SessionDependencies) {
    super(deps);
  }

  /**
   * The session stays busy across the awaits between runs: a concurrent
   * explore(), step() or skipFailedRun() is rejected with
   * EXPLORATION.ALREADY_RUNNING.
   */
  async explore(options?: ExploreOptions): Promise<ExplorationReport<T>> {
    const { maxRuns, failOnLimit } = this.resolveLimit(options);
    if (!this.enter()) return this.report();

    this.running = true;
    try {
      let attempted = 0;
      while (!this.settle()) {
        if (maxRuns !== undefined && attempted >= maxRuns) {
          return this.stopAtLimit(maxRuns, attempted, failOnLimit);
        }
        attempted++;
        await this.runOnce();
      }
      return this.report();
    } finally {
      this.running = false;
    }
  }

  async step(): Promise<Solution<T> | undefined> {
    if (!this.enter()) return undefined;
    if (this.settle()) return undefined;

    this.running = true;
    try {
      const solution = await this.runOnce();
      if (!this.settle()) this.pause();
      return solution;
    } finally {
      this.running = false;
    }
  }

  private async runOnce(): Promise<Solution<T>> {
    const { context, record } = this.openRun();
    let value: T;
    try {
      value = await this.program(context.choose);
    } catch (err) {
      throw this.failRun(context, record, err);
    }
    return this.completeRun(context, record, value);
  }
}
