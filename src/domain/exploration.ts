/**
 * Exploration domain model.
 *
 * A session drives one target program through every path of its execution
 * tree. Each re-run of the program is a run, with its own lifecycle and a
 * record of the choices it made.
 */

import { TypedError } from './errors';
import { TreeStats } from './choice-node';

/** Lifecycle of a single run of the target program. */
export enum RunStatus {
  NotStarted = 'not-started',
  Running = 'running',
  Terminated = 'terminated',
  Failed = 'failed',
  /** A failed run whose path the caller chose to mark explored. */
  Skipped = 'skipped',
}

/** Lifecycle of an exploration session. */
export enum SessionStatus {
  Idle = 'idle',
  Exploring = 'exploring',
  /** Stopped after step() with paths left. */
  Paused = 'paused',
  Completed = 'completed',
  LimitReached = 'limit-reached',
  Interrupted = 'interrupted',
  Faulted = 'faulted',
  Canceled = 'canceled',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.NotStarted]: [RunStatus.Running],
  [RunStatus.Running]: [RunStatus.Terminated, RunStatus.Failed],
  [RunStatus.Terminated]: [],
  [RunStatus.Failed]: [RunStatus.Skipped],
  [RunStatus.Skipped]: [],
};

/** Valid state transitions for sessions. */
export const VALID_SESSION_TRANSITIONS: Record<SessionStatus, SessionStatus[]> = {
  [SessionStatus.Idle]: [SessionStatus.Exploring, SessionStatus.Canceled],
  [SessionStatus.Exploring]: [
    SessionStatus.Paused,
    SessionStatus.Completed,
    SessionStatus.LimitReached,
    SessionStatus.Interrupted,
    SessionStatus.Faulted,
    SessionStatus.Canceled,
  ],
  [SessionStatus.Paused]: [SessionStatus.Exploring, SessionStatus.Canceled],
  [SessionStatus.LimitReached]: [SessionStatus.Exploring, SessionStatus.Canceled],
  [SessionStatus.Interrupted]: [SessionStatus.Exploring, SessionStatus.Canceled],
  [SessionStatus.Completed]: [],
  [SessionStatus.Faulted]: [],
  [SessionStatus.Canceled]: [],
};

/**
 * Number of options a program asks for at a choice point, answered with the
 * option to take. Must be called with an integer n >= 1 and returns i with
 * 0 <= i < n.
 */
export type ChoicePort = (n: number) => number;

/** A re-runnable program driven by a choice port. */
export type TargetProgram<T> = (choose: ChoicePort) => T;

/** A re-runnable program that completes asynchronously. */
export type AsyncTargetProgram<T> = (choose: ChoicePort) => Promise<T>;

/** One answered call to the choice port. */
export interface ChoiceRecord {
  /** Options offered. */
  n: number;
  /** Option taken. */
  index: number;
}

/** The outcome of one run of the target program. */
export interface RunRecord<T> {
  id: string;
  /** Zero-based position of this run within its session. */
  index: number;
  status: RunStatus;
  /** Every port call in order, single-option calls included. */
  choices: ChoiceRecord[];
  /** Indices taken at real choice points (n >= 2). Identifies the leaf. */
  path: number[];
  /** The program's return value, when the run terminated normally. */
  value?: T;
  /** Why the run failed. */
  error?: TypedError;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
}

/** A run that terminated normally, with the value the program returned. */
export interface Solution<T> {
  value: T;
  run: RunRecord<T>;
}

/** Summary of a session's progress. */
export interface ExplorationReport<T> {
  sessionId: string;
  status: SessionStatus;
  /** True once every path has been executed. */
  complete: boolean;
  /** Runs that terminated normally. */
  runCount: number;
  /** Runs that failed, including those later skipped. */
  failedRunCount: number;
  skippedRunCount: number;
  /** Run records in execution order; empty when run recording is off. */
  runs: RunRecord<T>[];
  tree: TreeStats;
  startedAt?: string;
  completedAt?: string;
  /** Reason given to cancel(), if canceled. */
  cancelReason?: string;
}

/** Per-call options for explore(). */
export interface ExploreOptions {
  /** Maximum runs this call may attempt. Overrides the configured maxRuns. */
  maxRuns?: number;
  /** Throw ExhaustionLimitError instead of returning a limit-reached report. */
  failOnLimit?: boolean;
}
