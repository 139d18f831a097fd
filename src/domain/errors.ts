/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the engine reports carries a TypedError: a namespaced code,
 * a message, a retryable flag and structured details. Thrown errors wrap the
 * TypedError in an ExplorationError subclass so callers can branch on either
 * the class or the code.
 */

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure carried by thrown errors, run records and events. */
export interface TypedError {
  /** Namespaced error code (e.g., "CONSISTENCY.BRANCH_COUNT_MISMATCH"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated exploration session if applicable. */
  sessionId?: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  sessionId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    sessionId: params.sessionId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- CONSISTENCY: the program broke determinism-given-history ---

export function branchCountMismatchError(node: number, expected: number, actual: number): TypedError {
  return createTypedError({
    code: 'CONSISTENCY.BRANCH_COUNT_MISMATCH',
    message: `Choice point ${node} was recorded with ${expected} options but was reached again with ${actual}`,
    retryable: false,
    details: { node, expected, actual },
    suggestedFixes: [
      {
        type: 'MAKE_CHOICES_DETERMINISTIC',
        params: { node },
        description: 'The number of options at a choice point must depend only on earlier choices.',
      },
    ],
  });
}

export function doneNodeReenteredError(node: number): TypedError {
  return createTypedError({
    code: 'CONSISTENCY.DONE_NODE_REENTERED',
    message: `A choice was requested at node ${node}, which is already fully explored`,
    retryable: false,
    details: { node },
  });
}

export function branchExhaustedError(node: number, options: number): TypedError {
  return createTypedError({
    code: 'CONSISTENCY.BRANCH_EXHAUSTED',
    message: `Every option of choice point ${node} is already explored`,
    retryable: false,
    details: { node, options },
  });
}

// --- VALIDATION ---

export function invalidChoiceCountError(n: unknown): TypedError {
  return createTypedError({
    code: 'VALIDATION.CHOICE_COUNT',
    message: `Choice count must be a positive integer, got ${String(n)}`,
    retryable: false,
    details: { n },
  });
}

export function configValidationError(errors: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.CONFIG',
    message: `Invalid explorer configuration: ${errors.join('; ')}`,
    retryable: false,
    details: { errors },
  });
}

// --- TARGET ---

export function targetFailedError(runIndex: number, path: number[], cause: unknown): TypedError {
  return createTypedError({
    code: 'TARGET.FAILED',
    message: `Target program failed on run ${runIndex}: ${describeCause(cause)}`,
    retryable: false,
    details: { runIndex, path },
    suggestedFixes: [
      {
        type: 'SKIP_FAILED_RUN',
        params: { runIndex },
        description: 'Call skipFailedRun() to mark this path explored and continue, or fix the program and explore again.',
      },
    ],
  });
}

// --- EXPLORATION ---

export function explorationLimitError(maxRuns: number, runsAttempted: number): TypedError {
  return createTypedError({
    code: 'EXPLORATION.LIMIT_EXCEEDED',
    message: `Exploration stopped after ${runsAttempted} runs (limit ${maxRuns}) with paths left to explore`,
    retryable: true,
    details: { maxRuns, runsAttempted },
    suggestedFixes: [
      { type: 'RESUME_EXPLORATION', params: {}, description: 'Call explore() again to continue from where it stopped.' },
      { type: 'INCREASE_MAX_RUNS', params: { maxRuns: maxRuns * 2 } },
    ],
  });
}

export function alreadyRunningError(sessionId: string): TypedError {
  return createTypedError({
    code: 'EXPLORATION.ALREADY_RUNNING',
    message: `Session "${sessionId}" is already running a program`,
    sessionId,
    retryable: false,
  });
}

export function staleChoicePortError(runId: string): TypedError {
  return createTypedError({
    code: 'EXPLORATION.STALE_CHOICE_PORT',
    message: `Choice port of run "${runId}" was used after the run ended`,
    runId,
    retryable: false,
  });
}

export function sessionClosedError(sessionId: string, status: string): TypedError {
  return createTypedError({
    code: 'EXPLORATION.SESSION_CLOSED',
    message: `Session "${sessionId}" is ${status} and cannot explore further`,
    sessionId,
    retryable: false,
    details: { status },
  });
}

export function noFailedRunError(sessionId: string): TypedError {
  return createTypedError({
    code: 'EXPLORATION.NO_FAILED_RUN',
    message: `Session "${sessionId}" has no failed run to skip`,
    sessionId,
    retryable: false,
  });
}

export function skipWouldDropPathsError(sessionId: string, runIndex: number, node: number): TypedError {
  return createTypedError({
    code: 'EXPLORATION.SKIP_WOULD_DROP_PATHS',
    message: `Run ${runIndex} failed at choice point ${node}, which still has unexplored options; skipping it would drop them`,
    sessionId,
    retryable: false,
    details: { runIndex, node },
    suggestedFixes: [
      {
        type: 'RESUME_EXPLORATION',
        params: {},
        description: 'Call explore() again to re-run the failed path.',
      },
    ],
  });
}

export function invalidStateTransitionError(kind: 'run' | 'session', from: string, to: string): TypedError {
  return createTypedError({
    code: 'EXPLORATION.INVALID_TRANSITION',
    message: `Cannot transition ${kind} from "${from}" to "${to}"`,
    retryable: false,
    details: { kind, from, to },
  });
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

// --- Thrown error classes ---

/** Base class for every error the engine throws. */
export class ExplorationError extends Error {
  constructor(public typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'ExplorationError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/**
 * The program disagreed with the branch structure recorded for the same
 * position. Fatal to the session.
 */
export class ConsistencyFault extends ExplorationError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ConsistencyFault';
  }
}

/** The target program threw during a run. The original error is the `cause`. */
export class TargetFailure extends ExplorationError {
  constructor(typedError: TypedError, cause: unknown) {
    super(typedError, { cause });
    this.name = 'TargetFailure';
  }
}

/** A run limit stopped an exploration that still had paths left. Recoverable. */
export class ExhaustionLimitError extends ExplorationError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ExhaustionLimitError';
  }
}
