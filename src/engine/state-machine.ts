/**
 * Run and session state machines.
 *
 * Enforces valid state transitions for runs and exploration sessions,
 * producing typed errors on invalid transitions.
 */

import {
  RunStatus,
  SessionStatus,
  VALID_RUN_TRANSITIONS,
  VALID_SESSION_TRANSITIONS,
} from '../domain/exploration';
import { TypedError, invalidStateTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a run state transition. */
export function transitionRunStatus(
  current: RunStatus,
  target: RunStatus,
): TransitionResult<RunStatus> {
  if (!VALID_RUN_TRANSITIONS[current].includes(target)) {
    return { success: false, error: invalidStateTransitionError('run', current, target) };
  }
  return { success: true, newStatus: target };
}

/** Attempt a session state transition. */
export function transitionSessionStatus(
  current: SessionStatus,
  target: SessionStatus,
): TransitionResult<SessionStatus> {
  if (!VALID_SESSION_TRANSITIONS[current].includes(target)) {
    return { success: false, error: invalidStateTransitionError('session', current, target) };
  }
  return { success: true, newStatus: target };
}

/** Check if a session can never explore again. */
export function isTerminalSessionStatus(status: SessionStatus): boolean {
  return (
    status === SessionStatus.Completed ||
    status === SessionStatus.Faulted ||
    status === SessionStatus.Canceled
  );
}
