/**
 * Run and Job state machines.
 *
 * Enforces valid state transitions for runs and jobs,
 * producing typed errors on invalid transitions.
 */

import {
  RunStatus,
  JobStatus,
  VALID_RUN_TRANSITIONS,
  VALID_JOB_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a run state transition. */
export function transitionRunStatus(
  current: RunStatus,
  target: RunStatus,
): TransitionResult<RunStatus> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a job state transition. */
export function transitionJobStatus(
  current: JobStatus,
  target: JobStatus,
): TransitionResult<JobStatus> {
  const validTargets = VALID_JOB_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'JOB.INVALID_TRANSITION',
        message: `Invalid job state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return (
    status === RunStatus.Succeeded ||
    status === RunStatus.Failed ||
    status === RunStatus.Cancelled
  );
}

/** Check if a job status is terminal. */
export function isTerminalJobStatus(status: JobStatus): boolean {
  return VALID_JOB_TRANSITIONS[status].length === 0;
}

/** Whether a job actually ran its test to completion. */
export function jobRanToCompletion(status: JobStatus): boolean {
  return status === JobStatus.Passed || status === JobStatus.Failed;
}
