/**
 * Run, job and artifact state machines.
 *
 * Enforces valid state transitions, producing typed errors on invalid
 * transitions.
 */

import { ArtifactState, VALID_ARTIFACT_TRANSITIONS } from '../domain/artifact';
import { TypedError, createTypedError } from '../domain/errors';
import { JobStatus, VALID_JOB_TRANSITIONS } from '../domain/job';
import { RunStatus, VALID_RUN_TRANSITIONS } from '../domain/run';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

function transition<S extends string>(
  table: Record<S, S[]>,
  code: string,
  label: string,
  current: S,
  target: S,
): TransitionResult<S> {
  const validTargets = table[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code,
        message: `Invalid ${label} state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a run state transition. */
export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  return transition(VALID_RUN_TRANSITIONS, 'RUN.INVALID_TRANSITION', 'run', current, target);
}

/** Attempt a job state transition. */
export function transitionJobStatus(current: JobStatus, target: JobStatus): TransitionResult<JobStatus> {
  return transition(VALID_JOB_TRANSITIONS, 'RUN.INVALID_JOB_TRANSITION', 'job', current, target);
}

/** Attempt an artifact state transition. */
export function transitionArtifactState(
  current: ArtifactState,
  target: ArtifactState,
): TransitionResult<ArtifactState> {
  return transition(VALID_ARTIFACT_TRANSITIONS, 'ROUTING.INVALID_TRANSITION', 'artifact', current, target);
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return status === RunStatus.Succeeded || status === RunStatus.Failed || status === RunStatus.Canceled;
}

/** Check if a job status is terminal. */
export function isTerminalJobStatus(status: JobStatus): boolean {
  return status === JobStatus.Succeeded || status === JobStatus.Failed || status === JobStatus.Cancelled;
}

/** Check if an artifact state is terminal. */
export function isTerminalArtifactState(state: ArtifactState): boolean {
  return state === ArtifactState.Done || state === ArtifactState.Failed;
}
