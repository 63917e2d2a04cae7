/**
 * Job domain model.
 *
 * A job is one surviving matrix cell addressed by its identity. Its build
 * outcome and its artifact routing outcome are recorded separately: an
 * artifact failure never turns a successful build into a failed one.
 */

import { ArtifactState, ArtifactStrategy, Publication } from './artifact';
import { TypedError } from './errors';
import { MatrixCell } from './matrix';

/** Deterministic key of one job, e.g. "static--release--stable". */
export type JobIdentity = string;

/** A planned job. `index` is 1-based and stable across identical inputs. */
export interface PlannedJob {
  index: number;
  identity: JobIdentity;
  cell: MatrixCell;
}

/** Opaque reference to a build output (image tag, file path). */
export interface BuildHandle {
  ref: string;
  /** Local path when the output is a plain file on the runner. */
  path?: string;
}

/** What the external build operation reports. */
export type BuildOutcome =
  | { ok: true; handle: BuildHandle }
  | { ok: false; reason: string };

/** Job-level states. */
export enum JobStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

/** Valid job state transitions. */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.Pending]: [JobStatus.Running, JobStatus.Cancelled],
  [JobStatus.Running]: [JobStatus.Succeeded, JobStatus.Failed, JobStatus.Cancelled],
  [JobStatus.Succeeded]: [],
  [JobStatus.Failed]: [],
  [JobStatus.Cancelled]: [],
};

export type JobOutcome =
  | { status: JobStatus.Succeeded; handle: BuildHandle }
  | { status: JobStatus.Failed; error: TypedError }
  | { status: JobStatus.Cancelled; reason: string };

/** Result of dispatching one job. */
export interface JobResult {
  index: number;
  identity: JobIdentity;
  cell: MatrixCell;
  outcome: JobOutcome;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
}

/** Artifact routing result for one job. */
export type RoutingOutcome =
  | { kind: 'skipped'; reason: string; states: ArtifactState[] }
  | {
      kind: 'published';
      strategy: ArtifactStrategy;
      stagedPath: string;
      publications: Publication[];
      states: ArtifactState[];
    }
  | {
      kind: 'failed';
      stage: 'extraction' | 'publication';
      error: TypedError;
      /** Publications that completed before the failure. */
      publications: Publication[];
      states: ArtifactState[];
    };

/** Final artifact state recorded by a routing outcome. */
export function finalArtifactState(outcome: RoutingOutcome): ArtifactState {
  const last = outcome.states[outcome.states.length - 1];
  return last ?? ArtifactState.Built;
}
