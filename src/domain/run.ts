/**
 * Orchestration run domain model.
 *
 * One run plans a matrix, dispatches every job and routes each job's
 * artifact. The run record keeps a per-job ledger and, once terminal,
 * the final report.
 */

import { ArtifactMap, ArtifactState, Publication } from './artifact';
import { TypedError } from './errors';
import { JobIdentity, JobStatus } from './job';
import { MatrixCell, MatrixConfig } from './matrix';

/** Run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Running, RunStatus.Canceled],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Canceled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Canceled]: [],
};

/** How artifact routing reacts to cancellation of its run. */
export type ArtifactCancelPolicy = 'complete' | 'abort';

/** Per-run execution options. */
export interface RunOptions {
  failFast: boolean;
  concurrency: number;
  /** Artifact failures fail the run instead of producing warnings. */
  artifactsMandatory: boolean;
  artifactsOnCancel: ArtifactCancelPolicy;
  buildTimeoutMs?: number;
}

/** Per-job ledger entry. */
export interface JobRecord {
  index: number;
  identity: JobIdentity;
  cell: MatrixCell;
  status: JobStatus;
  artifact: ArtifactState;
  publications: Publication[];
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  error?: TypedError;
  artifactError?: TypedError;
  cancelReason?: string;
}

/** One report error, always attributed to a job. */
export interface ReportError {
  identity: JobIdentity;
  stage: 'build' | 'artifact';
  error: TypedError;
}

/** Final report of a run. */
export interface RunReport {
  /** True only if every job's build succeeded (and, if mandatory, every artifact). */
  success: boolean;
  totals: {
    jobs: number;
    succeeded: number;
    failed: number;
    cancelled: number;
    published: number;
    skipped: number;
    artifactFailures: number;
  };
  jobs: JobRecord[];
  errors: ReportError[];
  warnings: string[];
}

/** A single orchestration run. */
export interface OrchestrationRun {
  id: string;
  /** Set when the run belongs to a pipeline stage. */
  pipelineId?: string;
  stageId?: string;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  matrix: MatrixConfig;
  artifacts: ArtifactMap;
  options: RunOptions;
  planHash: string;
  candidateCount: number;
  excludedCount: number;
  /** Ledger indexed by job identity. */
  jobs: Record<JobIdentity, JobRecord>;
  warnings: string[];
  report?: RunReport;
  error?: TypedError;
  canceledAt?: string;
  cancelReason?: string;
}

/** Input for creating a run. */
export interface CreateRunInput {
  matrix: MatrixConfig;
  /** Artifact specs by build target, in configuration spelling. */
  artifacts?: Record<string, unknown>;
  options?: Partial<RunOptions>;
  pipelineId?: string;
  stageId?: string;
}
