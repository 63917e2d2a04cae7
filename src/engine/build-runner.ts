/**
 * Build runner: executes one planned job against a build backend.
 *
 * The backend is the opaque "run build for this cell" operation. Whatever
 * it does, the runner turns it into exactly one job outcome: succeeded with
 * a handle, failed with a typed error, or cancelled.
 */

import { buildFailureError, buildTimeoutError } from '../domain/errors';
import { BuildOutcome, JobIdentity, JobOutcome, JobResult, JobStatus, PlannedJob } from '../domain/job';
import { MatrixCell } from '../domain/matrix';

/** Context handed to a backend for one build. */
export interface BuildContext {
  identity: JobIdentity;
  index: number;
  /** Aborted on cancellation or timeout; backends should stop work when it fires. */
  signal: AbortSignal;
}

/** Build backend interface: pluggable build implementations. */
export interface BuildBackend {
  name: string;
  runBuild(cell: MatrixCell, context: BuildContext): Promise<BuildOutcome>;
}

/** Registry of build backends by name. */
const buildBackends = new Map<string, BuildBackend>();

/** Register a build backend. */
export function registerBuildBackend(backend: BuildBackend): void {
  buildBackends.set(backend.name, backend);
}

/** Get a registered build backend. */
export function getBuildBackend(name: string): BuildBackend | undefined {
  return buildBackends.get(name);
}

/** Names of all registered backends. */
export function getRegisteredBackends(): string[] {
  return [...buildBackends.keys()];
}

export interface RunJobOptions {
  /** Run-wide cancellation signal. */
  signal: AbortSignal;
  timeoutMs?: number;
}

type Interruption = { interrupted: 'timeout' | 'cancelled' };

/** Reason attached to an aborted signal, as text. */
export function abortReason(signal: AbortSignal): string {
  return typeof signal.reason === 'string' ? signal.reason : 'run cancelled';
}

/** Execute one job. Never rejects. */
export async function runJob(job: PlannedJob, backend: BuildBackend, options: RunJobOptions): Promise<JobResult> {
  const startedAt = new Date().toISOString();
  const finish = (outcome: JobOutcome): JobResult => {
    const completedAt = new Date().toISOString();
    return {
      index: job.index,
      identity: job.identity,
      cell: job.cell,
      outcome,
      startedAt,
      completedAt,
      durationMs: new Date(completedAt).getTime() - new Date(startedAt).getTime(),
    };
  };

  if (options.signal.aborted) {
    return finish({ status: JobStatus.Cancelled, reason: abortReason(options.signal) });
  }

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(options.signal.reason);
  options.signal.addEventListener('abort', forwardAbort, { once: true });
  let timer: NodeJS.Timeout | undefined;

  try {
    const settled = await new Promise<BuildOutcome | Interruption>((resolve) => {
      if (options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        timer = setTimeout(() => {
          resolve({ interrupted: 'timeout' });
          controller.abort(`build timed out after ${timeoutMs}ms`);
        }, timeoutMs);
      }
      controller.signal.addEventListener('abort', () => resolve({ interrupted: 'cancelled' }), { once: true });

      backend
        .runBuild(job.cell, { identity: job.identity, index: job.index, signal: controller.signal })
        .then(resolve, (err: unknown) => resolve({ ok: false, reason: err instanceof Error ? err.message : String(err) }));
    });

    if ('interrupted' in settled) {
      if (settled.interrupted === 'timeout' && options.timeoutMs !== undefined) {
        return finish({ status: JobStatus.Failed, error: buildTimeoutError(job.identity, options.timeoutMs) });
      }
      return finish({ status: JobStatus.Cancelled, reason: abortReason(options.signal) });
    }
    if (settled.ok) {
      return finish({ status: JobStatus.Succeeded, handle: settled.handle });
    }
    return finish({ status: JobStatus.Failed, error: buildFailureError(job.identity, settled.reason) });
  } finally {
    if (timer) clearTimeout(timer);
    options.signal.removeEventListener('abort', forwardAbort);
  }
}
