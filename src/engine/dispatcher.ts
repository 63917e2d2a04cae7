/**
 * Build Dispatcher.
 *
 * Runs the planned jobs with bounded parallelism. Jobs are independent: no
 * ordering holds between siblings, only within a job (build, then its
 * `afterBuild` work). Results come back in plan order.
 *
 * Fail-fast aborts a shared controller on the first build failure. Jobs
 * that have not started are reported cancelled without being built, and
 * in-flight builds observe the aborted signal and settle as cancelled.
 */

import { JobResult, JobStatus, PlannedJob } from '../domain/job';
import { logger } from '../logger';
import { BuildBackend, abortReason, runJob } from './build-runner';

export const DEFAULT_CONCURRENCY = 4;

export interface DispatchOptions {
  failFast: boolean;
  /** Parallel builds; defaults to 4, at least 1. */
  concurrency?: number;
  buildTimeoutMs?: number;
  /** External cancellation. Reported as cancellation, never as failure. */
  signal?: AbortSignal;
  /** Called when a job leaves the queue, before its build starts. */
  onJobStart?: (job: PlannedJob) => Promise<void> | void;
  /**
   * Runs in the job's worker slot after its build settles. Receives the
   * run's signal so it can react to cancellation.
   */
  afterBuild?: (result: JobResult, signal: AbortSignal) => Promise<void>;
}

const log = logger.child({ component: 'dispatcher' });

export async function dispatch(
  jobs: readonly PlannedJob[],
  backend: BuildBackend,
  options: DispatchOptions,
): Promise<JobResult[]> {
  const controller = new AbortController();
  const external = options.signal;
  const onExternalAbort = (): void => {
    if (!controller.signal.aborted) {
      controller.abort(external ? abortReason(external) : 'run cancelled');
    }
  };
  if (external?.aborted) {
    onExternalAbort();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const results: JobResult[] = new Array<JobResult>(jobs.length);
  let next = 0;

  log.info('Dispatching jobs', {
    jobs: jobs.length,
    concurrency,
    failFast: options.failFast,
    backend: backend.name,
  });

  const worker = async (): Promise<void> => {
    while (next < jobs.length) {
      const slot = next++;
      const job = jobs[slot];

      if (controller.signal.aborted) {
        results[slot] = {
          index: job.index,
          identity: job.identity,
          cell: job.cell,
          outcome: { status: JobStatus.Cancelled, reason: abortReason(controller.signal) },
        };
      } else {
        await options.onJobStart?.(job);
        results[slot] = await runJob(job, backend, {
          signal: controller.signal,
          timeoutMs: options.buildTimeoutMs,
        });
      }

      const result = results[slot];
      if (result.outcome.status === JobStatus.Failed && options.failFast && !controller.signal.aborted) {
        log.warn('Build failed; cancelling remaining jobs', { identity: job.identity });
        controller.abort(`fail-fast: job "${job.identity}" failed`);
      }

      if (options.afterBuild) {
        try {
          await options.afterBuild(result, controller.signal);
        } catch (err) {
          log.error('afterBuild hook threw', {
            identity: job.identity,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: Math.min(concurrency, jobs.length) }, () => worker()));
  } finally {
    external?.removeEventListener('abort', onExternalAbort);
  }

  return results;
}
