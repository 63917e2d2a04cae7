/**
 * Dry-run backend: logs the bake a real build would run and reports
 * success with the job identity as the image reference. Nothing is built.
 */

import { cellTarget } from '../../artifacts/naming';
import { BuildOutcome, JobIdentity } from '../../domain/job';
import { MatrixCell } from '../../domain/matrix';
import { logger } from '../../logger';
import { BuildBackend, BuildContext } from '../build-runner';
import { bakeArgs, bakeEnvironment } from './docker-bake';

export interface DryRunOptions {
  /** Simulated build time. */
  delayMs?: number;
  /** Return a reason to make the build of a cell fail. */
  failWhen?: (cell: MatrixCell, identity: JobIdentity) => string | undefined;
  targetDimension?: string;
}

export class DryRunBuildBackend implements BuildBackend {
  readonly name = 'dry-run';
  private readonly log = logger.child({ component: 'backend', backend: 'dry-run' });

  constructor(private readonly options: DryRunOptions = {}) {}

  async runBuild(cell: MatrixCell, context: BuildContext): Promise<BuildOutcome> {
    const target = cellTarget(cell, { target: this.options.targetDimension ?? 'target' }) ?? context.identity;
    this.log.info('Would bake', {
      identity: context.identity,
      command: ['docker', ...bakeArgs(target)].join(' '),
      env: bakeEnvironment(cell, context.identity),
    });

    if (this.options.delayMs) {
      await delay(this.options.delayMs, context.signal);
    }

    const reason = this.options.failWhen?.(cell, context.identity);
    if (reason !== undefined) {
      return { ok: false, reason };
    }
    return { ok: true, handle: { ref: context.identity } };
  }
}

/** Sleep that ends early when the signal fires. */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
  });
}
