/**
 * Docker Bake backend.
 *
 * Runs `docker buildx bake <target>` with every cell value exported as an
 * environment variable of the same name and the job identity as the image
 * tag, so the built image is addressable by identity afterwards.
 */

import { cellTarget } from '../../artifacts/naming';
import { CommandRunner, formatCommand, outputTail, spawnCommand } from '../../command-runner';
import { BuildOutcome, JobIdentity } from '../../domain/job';
import { MatrixCell } from '../../domain/matrix';
import { logger } from '../../logger';
import { BuildBackend, BuildContext } from '../build-runner';

export interface DockerBakeOptions {
  run?: CommandRunner;
  /** Bake definition file; docker's own lookup applies when unset. */
  bakeFile?: string;
  cwd?: string;
  targetDimension?: string;
}

/** Arguments after `docker` for baking one target. */
export function bakeArgs(target: string, bakeFile?: string): string[] {
  return bakeFile ? ['buildx', 'bake', '-f', bakeFile, target] : ['buildx', 'bake', target];
}

/** Environment for one bake: the cell's values plus the image tag. */
export function bakeEnvironment(cell: MatrixCell, identity: JobIdentity): Record<string, string> {
  return {
    ...cell,
    BAKE_TAG: identity,
    DOCKER_BUILDKIT: '1',
    BUILDKIT_PROGRESS: 'plain',
  };
}

export class DockerBakeBackend implements BuildBackend {
  readonly name = 'docker-bake';
  private readonly run: CommandRunner;
  private readonly log = logger.child({ component: 'backend', backend: 'docker-bake' });

  constructor(private readonly options: DockerBakeOptions = {}) {
    this.run = options.run ?? spawnCommand;
  }

  async runBuild(cell: MatrixCell, context: BuildContext): Promise<BuildOutcome> {
    const targetDimension = this.options.targetDimension ?? 'target';
    const target = cellTarget(cell, { target: targetDimension });
    if (target === undefined) {
      return { ok: false, reason: `Cell has no "${targetDimension}" value to bake` };
    }

    const args = bakeArgs(target, this.options.bakeFile);
    this.log.info('Baking', { identity: context.identity, command: formatCommand('docker', args) });

    const result = await this.run('docker', args, {
      cwd: this.options.cwd,
      env: bakeEnvironment(cell, context.identity),
      signal: context.signal,
    });
    if (result.exitCode !== 0) {
      return {
        ok: false,
        reason: `docker buildx bake exited with ${result.exitCode}: ${outputTail(result.stderr) || 'no output'}`,
      };
    }
    return { ok: true, handle: { ref: context.identity } };
  }
}
