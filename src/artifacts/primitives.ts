/**
 * Extraction primitives.
 *
 * The three ways a build output becomes a local file: copy a path out of
 * the built image, save the whole image, or move a file the build left on
 * the runner. Primitives know nothing about jobs; the router attributes
 * their failures.
 */

import { stat } from 'fs/promises';
import { CommandRunner, formatCommand, outputTail, spawnCommand } from '../command-runner';
import { BuildHandle } from '../domain/job';
import { logger } from '../logger';
import { errnoCode, moveFile } from './fs-utils';

export interface ExtractionPrimitives {
  /** Instantiate the image and copy `srcPath` from inside it to `destFile`. */
  copyFromImage(handle: BuildHandle, srcPath: string, destFile: string): Promise<void>;
  /** Serialize the image to `destFile`. */
  saveImage(handle: BuildHandle, destFile: string): Promise<void>;
  /** Move a local file to `destFile`. */
  moveLocalFile(srcPath: string, destFile: string): Promise<void>;
}

/** Raised by a primitive when the thing to extract does not exist. */
export class SourceMissingError extends Error {
  constructor(public readonly sourcePath: string, where: string) {
    super(`Source path "${sourcePath}" does not exist ${where}`);
    this.name = 'SourceMissingError';
  }
}

/** Docker CLI primitives: `docker create` / `cp` / `rm` and `docker save`. */
export class DockerCliPrimitives implements ExtractionPrimitives {
  private readonly log = logger.child({ component: 'docker-primitives' });

  constructor(
    private readonly run: CommandRunner = spawnCommand,
    private readonly docker = 'docker',
  ) {}

  async copyFromImage(handle: BuildHandle, srcPath: string, destFile: string): Promise<void> {
    const containerId = (await this.exec(['create', handle.ref, '/'])).trim();
    try {
      const result = await this.run(this.docker, ['cp', `${containerId}:${srcPath}`, destFile]);
      if (result.exitCode !== 0) {
        if (/could not find the file|no such file or directory/i.test(result.stderr)) {
          throw new SourceMissingError(srcPath, `inside image ${handle.ref}`);
        }
        throw new Error(`docker cp failed (exit ${result.exitCode}): ${outputTail(result.stderr)}`);
      }
    } finally {
      await this.removeContainer(containerId);
    }
  }

  async saveImage(handle: BuildHandle, destFile: string): Promise<void> {
    await this.exec(['save', '-o', destFile, handle.ref]);
  }

  async moveLocalFile(srcPath: string, destFile: string): Promise<void> {
    await moveLocalFile(srcPath, destFile);
  }

  private async exec(args: string[]): Promise<string> {
    this.log.debug('Running docker', { command: formatCommand(this.docker, args) });
    const result = await this.run(this.docker, args);
    if (result.exitCode !== 0) {
      throw new Error(`docker ${args[0]} failed (exit ${result.exitCode}): ${outputTail(result.stderr)}`);
    }
    return result.stdout;
  }

  private async removeContainer(containerId: string): Promise<void> {
    const result = await this.run(this.docker, ['rm', containerId]);
    if (result.exitCode !== 0) {
      this.log.warn('Failed to remove extraction container', {
        containerId,
        stderr: outputTail(result.stderr),
      });
    }
  }
}

/** Move a runner-local file, failing with `SourceMissingError` if it is absent. */
export async function moveLocalFile(srcPath: string, destFile: string): Promise<void> {
  try {
    await stat(srcPath);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new SourceMissingError(srcPath, 'on the local filesystem');
    }
    throw err;
  }
  await moveFile(srcPath, destFile);
}
