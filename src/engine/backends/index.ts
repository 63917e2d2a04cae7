/**
 * Built-in build backends.
 */

import { registerBuildBackend } from '../build-runner';
import { DockerBakeBackend } from './docker-bake';
import { DryRunBuildBackend } from './dry-run';

export * from './docker-bake';
export * from './dry-run';

/** Register the built-in backends under their names. */
export function registerBuiltinBackends(): void {
  registerBuildBackend(new DryRunBuildBackend());
  registerBuildBackend(new DockerBakeBackend());
}
