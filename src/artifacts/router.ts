/**
 * Artifact Router.
 *
 * Decides, per finished job, whether an artifact is extracted and where it
 * is published. Exactly one extraction strategy applies; publication to the
 * generic channel always follows a successful extraction, and publication to
 * the site channel follows when the spec asks for it. Failures here are
 * recorded on the job and never touch the build outcome.
 */

import { dirname, isAbsolute, join, resolve } from 'path';
import { ArtifactSpec, ArtifactState, Publication } from '../domain/artifact';
import { TypedError, createTypedError, extractionError, publicationError } from '../domain/errors';
import { BuildHandle, JobIdentity, JobResult, JobStatus, RoutingOutcome } from '../domain/job';
import { DEFAULT_DIMENSION_ROLES, DimensionRoles } from '../domain/matrix';
import { ArtifactCancelPolicy } from '../domain/run';
import { transitionArtifactState } from '../engine/state-machine';
import { Logger, logger } from '../logger';
import { ArtifactChannel, SiteChannel } from './channels';
import { resetDirectory, writeThenRename } from './fs-utils';
import { artifactQualifier } from './naming';
import { ExtractionPrimitives, SourceMissingError } from './primitives';

export interface ArtifactRouterOptions {
  /** Shared staging root; each job writes under `<stagingDir>/<identity>/`. */
  stagingDir: string;
  primitives: ExtractionPrimitives;
  artifactChannel: ArtifactChannel;
  siteChannel: SiteChannel;
  roles?: Pick<DimensionRoles, 'profile' | 'featureSet'>;
  /** With `abort`, routing stops at the next stage once the signal fires. */
  onCancel?: ArtifactCancelPolicy;
}

/** Records the artifact state path of one job, enforcing valid transitions. */
class ArtifactTrail {
  readonly states: ArtifactState[] = [ArtifactState.Built];

  constructor(private readonly identity: JobIdentity) {}

  get current(): ArtifactState {
    return this.states[this.states.length - 1];
  }

  move(target: ArtifactState): void {
    const result = transitionArtifactState(this.current, target);
    if (!result.success) {
      throw new Error(`${this.identity}: ${result.error?.message ?? 'invalid artifact transition'}`);
    }
    this.states.push(target);
  }
}

class RoutingAborted extends Error {
  constructor() {
    super('Artifact routing aborted by run cancellation');
    this.name = 'RoutingAborted';
  }
}

export class ArtifactRouter {
  private readonly roles: Pick<DimensionRoles, 'profile' | 'featureSet'>;
  private readonly onCancel: ArtifactCancelPolicy;
  private readonly log: Logger;

  constructor(private readonly options: ArtifactRouterOptions) {
    this.roles = options.roles ?? DEFAULT_DIMENSION_ROLES;
    this.onCancel = options.onCancel ?? 'complete';
    this.log = logger.child({ component: 'artifact-router' });
  }

  /**
   * Staging directory of one job. It must be a direct child of the staging
   * root, since extraction empties it first.
   */
  stagingPath(identity: JobIdentity): string {
    const root = resolve(this.options.stagingDir);
    const path = resolve(root, identity);
    if (dirname(path) !== root) {
      throw new Error(`Job identity "${identity}" does not name a directory inside the staging root`);
    }
    return path;
  }

  async route(result: JobResult, spec: ArtifactSpec | undefined, signal?: AbortSignal): Promise<RoutingOutcome> {
    const trail = new ArtifactTrail(result.identity);
    const log = this.log.child({ identity: result.identity });

    if (result.outcome.status !== JobStatus.Succeeded) {
      trail.move(ArtifactState.Skipped);
      trail.move(ArtifactState.Done);
      const reason = result.outcome.status === JobStatus.Failed ? 'build failed' : 'build cancelled';
      return { kind: 'skipped', reason, states: trail.states };
    }
    if (!spec) {
      trail.move(ArtifactState.Skipped);
      trail.move(ArtifactState.Done);
      return { kind: 'skipped', reason: 'no artifact spec for target', states: trail.states };
    }

    const handle = result.outcome.handle;
    let stagedPath: string;

    // Extraction
    try {
      this.checkAbort(signal);
      const jobDir = this.stagingPath(result.identity);
      stagedPath = join(jobDir, spec.dst);
      await resetDirectory(jobDir);
      await writeThenRename(stagedPath, (temp) => this.extract(spec, handle, temp));
      this.checkAbort(signal);
    } catch (err) {
      trail.move(ArtifactState.Failed);
      const error = this.failure(err, result.identity, () =>
        extractionError(result.identity, describeError(err), {
          strategy: spec.strategy,
          src: spec.src,
          sourceMissing: err instanceof SourceMissingError,
        }),
      );
      log.warn('Artifact extraction failed', { code: error.code, error: error.message });
      return { kind: 'failed', stage: 'extraction', error, publications: [], states: trail.states };
    }
    trail.move(ArtifactState.Extracted);
    log.debug('Artifact extracted', { strategy: spec.strategy, stagedPath });

    // Publication
    const publications: Publication[] = [];
    try {
      const qualifier = artifactQualifier(result.cell, this.roles);
      publications.push(await this.options.artifactChannel.publish(qualifier, spec.dst, stagedPath));
      trail.move(ArtifactState.Published);

      if (spec.pages) {
        this.checkAbort(signal);
        publications.push(await this.options.siteChannel.publish(spec.dst, stagedPath));
        trail.move(ArtifactState.SitePublished);
      }
    } catch (err) {
      trail.move(ArtifactState.Failed);
      const error = this.failure(err, result.identity, () => publicationError(result.identity, describeError(err)));
      log.warn('Artifact publication failed', { code: error.code, error: error.message });
      return { kind: 'failed', stage: 'publication', error, publications, states: trail.states };
    }

    trail.move(ArtifactState.Done);
    log.info('Artifact published', { locations: publications.map((p) => p.location) });
    return { kind: 'published', strategy: spec.strategy, stagedPath, publications, states: trail.states };
  }

  private async extract(spec: ArtifactSpec, handle: BuildHandle, destFile: string): Promise<void> {
    const { primitives } = this.options;
    switch (spec.strategy) {
      case 'inner-file':
        return primitives.copyFromImage(handle, spec.src, destFile);
      case 'whole-image':
        return primitives.saveImage(handle, destFile);
      case 'runner-local':
        return primitives.moveLocalFile(localSource(handle, spec.src), destFile);
    }
  }

  private checkAbort(signal: AbortSignal | undefined): void {
    if (this.onCancel === 'abort' && signal?.aborted) {
      throw new RoutingAborted();
    }
  }

  private failure(err: unknown, identity: JobIdentity, otherwise: () => TypedError): TypedError {
    if (err instanceof RoutingAborted) {
      return createTypedError({ code: 'ROUTING.ABORTED', message: err.message, identity });
    }
    return otherwise();
  }
}

/** Runner-local sources resolve against the build's output directory, if it names one. */
function localSource(handle: BuildHandle, src: string): string {
  if (isAbsolute(src)) return src;
  return handle.path ? resolve(handle.path, src) : resolve(src);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
