/**
 * Artifact domain model.
 *
 * An artifact spec says whether a build target's output is extracted after
 * a successful build, which extraction strategy applies, and whether the
 * result is also published to the site channel.
 */

/** Closed set of extraction strategies. */
export type ArtifactStrategy = 'inner-file' | 'whole-image' | 'runner-local';

export const ARTIFACT_STRATEGIES: readonly ArtifactStrategy[] = ['inner-file', 'whole-image', 'runner-local'];

/** Normalized artifact spec. */
export interface ArtifactSpec {
  /** Artifact name; also the file name in staging. */
  dst: string;
  /** Path inside the image or on the runner; defaults to dst. Unused for whole-image. */
  src: string;
  strategy: ArtifactStrategy;
  /** Also publish through the site channel. */
  pages: boolean;
}

/** Artifact specs keyed by build target. */
export type ArtifactMap = Readonly<Record<string, ArtifactSpec>>;

/** Artifact lifecycle for one job. */
export enum ArtifactState {
  Built = 'built',
  Skipped = 'skipped',
  Extracted = 'extracted',
  Published = 'published',
  SitePublished = 'site-published',
  Done = 'done',
  Failed = 'failed',
}

/** Valid artifact state transitions. */
export const VALID_ARTIFACT_TRANSITIONS: Record<ArtifactState, ArtifactState[]> = {
  [ArtifactState.Built]: [ArtifactState.Skipped, ArtifactState.Extracted, ArtifactState.Failed],
  [ArtifactState.Skipped]: [ArtifactState.Done],
  [ArtifactState.Extracted]: [ArtifactState.Published, ArtifactState.Failed],
  [ArtifactState.Published]: [ArtifactState.SitePublished, ArtifactState.Done, ArtifactState.Failed],
  [ArtifactState.SitePublished]: [ArtifactState.Done],
  [ArtifactState.Done]: [],
  [ArtifactState.Failed]: [],
};

export type PublicationChannel = 'artifact' | 'site';

/** A completed publication. */
export interface Publication {
  channel: PublicationChannel;
  /** `<profile>-<featureSet>` for the artifact channel; absent for site. */
  qualifier?: string;
  name: string;
  location: string;
}
