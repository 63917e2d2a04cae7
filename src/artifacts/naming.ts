/**
 * Publication naming.
 *
 * The generic channel qualifies a name by the job's profile and feature
 * set so that artifacts of one target from different cells never collide.
 * The site channel uses the bare name.
 */

import { ArtifactMap, ArtifactSpec } from '../domain/artifact';
import { DimensionRoles, MatrixCell } from '../domain/matrix';

/** `<profile>-<featureSet>`, leaving out parts the matrix does not declare. */
export function artifactQualifier(cell: MatrixCell, roles: Pick<DimensionRoles, 'profile' | 'featureSet'>): string | undefined {
  const parts = [roles.profile, roles.featureSet]
    .filter((name) => Object.prototype.hasOwnProperty.call(cell, name))
    .map((name) => cell[name]);
  return parts.length > 0 ? parts.join('-') : undefined;
}

/** Name under which the generic channel stores an artifact. */
export function qualifiedName(qualifier: string | undefined, name: string): string {
  return qualifier ? `${qualifier}-${name}` : name;
}

/** Build target of a cell, if the matrix declares one. */
export function cellTarget(cell: MatrixCell, roles: Pick<DimensionRoles, 'target'>): string | undefined {
  return Object.prototype.hasOwnProperty.call(cell, roles.target) ? cell[roles.target] : undefined;
}

/** Own-property lookup of a target's artifact spec. */
export function artifactSpecFor(artifacts: ArtifactMap, target: string | undefined): ArtifactSpec | undefined {
  if (target === undefined || !Object.prototype.hasOwnProperty.call(artifacts, target)) return undefined;
  return artifacts[target];
}
