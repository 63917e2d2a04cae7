/**
 * Matrix Planner.
 *
 * Turns a matrix configuration into the exact, ordered job set of a run:
 * validate, build the registry, expand, filter, resolve identities. Any
 * configuration or collision problem surfaces here, before a build starts.
 */

import { createHash } from 'crypto';
import { ArtifactMap } from '../domain/artifact';
import { ConfigurationError, TypedError, toTypedError } from '../domain/errors';
import { PlannedJob } from '../domain/job';
import { DimensionRegistry, ExclusionRecord, MatrixCell, MatrixConfig } from '../domain/matrix';
import { artifactQualifier, artifactSpecFor, cellTarget, qualifiedName } from '../artifacts/naming';
import { candidateCount, expand } from './expander';
import { filterCellsWithDiagnostics } from './override-filter';
import { resolveIdentities } from './identity';
import { createDimensionRegistry } from './registry';
import { ValidationResult, validateMatrixConfig } from './validator';

/** The planned job set of one run. */
export interface MatrixPlan {
  registry: DimensionRegistry;
  /** Jobs in dispatch order; `index` is 1-based. */
  jobs: PlannedJob[];
  excluded: ExclusionRecord[];
  restored: MatrixCell[];
  appended: MatrixCell[];
  candidateCount: number;
  warnings: string[];
  /** sha256 over the ordered identities. */
  planHash: string;
}

/** Planning result. */
export interface PlanningResult {
  success: boolean;
  plan?: MatrixPlan;
  errors: TypedError[];
  validation: ValidationResult;
}

export interface PlanOptions {
  /** Checked for names that would overwrite each other when published. */
  artifacts?: ArtifactMap;
}

/** Plan a matrix, reporting problems as values. */
export function planMatrix(config: MatrixConfig, options: PlanOptions = {}): PlanningResult {
  // Phase 1: Validate
  const validation = validateMatrixConfig(config);
  if (!validation.valid) {
    return {
      success: false,
      errors: validation.errors,
      validation,
    };
  }

  try {
    const plan = buildPlan(config, validation, options);
    return { success: true, plan, errors: [], validation };
  } catch (err) {
    return { success: false, errors: [toTypedError(err)], validation };
  }
}

/** Plan a matrix, throwing `ConfigurationError` or `CollisionError`. */
export function planMatrixOrThrow(config: MatrixConfig, options: PlanOptions = {}): MatrixPlan {
  const validation = validateMatrixConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError(validation.errors);
  }
  return buildPlan(config, validation, options);
}

function buildPlan(config: MatrixConfig, validation: ValidationResult, options: PlanOptions): MatrixPlan {
  const warnings = [...validation.warnings];

  // Phase 2: Registry
  const registry = createDimensionRegistry(config.dimensions, {
    roles: config.roles,
    identityDimensions: config.identityDimensions,
  });

  // Phase 3: Expand and filter
  const candidates = expand(registry.dimensions);
  const filtered = filterCellsWithDiagnostics(
    candidates,
    config.excludes ?? [],
    config.includes ?? [],
    registry.names,
  );

  // Phase 4: Identities
  const identities = resolveIdentities(filtered.cells, registry.identityOrder);
  const jobs: PlannedJob[] = [...identities.entries()].map(([identity, cell], i) => ({
    index: i + 1,
    identity,
    cell,
  }));

  if (jobs.length === 0) {
    warnings.push('Matrix produces no jobs; nothing will be built');
  }
  if (options.artifacts) {
    warnings.push(...findArtifactClashes(jobs, registry, options.artifacts));
  }

  return {
    registry,
    jobs,
    excluded: filtered.excluded,
    restored: filtered.restored,
    appended: filtered.appended,
    candidateCount: candidateCount(registry.dimensions),
    warnings,
    planHash: computeHash(jobs.map((job) => job.identity).join('\n')),
  };
}

/**
 * Warn about jobs whose artifacts would land on the same generic name.
 * The channel keys by qualifier and name, so two cells of one target that
 * differ only outside profile and feature set overwrite each other.
 */
function findArtifactClashes(jobs: PlannedJob[], registry: DimensionRegistry, artifacts: ArtifactMap): string[] {
  const warnings: string[] = [];
  const generic = new Map<string, string>();

  for (const job of jobs) {
    const spec = artifactSpecFor(artifacts, cellTarget(job.cell, registry.roles));
    if (!spec) continue;

    const name = qualifiedName(artifactQualifier(job.cell, registry.roles), spec.dst);
    const owner = generic.get(name);
    if (owner) {
      warnings.push(`Jobs "${owner}" and "${job.identity}" both publish artifact "${name}"; the later one wins`);
    } else {
      generic.set(name, job.identity);
    }
  }

  for (const [target, spec] of Object.entries(artifacts)) {
    if (spec.pages && spec.strategy === 'whole-image') {
      warnings.push(`Artifact "${spec.dst}" of target "${target}" publishes a saved image to the site channel`);
    }
  }

  return warnings;
}

/** Compute SHA-256 hash of a string. */
function computeHash(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}
