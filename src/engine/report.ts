/**
 * Run report assembly.
 */

import { ArtifactState } from '../domain/artifact';
import { JobStatus } from '../domain/job';
import { JobRecord, ReportError, RunReport } from '../domain/run';

export function buildRunReport(
  jobs: readonly JobRecord[],
  options: { artifactsMandatory: boolean },
  planWarnings: readonly string[] = [],
): RunReport {
  const ordered = [...jobs].sort((a, b) => a.index - b.index);
  const errors: ReportError[] = [];
  const warnings = [...planWarnings];

  for (const job of ordered) {
    if (job.error) {
      errors.push({ identity: job.identity, stage: 'build', error: job.error });
    }
    if (job.artifactError) {
      errors.push({ identity: job.identity, stage: 'artifact', error: job.artifactError });
      if (!options.artifactsMandatory) {
        warnings.push(`Artifact of job "${job.identity}" failed: ${job.artifactError.message}`);
      }
    }
  }

  const count = (predicate: (job: JobRecord) => boolean): number => ordered.filter(predicate).length;
  const totals = {
    jobs: ordered.length,
    succeeded: count((job) => job.status === JobStatus.Succeeded),
    failed: count((job) => job.status === JobStatus.Failed),
    cancelled: count((job) => job.status === JobStatus.Cancelled),
    published: count((job) => job.artifact === ArtifactState.Done && job.publications.length > 0),
    skipped: count((job) => job.artifact === ArtifactState.Done && job.publications.length === 0),
    artifactFailures: count((job) => job.artifact === ArtifactState.Failed),
  };

  const buildsOk = totals.succeeded === totals.jobs;
  const artifactsOk = !options.artifactsMandatory || totals.artifactFailures === 0;

  return {
    success: buildsOk && artifactsOk,
    totals,
    jobs: ordered,
    errors,
    warnings,
  };
}
