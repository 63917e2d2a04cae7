import { ArtifactState } from '../../src/domain/artifact';
import { buildFailureError, extractionError } from '../../src/domain/errors';
import { JobStatus } from '../../src/domain/job';
import { JobRecord } from '../../src/domain/run';
import { buildRunReport } from '../../src/engine/report';

function record(index: number, identity: string, overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    index,
    identity,
    cell: { target: identity },
    status: JobStatus.Succeeded,
    artifact: ArtifactState.Done,
    publications: [],
    ...overrides,
  };
}

const PUBLISHED = [{ channel: 'artifact' as const, name: 'x.bin', location: '/out/x.bin/x.bin' }];

describe('Run report', () => {
  test('orders jobs by plan index and counts outcomes', () => {
    const report = buildRunReport(
      [
        record(3, 'c', { status: JobStatus.Cancelled, cancelReason: 'canceled by user' }),
        record(1, 'a', { publications: PUBLISHED }),
        record(2, 'b'),
      ],
      { artifactsMandatory: false },
    );

    expect(report.jobs.map((j) => j.identity)).toEqual(['a', 'b', 'c']);
    expect(report.totals).toEqual({
      jobs: 3,
      succeeded: 2,
      failed: 0,
      cancelled: 1,
      published: 1,
      skipped: 2,
      artifactFailures: 0,
    });
    expect(report.success).toBe(false);
  });

  test('succeeds only when every build succeeded', () => {
    const report = buildRunReport([record(1, 'a'), record(2, 'b')], { artifactsMandatory: false });
    expect(report.success).toBe(true);
    expect(report.errors).toEqual([]);
  });

  test('build errors are attributed to their job', () => {
    const error = buildFailureError('a', 'exit 1');
    const report = buildRunReport([record(1, 'a', { status: JobStatus.Failed, error })], {
      artifactsMandatory: false,
    });
    expect(report.errors).toEqual([{ identity: 'a', stage: 'build', error }]);
  });

  test('artifact failures warn when optional', () => {
    const artifactError = extractionError('a', 'source missing');
    const jobs = [record(1, 'a', { artifact: ArtifactState.Failed, artifactError })];

    const optional = buildRunReport(jobs, { artifactsMandatory: false }, ['plan warning']);
    expect(optional.success).toBe(true);
    expect(optional.warnings).toEqual(['plan warning', 'Artifact of job "a" failed: source missing']);
    expect(optional.errors).toEqual([{ identity: 'a', stage: 'artifact', error: artifactError }]);

    const mandatory = buildRunReport(jobs, { artifactsMandatory: true });
    expect(mandatory.success).toBe(false);
    expect(mandatory.warnings).toEqual([]);
    expect(mandatory.totals.artifactFailures).toBe(1);
  });

  test('an empty run succeeds', () => {
    const report = buildRunReport([], { artifactsMandatory: true });
    expect(report.success).toBe(true);
    expect(report.totals.jobs).toBe(0);
  });
});
