import { CollisionError, ConfigurationError } from '../../src/domain/errors';
import { MatrixConfig } from '../../src/domain/matrix';
import { parseArtifactMap } from '../../src/artifacts/artifact-spec';
import { planMatrix, planMatrixOrThrow } from '../../src/matrix/planner';

const twoByTwo: MatrixConfig = {
  dimensions: [
    { name: 'target', values: ['a', 'b'] },
    { name: 'profile', values: ['dev', 'release'] },
  ],
  excludes: [{ kind: 'exclude', values: { target: 'b', profile: 'dev' } }],
};

describe('Matrix Planner', () => {
  test('excludes one cell of a two by two matrix', () => {
    const plan = planMatrixOrThrow(twoByTwo);
    expect(plan.jobs).toEqual([
      { index: 1, identity: 'a--dev', cell: { target: 'a', profile: 'dev' } },
      { index: 2, identity: 'a--release', cell: { target: 'a', profile: 'release' } },
      { index: 3, identity: 'b--release', cell: { target: 'b', profile: 'release' } },
    ]);
    expect(plan.candidateCount).toBe(4);
    expect(plan.excluded).toHaveLength(1);
    expect(plan.excluded[0].cell).toEqual({ target: 'b', profile: 'dev' });
  });

  test('plan hash is stable for identical input', () => {
    expect(planMatrixOrThrow(twoByTwo).planHash).toBe(planMatrixOrThrow(twoByTwo).planHash);
    expect(planMatrixOrThrow(twoByTwo).planHash).toMatch(/^[0-9a-f]{64}$/);
  });

  test('plan hash changes with the job set', () => {
    const other = planMatrixOrThrow({ ...twoByTwo, excludes: [] });
    expect(other.planHash).not.toBe(planMatrixOrThrow(twoByTwo).planHash);
  });

  test('an unconditional exclusion plans no jobs and warns', () => {
    const plan = planMatrixOrThrow({
      dimensions: twoByTwo.dimensions,
      excludes: [{ kind: 'exclude', values: {}, unconditional: true }],
    });
    expect(plan.jobs).toEqual([]);
    expect(plan.warnings).toEqual([
      'Exclusion rule 0 is unconditional and disables the whole matrix',
      'Matrix produces no jobs; nothing will be built',
    ]);
  });

  test('validation errors are returned as values by planMatrix', () => {
    const result = planMatrix({ dimensions: [] });
    expect(result.success).toBe(false);
    expect(result.plan).toBeUndefined();
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.NO_DIMENSIONS']);
  });

  test('validation errors throw from planMatrixOrThrow', () => {
    expect(() => planMatrixOrThrow({ dimensions: [] })).toThrow(ConfigurationError);
  });

  test('identity collisions fail planning before dispatch', () => {
    const config: MatrixConfig = {
      dimensions: [
        { name: 'target', values: ['a'] },
        { name: 'machine', values: ['x86', 'arm'] },
      ],
    };
    expect(() => planMatrixOrThrow(config)).toThrow(CollisionError);

    const result = planMatrix(config);
    expect(result.success).toBe(false);
    expect(result.errors[0].code).toBe('MATRIX.COLLISION');
    expect(result.errors[0].message).toBe(
      '1 job identity shared by distinct cells (first: "a"); the cells differ only in "machine". ' +
        'Add it to identityDimensions or exclude all but one value per identity',
    );
  });

  test('excluding the host dimension resolves the collision', () => {
    const plan = planMatrixOrThrow({
      dimensions: [
        { name: 'target', values: ['a'] },
        { name: 'machine', values: ['x86', 'arm'] },
      ],
      excludes: [{ kind: 'exclude', values: { machine: 'arm' } }],
    });
    expect(plan.jobs.map((job) => job.identity)).toEqual(['a']);
  });

  test('warns when two jobs publish the same generic artifact name', () => {
    const { artifacts } = parseArtifactMap({ a: { dst: 'out.bin' } });
    const plan = planMatrixOrThrow(
      {
        dimensions: [
          { name: 'target', values: ['a'] },
          { name: 'profile', values: ['release'] },
          { name: 'toolchain', values: ['stable', 'nightly'] },
        ],
      },
      { artifacts },
    );
    expect(plan.warnings).toEqual([
      'Jobs "a--release--stable" and "a--release--nightly" both publish artifact "release-out.bin"; the later one wins',
    ]);
  });
});
