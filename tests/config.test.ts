import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/domain/errors';
import { LogLevel } from '../src/logger';
import { planMatrixOrThrow } from '../src/matrix/planner';
import { stageMatrix, withDefaultOverrides } from '../src/pipeline/runner';

function configErrors(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) return err.errors.map((e) => e.message);
    throw err;
  }
  return [];
}

describe('loadConfig', () => {
  test('defaults', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      port: 5000,
      logLevel: LogLevel.Info,
      stagingDir: join(tmpdir(), 'bakery', 'staging'),
      artifactDir: join(tmpdir(), 'bakery', 'artifacts'),
      siteDir: join(tmpdir(), 'bakery', 'site'),
      buildBackend: 'dry-run',
      runDefaults: {
        failFast: false,
        concurrency: 4,
        artifactsMandatory: false,
        artifactsOnCancel: 'complete',
      },
      defaultDimensions: {},
    });
  });

  test('reads every variable', () => {
    const config = loadConfig({
      PORT: '8080',
      BAKERY_LOG_LEVEL: 'DEBUG',
      BAKERY_STAGING_DIR: '/srv/staging',
      BAKERY_ARTIFACT_DIR: '/srv/artifacts',
      BAKERY_SITE_DIR: '/srv/site',
      BAKERY_BUILD_BACKEND: 'docker-bake',
      BAKERY_FAIL_FAST: 'yes',
      BAKERY_CONCURRENCY: '8',
      BAKERY_ARTIFACTS_MANDATORY: '1',
      BAKERY_ARTIFACTS_ON_CANCEL: 'abort',
      BAKERY_BUILD_TIMEOUT_MS: '600000',
      BAKERY_DIM_FEATURE_SET: '["default","full"]',
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe(LogLevel.Debug);
    expect(config.stagingDir).toBe('/srv/staging');
    expect(config.artifactDir).toBe('/srv/artifacts');
    expect(config.siteDir).toBe('/srv/site');
    expect(config.buildBackend).toBe('docker-bake');
    expect(config.runDefaults).toEqual({
      failFast: true,
      concurrency: 8,
      artifactsMandatory: true,
      artifactsOnCancel: 'abort',
      buildTimeoutMs: 600000,
    });
    expect(config.defaultDimensions).toEqual({ feature_set: ['default', 'full'] });
  });

  test('collects every malformed variable', () => {
    expect(
      configErrors({
        PORT: 'abc',
        BAKERY_CONCURRENCY: '0',
        BAKERY_FAIL_FAST: 'maybe',
        BAKERY_LOG_LEVEL: 'loud',
      }),
    ).toEqual([
      'PORT: expected an integer >= 0, got "abc"',
      'BAKERY_LOG_LEVEL: expected debug, info, warn, error, got "loud"',
      'BAKERY_FAIL_FAST: expected true or false, got "maybe"',
      'BAKERY_CONCURRENCY: expected an integer >= 1, got "0"',
    ]);
  });

  test('rejects malformed dimension overrides', () => {
    expect(configErrors({ BAKERY_DIM_OS: '[1]', BAKERY_DIM_ARCH: 'x86' })).toEqual([
      'BAKERY_DIM_OS: expected a JSON array of strings, got "[1]"',
      'BAKERY_DIM_ARCH: expected a JSON array of strings, got "x86"',
    ]);
  });

  test('an empty dimension override is accepted and disables the run', () => {
    const config = loadConfig({ BAKERY_DIM_FEATURE_SET: '[]' });
    expect(config.defaultDimensions).toEqual({ feature_set: [] });

    const definition = withDefaultOverrides(
      { defaults: { profile: ['release'], feature_set: ['default'] }, stages: [{ id: 'build', targets: ['linux'] }] },
      config.defaultDimensions,
    );
    const plan = planMatrixOrThrow(stageMatrix(definition, definition.stages[0]));
    expect(plan.jobs).toEqual([]);
  });

  test('rejects an unknown cancel policy and a zero timeout', () => {
    expect(configErrors({ BAKERY_ARTIFACTS_ON_CANCEL: 'later', BAKERY_BUILD_TIMEOUT_MS: '0' })).toEqual([
      'BAKERY_ARTIFACTS_ON_CANCEL: expected complete or abort, got "later"',
      'BAKERY_BUILD_TIMEOUT_MS: expected an integer >= 1, got "0"',
    ]);
  });
});
