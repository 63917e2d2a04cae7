/**
 * Process configuration from environment variables.
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError, TypedError, createTypedError } from './domain/errors';
import { ArtifactCancelPolicy, RunOptions } from './domain/run';
import { DEFAULT_RUN_OPTIONS } from './engine/run-options';
import { isStringArray } from './guards';
import { LogLevel, parseLogLevel } from './logger';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  stagingDir: string;
  artifactDir: string;
  siteDir: string;
  /** Name of a registered build backend. */
  buildBackend: string;
  runDefaults: RunOptions;
  /** Values replacing pipeline defaults, by dimension. */
  defaultDimensions: Record<string, string[]>;
}

export const DIMENSION_ENV_PREFIX = 'BAKERY_DIM_';

type Env = Record<string, string | undefined>;

/** Read the configuration. Malformed values are collected and thrown together. */
export function loadConfig(env: Env = process.env): AppConfig {
  const errors: TypedError[] = [];
  const root = join(tmpdir(), 'bakery');

  const config: AppConfig = {
    port: readInteger(env, 'PORT', 5000, 0, errors),
    logLevel: readLogLevel(env, errors),
    stagingDir: env.BAKERY_STAGING_DIR || join(root, 'staging'),
    artifactDir: env.BAKERY_ARTIFACT_DIR || join(root, 'artifacts'),
    siteDir: env.BAKERY_SITE_DIR || join(root, 'site'),
    buildBackend: env.BAKERY_BUILD_BACKEND || 'dry-run',
    runDefaults: {
      failFast: readBoolean(env, 'BAKERY_FAIL_FAST', DEFAULT_RUN_OPTIONS.failFast, errors),
      concurrency: readInteger(env, 'BAKERY_CONCURRENCY', DEFAULT_RUN_OPTIONS.concurrency, 1, errors),
      artifactsMandatory: readBoolean(env, 'BAKERY_ARTIFACTS_MANDATORY', DEFAULT_RUN_OPTIONS.artifactsMandatory, errors),
      artifactsOnCancel: readCancelPolicy(env, errors),
    },
    defaultDimensions: readDimensionOverrides(env, errors),
  };

  const timeout = env.BAKERY_BUILD_TIMEOUT_MS;
  if (timeout) {
    config.runDefaults.buildTimeoutMs = readInteger(env, 'BAKERY_BUILD_TIMEOUT_MS', 0, 1, errors);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return config;
}

function invalid(name: string, expected: string, value: string): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID_ENV',
    message: `${name}: expected ${expected}, got "${value}"`,
    details: { variable: name },
  });
}

function readInteger(env: Env, name: string, fallback: number, min: number, errors: TypedError[]): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    errors.push(invalid(name, `an integer >= ${min}`, raw));
    return fallback;
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean, errors: TypedError[]): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      errors.push(invalid(name, 'true or false', raw));
      return fallback;
  }
}

function readLogLevel(env: Env, errors: TypedError[]): LogLevel {
  const raw = env.BAKERY_LOG_LEVEL;
  if (!raw) return LogLevel.Info;
  const level = parseLogLevel(raw);
  if (!level) {
    errors.push(invalid('BAKERY_LOG_LEVEL', Object.values(LogLevel).join(', '), raw));
    return LogLevel.Info;
  }
  return level;
}

function readCancelPolicy(env: Env, errors: TypedError[]): ArtifactCancelPolicy {
  const raw = env.BAKERY_ARTIFACTS_ON_CANCEL;
  if (!raw) return DEFAULT_RUN_OPTIONS.artifactsOnCancel;
  if (raw === 'complete' || raw === 'abort') return raw;
  errors.push(invalid('BAKERY_ARTIFACTS_ON_CANCEL', 'complete or abort', raw));
  return DEFAULT_RUN_OPTIONS.artifactsOnCancel;
}

/** `BAKERY_DIM_FEATURE_SET='["default"]'` overrides the `feature_set` defaults. */
function readDimensionOverrides(env: Env, errors: TypedError[]): Record<string, string[]> {
  const overrides: Record<string, string[]> = {};
  for (const [name, raw] of Object.entries(env)) {
    if (!name.startsWith(DIMENSION_ENV_PREFIX) || raw === undefined) continue;
    const dimension = name.slice(DIMENSION_ENV_PREFIX.length).toLowerCase();

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      errors.push(invalid(name, 'a JSON array of strings', raw));
      continue;
    }
    // An empty array is allowed: it empties the dimension and disables the run.
    if (!isStringArray(parsed) || dimension.length === 0) {
      errors.push(invalid(name, 'a JSON array of strings', raw));
      continue;
    }
    overrides[dimension] = parsed;
  }
  return overrides;
}
