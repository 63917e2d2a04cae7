/**
 * Run options: defaults, layering and structural reading.
 */

import { ConfigurationError, TypedError, createTypedError } from '../domain/errors';
import { ArtifactCancelPolicy, RunOptions } from '../domain/run';
import { UnknownRecord, isBoolean, isFiniteNumber, optionalField } from '../guards';
import { DEFAULT_CONCURRENCY } from './dispatcher';

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  failFast: false,
  concurrency: DEFAULT_CONCURRENCY,
  artifactsMandatory: false,
  artifactsOnCancel: 'complete',
};

function isCancelPolicy(value: unknown): value is ArtifactCancelPolicy {
  return value === 'complete' || value === 'abort';
}

/** Read the run option fields of `record`, recording schema errors. */
export function readRunOptions(record: UnknownRecord, path: string, errors: TypedError[]): Partial<RunOptions> {
  const options: Partial<RunOptions> = {};
  const failFast = optionalField(record, 'failFast', path, isBoolean, 'boolean', errors);
  const concurrency = optionalField(record, 'concurrency', path, isFiniteNumber, 'number', errors);
  const artifactsMandatory = optionalField(record, 'artifactsMandatory', path, isBoolean, 'boolean', errors);
  const artifactsOnCancel = optionalField(record, 'artifactsOnCancel', path, isCancelPolicy, '"complete" or "abort"', errors);
  const buildTimeoutMs = optionalField(record, 'buildTimeoutMs', path, isFiniteNumber, 'number', errors);

  if (failFast !== undefined) options.failFast = failFast;
  if (concurrency !== undefined) options.concurrency = concurrency;
  if (artifactsMandatory !== undefined) options.artifactsMandatory = artifactsMandatory;
  if (artifactsOnCancel !== undefined) options.artifactsOnCancel = artifactsOnCancel;
  if (buildTimeoutMs !== undefined) options.buildTimeoutMs = buildTimeoutMs;
  return options;
}

/** Merge option layers over the defaults (later layers win) and check the result. */
export function resolveRunOptions(...layers: Array<Partial<RunOptions> | undefined>): RunOptions {
  const options: RunOptions = { ...DEFAULT_RUN_OPTIONS };
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.failFast !== undefined) options.failFast = layer.failFast;
    if (layer.concurrency !== undefined) options.concurrency = layer.concurrency;
    if (layer.artifactsMandatory !== undefined) options.artifactsMandatory = layer.artifactsMandatory;
    if (layer.artifactsOnCancel !== undefined) options.artifactsOnCancel = layer.artifactsOnCancel;
    if (layer.buildTimeoutMs !== undefined) options.buildTimeoutMs = layer.buildTimeoutMs;
  }

  const errors: TypedError[] = [];
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_CONCURRENCY',
        message: `concurrency must be a positive integer, got ${options.concurrency}`,
        details: { concurrency: options.concurrency },
      }),
    );
  }
  if (options.buildTimeoutMs !== undefined && !(options.buildTimeoutMs > 0)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_TIMEOUT',
        message: `buildTimeoutMs must be positive, got ${options.buildTimeoutMs}`,
        details: { buildTimeoutMs: options.buildTimeoutMs },
      }),
    );
  }
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return options;
}
