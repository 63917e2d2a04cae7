/**
 * Artifact spec normalization.
 *
 * Configuration may spell the extraction strategy as the `img` / `runner`
 * flags or as an explicit `strategy`. Both are folded into the single
 * tagged `strategy` field here, so a spec with two strategies can never
 * reach the router.
 */

import { ARTIFACT_STRATEGIES, ArtifactMap, ArtifactSpec, ArtifactStrategy } from '../domain/artifact';
import { ConfigurationError, TypedError, createTypedError } from '../domain/errors';
import { isBoolean, isRecord, isString, optionalField, schemaError } from '../guards';

export interface NormalizedArtifacts {
  artifacts: ArtifactMap;
  warnings: string[];
}

function isStrategy(value: unknown): value is ArtifactStrategy {
  return ARTIFACT_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Normalize one spec. Problems are appended to `errors`; the return value
 * is only meaningful when none were added.
 */
export function readArtifactSpec(
  target: string,
  input: unknown,
  errors: TypedError[],
  warnings: string[],
): ArtifactSpec | undefined {
  const path = `artifacts.${target}`;
  if (!isRecord(input)) {
    errors.push(schemaError(path, 'object', input));
    return undefined;
  }

  const before = errors.length;
  const dst = input.dst;
  if (!isString(dst)) {
    errors.push(schemaError(`${path}.dst`, 'string', dst));
  } else if (!isSingleSegment(dst)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_ARTIFACT_NAME',
        message: `Artifact "${target}": dst "${dst}" must be a single file name`,
        details: { target, dst },
      }),
    );
  }

  const src = optionalField(input, 'src', path, isString, 'string', errors);
  const img = optionalField(input, 'img', path, isBoolean, 'boolean', errors) ?? false;
  const runner = optionalField(input, 'runner', path, isBoolean, 'boolean', errors) ?? false;
  const pages = optionalField(input, 'pages', path, isBoolean, 'boolean', errors) ?? false;
  const explicit = optionalField(input, 'strategy', path, isStrategy, ARTIFACT_STRATEGIES.join(' | '), errors);

  if (src !== undefined && src.length === 0) {
    errors.push(schemaError(`${path}.src`, 'non-empty string', src));
  }

  if (img && runner) {
    errors.push(conflictError(target, 'img and runner are mutually exclusive'));
  } else if (explicit && img && explicit !== 'whole-image') {
    errors.push(conflictError(target, `img contradicts strategy "${explicit}"`));
  } else if (explicit && runner && explicit !== 'runner-local') {
    errors.push(conflictError(target, `runner contradicts strategy "${explicit}"`));
  }

  if (errors.length > before || !isString(dst)) return undefined;

  const strategy: ArtifactStrategy = explicit ?? (img ? 'whole-image' : runner ? 'runner-local' : 'inner-file');
  if (strategy === 'whole-image' && src !== undefined) {
    warnings.push(`Artifact "${target}": src "${src}" is ignored for whole-image extraction`);
  }

  return {
    dst,
    src: strategy === 'whole-image' || src === undefined ? dst : src,
    strategy,
    pages,
  };
}

/** Normalize one spec, throwing `ConfigurationError` on problems. */
export function normalizeArtifactSpec(target: string, input: unknown): { spec: ArtifactSpec; warnings: string[] } {
  const errors: TypedError[] = [];
  const warnings: string[] = [];
  const spec = readArtifactSpec(target, input, errors, warnings);
  if (!spec || errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return { spec, warnings };
}

/** Normalize a map of specs keyed by build target. A missing map is empty. */
export function parseArtifactMap(input: unknown): NormalizedArtifacts {
  if (input === undefined) return { artifacts: {}, warnings: [] };
  if (!isRecord(input)) {
    throw new ConfigurationError([schemaError('artifacts', 'object', input)]);
  }

  const errors: TypedError[] = [];
  const warnings: string[] = [];
  const artifacts: Record<string, ArtifactSpec> = {};
  for (const [target, value] of Object.entries(input)) {
    const spec = readArtifactSpec(target, value, errors, warnings);
    if (spec) artifacts[target] = spec;
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return { artifacts, warnings };
}

function isSingleSegment(name: string): boolean {
  return name.length > 0 && name !== '.' && name !== '..' && !/[/\\]/.test(name);
}

function conflictError(target: string, reason: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.CONFLICTING_STRATEGY',
    message: `Artifact "${target}": ${reason}`,
    details: { target },
    suggestedFixes: [
      {
        type: 'SET_STRATEGY',
        params: { target, strategies: [...ARTIFACT_STRATEGIES] },
        description: 'Select exactly one extraction strategy',
      },
    ],
  });
}
