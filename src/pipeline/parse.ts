/**
 * Structural parsing of pipeline definitions from untyped input.
 */

import { ConfigurationError, TypedError } from '../domain/errors';
import { PipelineDefinition, StageDefinition } from '../domain/pipeline';
import { readRunOptions } from '../engine/run-options';
import { readRules } from '../matrix/parse';
import { isBoolean, isRecord, isString, isStringArray, isStringRecord, optionalField, schemaError } from '../guards';

/** Parse a pipeline definition, throwing `ConfigurationError` on shape errors. */
export function parsePipelineDefinition(input: unknown, path = 'pipeline'): PipelineDefinition {
  const errors: TypedError[] = [];
  const definition = readPipelineDefinition(input, path, errors);
  if (errors.length > 0 || !definition) {
    throw new ConfigurationError(errors);
  }
  return definition;
}

function readPipelineDefinition(input: unknown, path: string, errors: TypedError[]): PipelineDefinition | undefined {
  if (!isRecord(input)) {
    errors.push(schemaError(path, 'object', input));
    return undefined;
  }

  const before = errors.length;
  const name = optionalField(input, 'name', path, isString, 'string', errors);
  const defaults = readDefaults(input.defaults, `${path}.defaults`, errors);
  const excludes = readRules(input.excludes, 'exclude', `${path}.excludes`, errors);
  const includes = readRules(input.includes, 'include', `${path}.includes`, errors);

  const stages: StageDefinition[] = [];
  if (!Array.isArray(input.stages)) {
    errors.push(schemaError(`${path}.stages`, 'array', input.stages));
  } else {
    input.stages.forEach((item, index) => {
      const stage = readStage(item, `${path}.stages[${index}]`, errors);
      if (stage) stages.push(stage);
    });
  }

  let options: PipelineDefinition['options'];
  if (input.options !== undefined) {
    if (isRecord(input.options)) {
      options = readRunOptions(input.options, `${path}.options`, errors);
    } else {
      errors.push(schemaError(`${path}.options`, 'object', input.options));
    }
  }

  if (errors.length > before) return undefined;

  const definition: PipelineDefinition = { defaults, excludes, includes, stages };
  if (name !== undefined) definition.name = name;
  if (options) definition.options = options;
  return definition;
}

function readDefaults(value: unknown, path: string, errors: TypedError[]): Record<string, string[]> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    errors.push(schemaError(path, 'map of dimension to values', value));
    return {};
  }
  const defaults: Record<string, string[]> = {};
  for (const [dimension, values] of Object.entries(value)) {
    if (isStringArray(values)) {
      defaults[dimension] = values;
    } else {
      errors.push(schemaError(`${path}.${dimension}`, 'array of strings', values));
    }
  }
  return defaults;
}

function readStage(item: unknown, path: string, errors: TypedError[]): StageDefinition | undefined {
  if (!isRecord(item)) {
    errors.push(schemaError(path, 'object', item));
    return undefined;
  }

  const before = errors.length;
  if (!isString(item.id)) {
    errors.push(schemaError(`${path}.id`, 'string', item.id));
  }
  if (!isStringArray(item.targets)) {
    errors.push(schemaError(`${path}.targets`, 'array of strings', item.targets));
  }
  const name = optionalField(item, 'name', path, isString, 'string', errors);
  const dimensions = item.dimensions === undefined ? undefined : readDefaults(item.dimensions, `${path}.dimensions`, errors);
  const when = optionalField(item, 'when', path, isStringRecord, 'map of dimension to string value', errors);
  const needs = optionalField(item, 'needs', path, isStringArray, 'array of strings', errors);
  const artifacts = optionalField(item, 'artifacts', path, isRecord, 'object', errors);
  const failFast = optionalField(item, 'failFast', path, isBoolean, 'boolean', errors);

  if (errors.length > before || !isString(item.id) || !isStringArray(item.targets)) return undefined;

  const stage: StageDefinition = { id: item.id, targets: item.targets };
  if (name !== undefined) stage.name = name;
  if (dimensions !== undefined) stage.dimensions = dimensions;
  if (when !== undefined) stage.when = when;
  if (needs !== undefined) stage.needs = needs;
  if (artifacts !== undefined) stage.artifacts = artifacts;
  if (failFast !== undefined) stage.failFast = failFast;
  return stage;
}
