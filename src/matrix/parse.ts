/**
 * Structural parsing of matrix configuration from untyped input.
 *
 * Accepts dimensions either as an ordered list of `{ name, values }` or as
 * an object mapping names to value arrays (declaration order is key order),
 * and override rules either tagged (`{ values, description?, unconditional? }`)
 * or as bare partial cells. Semantic checks live in the validator.
 */

import { ConfigurationError, TypedError } from '../domain/errors';
import { Dimension, DimensionRoles, MatrixConfig, OverrideRule, OverrideRuleKind } from '../domain/matrix';
import {
  UnknownRecord,
  isBoolean,
  isRecord,
  isString,
  isStringArray,
  isStringRecord,
  optionalField,
  schemaError,
} from '../guards';

const ROLE_KEYS: ReadonlyArray<keyof DimensionRoles> = ['target', 'profile', 'featureSet', 'host'];

/** Parse matrix configuration, throwing `ConfigurationError` on shape errors. */
export function parseMatrixConfig(input: unknown, path = 'matrix'): MatrixConfig {
  const errors: TypedError[] = [];
  const config = readMatrixConfig(input, path, errors);
  if (errors.length > 0 || !config) {
    throw new ConfigurationError(errors);
  }
  return config;
}

/** Collecting variant used by parsers of larger documents. */
export function readMatrixConfig(input: unknown, path: string, errors: TypedError[]): MatrixConfig | undefined {
  if (!isRecord(input)) {
    errors.push(schemaError(path, 'object', input));
    return undefined;
  }

  const before = errors.length;
  const dimensions = readDimensions(input.dimensions, `${path}.dimensions`, errors);
  const excludes = readRules(input.excludes, 'exclude', `${path}.excludes`, errors);
  const includes = readRules(input.includes, 'include', `${path}.includes`, errors);
  const roles = readRoles(input, path, errors);
  const identityDimensions = optionalField(
    input,
    'identityDimensions',
    path,
    isStringArray,
    'array of strings',
    errors,
  );

  if (errors.length > before) return undefined;

  const config: MatrixConfig = { dimensions, excludes, includes };
  if (roles) config.roles = roles;
  if (identityDimensions) config.identityDimensions = identityDimensions;
  return config;
}

/** Read dimensions from either accepted form. */
export function readDimensions(value: unknown, path: string, errors: TypedError[]): Dimension[] {
  if (Array.isArray(value)) {
    const dimensions: Dimension[] = [];
    value.forEach((item, index) => {
      if (!isRecord(item) || !isString(item.name) || !isStringArray(item.values)) {
        errors.push(schemaError(`${path}[${index}]`, '{ name: string, values: string[] }', item));
        return;
      }
      dimensions.push({ name: item.name, values: item.values });
    });
    return dimensions;
  }

  if (isRecord(value)) {
    const dimensions: Dimension[] = [];
    for (const [name, values] of Object.entries(value)) {
      if (!isStringArray(values)) {
        errors.push(schemaError(`${path}.${name}`, 'array of strings', values));
        continue;
      }
      dimensions.push({ name, values });
    }
    return dimensions;
  }

  errors.push(schemaError(path, 'array or object', value));
  return [];
}

/** Read a rule list; a missing list is empty. */
export function readRules(value: unknown, kind: OverrideRuleKind, path: string, errors: TypedError[]): OverrideRule[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    errors.push(schemaError(path, 'array', value));
    return [];
  }

  const rules: OverrideRule[] = [];
  value.forEach((item, index) => {
    const rule = readRule(item, kind, `${path}[${index}]`, errors);
    if (rule) rules.push(rule);
  });
  return rules;
}

function readRule(item: unknown, kind: OverrideRuleKind, path: string, errors: TypedError[]): OverrideRule | undefined {
  if (!isRecord(item)) {
    errors.push(schemaError(path, 'object', item));
    return undefined;
  }

  // A bare partial cell holds only strings; a tagged rule holds `values`.
  if (!isRecord(item.values)) {
    if (!isStringRecord(item)) {
      errors.push(schemaError(path, 'map of dimension to string value', item));
      return undefined;
    }
    return { kind, values: { ...item } };
  }

  const before = errors.length;
  if (!isStringRecord(item.values)) {
    errors.push(schemaError(`${path}.values`, 'map of dimension to string value', item.values));
  }
  if (item.kind !== undefined && item.kind !== kind) {
    errors.push(schemaError(`${path}.kind`, `"${kind}"`, item.kind));
  }
  const description = optionalField(item, 'description', path, isString, 'string', errors);
  const unconditional = optionalField(item, 'unconditional', path, isBoolean, 'boolean', errors);
  if (errors.length > before || !isStringRecord(item.values)) return undefined;

  const rule: OverrideRule = { kind, values: { ...item.values } };
  if (description !== undefined) rule.description = description;
  if (unconditional !== undefined) rule.unconditional = unconditional;
  return rule;
}

function readRoles(input: UnknownRecord, path: string, errors: TypedError[]): Partial<DimensionRoles> | undefined {
  const value = input.roles;
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    errors.push(schemaError(`${path}.roles`, 'object', value));
    return undefined;
  }

  const roles: Partial<DimensionRoles> = {};
  for (const key of ROLE_KEYS) {
    const role = optionalField(value, key, `${path}.roles`, isString, 'string', errors);
    if (role !== undefined) roles[key] = role;
  }
  for (const key of Object.keys(value)) {
    if (!ROLE_KEYS.some((known) => known === key)) {
      errors.push(schemaError(`${path}.roles.${key}`, `one of ${ROLE_KEYS.join(', ')}`, key));
    }
  }
  return roles;
}
