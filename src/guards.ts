/**
 * Structural type guards for configuration arriving as untyped JSON.
 */

import { TypedError, createTypedError } from './domain/errors';

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((item) => typeof item === 'string');
}

/** Error for a value at `path` that does not have the expected shape. */
export function schemaError(path: string, expected: string, value: unknown): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message: `${path}: expected ${expected}, got ${describeValue(value)}`,
    details: { path, expected },
  });
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/** Read an optional field, recording a schema error when it has the wrong type. */
export function optionalField<T>(
  record: UnknownRecord,
  key: string,
  path: string,
  guard: (value: unknown) => value is T,
  expected: string,
  errors: TypedError[],
): T | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (guard(value)) return value;
  errors.push(schemaError(`${path}.${key}`, expected, value));
  return undefined;
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
